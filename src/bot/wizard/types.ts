import type { ChatControls } from '../chat/types.js';
import type { MessageTracker } from '../chat/messageTracker.js';
import type { RowReference, SectionKey } from '../../types/shift.js';

export type DialogueKind = SectionKey | 'registration';

export type ParentScreen = 'menu' | 'dashboard';

export type Screen = {
  text: string;
  controls: ChatControls;
};

export type WizardBinding = {
  userId: number;
  chatId: number;
  row: RowReference | null;
};

export type WizardPosition = { kind: 'intro' } | { kind: 'step'; stepId: string } | { kind: 'confirm' };

export type WizardContext<Fields, References> = WizardBinding & {
  position: WizardPosition;
  fields: Fields;
  references: References;
  tracker: MessageTracker;
};

export type WizardInput =
  | { kind: 'text'; text: string; messageId: number }
  | { kind: 'photo'; fileReference: string; sentAt: Date; messageId: number }
  | { kind: 'action'; data: string; messageId: number | null };

export type StepOutcome<Fields, References> =
  | { type: 'advance'; fields: Fields; references?: References; notice?: string }
  | { type: 'stay'; fields: Fields; references?: References; notice?: string }
  | { type: 'goto'; stepId: string; fields: Fields; references?: References; notice?: string }
  | { type: 'reject'; hint: string };

export type StepDefinition<Fields, References> = {
  id: string;
  /** Reached only through `goto`; linear navigation passes over it. */
  detour?: boolean;
  backTo?: (fields: Fields) => string | null;
  render(fields: Fields, references: References): Screen;
  handle(
    input: WizardInput,
    fields: Fields,
    references: References,
    binding: WizardBinding,
  ): StepOutcome<Fields, References> | Promise<StepOutcome<Fields, References>>;
};

export type WizardDefinition<Fields, References> = {
  kind: DialogueKind;
  parent: ParentScreen;
  requiresRow: boolean;
  intro(references: References): string;
  initialFields(): Fields;
  loadReferences(binding: WizardBinding): Promise<References>;
  steps: ReadonlyArray<StepDefinition<Fields, References>>;
  review(fields: Fields, references: References): string;
  /** Hint when the collected fields cannot be saved yet. */
  missing?(fields: Fields): string | null;
  /** Sent before a slow save and removed with the rest of the dialogue's messages. */
  savingText?: string;
  persist(fields: Fields, references: References, binding: WizardBinding): Promise<void>;
};

export type WizardTurn<Fields, References> =
  | { status: 'active'; context: WizardContext<Fields, References> }
  | { status: 'saved'; context: WizardContext<Fields, References> }
  | { status: 'exited'; destination: ParentScreen }
  | { status: 'aborted' };
