import type { RowReference } from '../../types/shift.js';
import type { CrewFields, CrewReferences } from '../sections/crewWizard.js';
import type { ExpensesFields, ExpensesReferences } from '../sections/expensesWizard.js';
import type { MaterialsFields, MaterialsReferences } from '../sections/materialsWizard.js';
import type { RegistrationFields, RegistrationReferences } from '../sections/registrationWizard.js';
import type { DialogueKind, WizardContext, WizardDefinition } from '../wizard/types.js';

export type ActiveDialogue =
  | { kind: 'crew'; context: WizardContext<CrewFields, CrewReferences> }
  | { kind: 'expenses'; context: WizardContext<ExpensesFields, ExpensesReferences> }
  | { kind: 'materials'; context: WizardContext<MaterialsFields, MaterialsReferences> }
  | { kind: 'registration'; context: WizardContext<RegistrationFields, RegistrationReferences> };

export type WizardRegistry = {
  crew: WizardDefinition<CrewFields, CrewReferences>;
  expenses: WizardDefinition<ExpensesFields, ExpensesReferences>;
  materials: WizardDefinition<MaterialsFields, MaterialsReferences>;
  registration: WizardDefinition<RegistrationFields, RegistrationReferences>;
};

export type ConversationState =
  | { mode: 'dashboard'; screenId: number | null; registered: boolean }
  | { mode: 'menu'; row: RowReference; screenId: number | null }
  | { mode: 'closing'; row: RowReference; screenId: number | null }
  | { mode: 'dialogue'; row: RowReference | null; dialogue: ActiveDialogue };

export type DialogueTurn =
  | { status: 'active'; dialogue: ActiveDialogue }
  | { status: 'saved'; kind: DialogueKind }
  | { status: 'exited'; destination: 'menu' | 'dashboard' }
  | { status: 'aborted' };

export const screenIdOf = (state: ConversationState | undefined): number | null => {
  if (!state || state.mode === 'dialogue') {
    return null;
  }
  return state.screenId;
};
