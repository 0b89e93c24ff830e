import DialogueBindingError from '../../errors/DialogueBindingError.js';
import DuplicateError from '../../errors/DuplicateError.js';
import ExternalServiceError from '../../errors/ExternalServiceError.js';
import MessageGoneError from '../../errors/MessageGoneError.js';
import NotFoundError from '../../errors/NotFoundError.js';
import {
  BINDING_LOST_TEXT,
  STALE_SELECTION_TEXT,
  classifyFailure,
  describeFailure,
  errorMessage,
} from '../../errors/userMessages.js';
import { wizardFailureCounter, wizardSaveCounter } from '../../metrics/metrics.js';
import logger from '../../utils/logger.js';
import { sameLabel } from '../../utils/textNormalizer.js';
import { beginStep, flushTracker, recordMessage } from '../chat/messageTracker.js';
import type { ChatControls, ChatPlatform } from '../chat/types.js';
import { ACTIONS, LABELS } from '../labels.js';
import type {
  ParentScreen,
  Screen,
  StepOutcome,
  WizardBinding,
  WizardContext,
  WizardDefinition,
  WizardInput,
  WizardPosition,
  WizardTurn,
} from './types.js';

type Command = keyof typeof ACTIONS;

const operationOf = (error: unknown): string =>
  error instanceof ExternalServiceError ? `, operation=${error.operation}` : '';

const COMMANDS: Command[] = ['back', 'menu', 'home', 'start', 'confirm', 'edit'];

export const resolveCommand = (input: WizardInput): Command | null => {
  if (input.kind === 'action') {
    return COMMANDS.find((command) => ACTIONS[command] === input.data) ?? null;
  }
  if (input.kind === 'text') {
    return COMMANDS.find((command) => sameLabel(input.text, LABELS[command])) ?? null;
  }
  return null;
};

const navigationCommands = (parent: ParentScreen): Command[] =>
  parent === 'menu' ? ['back', 'menu', 'home'] : ['back', 'home'];

export const withNavigation = (controls: ChatControls, parent: ParentScreen): ChatControls => {
  const commands = navigationCommands(parent);
  if (controls.kind === 'inline') {
    return {
      kind: 'inline',
      rows: [...controls.rows, commands.map((command) => ({ text: LABELS[command], data: ACTIONS[command] }))],
    };
  }
  const rows = controls.kind === 'reply' ? controls.rows : [];
  return { kind: 'reply', rows: [...rows, commands.map((command) => LABELS[command])] };
};

const bindingOf = <F, R>(context: WizardContext<F, R>): WizardBinding => ({
  userId: context.userId,
  chatId: context.chatId,
  row: context.row,
});

/**
 * Runs any section dialogue described by a WizardDefinition:
 * INTRO -> steps in order -> CONFIRM -> persisted, with back/menu/home navigation on every screen.
 */
export class WizardEngine {
  constructor(private readonly chat: ChatPlatform) {}

  async start<F, R>(definition: WizardDefinition<F, R>, binding: WizardBinding): Promise<WizardContext<F, R>> {
    if (definition.requiresRow && binding.row === null) {
      throw new DialogueBindingError(`${definition.kind} dialogue needs a shift row`);
    }
    const references = await definition.loadReferences(binding);
    const context: WizardContext<F, R> = {
      ...binding,
      position: { kind: 'intro' },
      fields: definition.initialFields(),
      references,
      tracker: beginStep(),
    };
    await this.present(definition, context, context.position);
    return context;
  }

  async handle<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    input: WizardInput,
    actorId: number,
  ): Promise<WizardTurn<F, R>> {
    if (actorId !== context.userId || (definition.requiresRow && context.row === null)) {
      return this.abort(
        definition,
        context,
        new DialogueBindingError(`${definition.kind} dialogue of user ${context.userId} received input from ${actorId}`),
      );
    }
    if (input.kind !== 'action') {
      recordMessage(context.tracker, 'user', input.messageId);
    }

    const command = resolveCommand(input);
    if (command === 'home') {
      return this.leave(context, 'dashboard');
    }
    if (command === 'menu') {
      return this.leave(context, definition.parent);
    }

    const { position } = context;
    switch (position.kind) {
      case 'intro':
        if (command === 'back') {
          return this.leave(context, definition.parent);
        }
        if (command === 'start') {
          const first = this.nextPosition(definition, -1);
          await this.present(definition, context, first);
          return { status: 'active', context };
        }
        await this.present(definition, context, position, `Press “${LABELS.start}” to begin.`);
        return { status: 'active', context };
      case 'confirm':
        return this.handleConfirm(definition, context, command);
      case 'step':
        return this.handleStep(definition, context, position.stepId, input, command);
    }
  }

  private async handleConfirm<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    command: Command | null,
  ): Promise<WizardTurn<F, R>> {
    if (command === 'back') {
      const previous = this.previousPosition(definition, definition.steps.length, context.fields);
      if (previous === null) {
        return this.leave(context, definition.parent);
      }
      await this.present(definition, context, previous);
      return { status: 'active', context };
    }
    if (command === 'edit') {
      await this.present(definition, context, this.nextPosition(definition, -1));
      return { status: 'active', context };
    }
    if (command !== 'confirm') {
      await this.present(definition, context, context.position, `Use “${LABELS.confirm}” or “${LABELS.edit}”.`);
      return { status: 'active', context };
    }

    const missing = definition.missing?.(context.fields) ?? null;
    if (missing !== null) {
      await this.present(definition, context, context.position, missing);
      return { status: 'active', context };
    }

    if (definition.savingText) {
      recordMessage(context.tracker, 'bot', await this.chat.send(context.chatId, definition.savingText));
    }
    try {
      await definition.persist(context.fields, context.references, bindingOf(context));
    } catch (error) {
      wizardFailureCounter.inc({ dialogue: definition.kind, reason: classifyFailure(error) });
      logger.error(
        `[wizard:${definition.kind}] Save failed (userId=${context.userId}, row=${context.row}${operationOf(error)}): ${errorMessage(error)}`,
      );
      if (error instanceof DialogueBindingError) {
        return this.abort(definition, context, error);
      }
      if (error instanceof DuplicateError) {
        await flushTracker(this.chat, context.chatId, context.tracker);
        await this.chat.send(context.chatId, describeFailure(error), { controls: { kind: 'remove' } });
        return { status: 'exited', destination: definition.parent };
      }
      const messageId = await this.chat.send(context.chatId, describeFailure(error));
      recordMessage(context.tracker, 'bot', messageId);
      return { status: 'active', context };
    }

    wizardSaveCounter.inc({ dialogue: definition.kind });
    logger.info(`[wizard:${definition.kind}] Saved (userId=${context.userId}, row=${context.row})`);
    await flushTracker(this.chat, context.chatId, context.tracker);
    return { status: 'saved', context };
  }

  private async handleStep<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    stepId: string,
    input: WizardInput,
    command: Command | null,
  ): Promise<WizardTurn<F, R>> {
    const index = definition.steps.findIndex((candidate) => candidate.id === stepId);
    if (index < 0) {
      return this.abort(definition, context, new DialogueBindingError(`Unknown ${definition.kind} step ${stepId}`));
    }
    const step = definition.steps[index];

    if (command === 'back') {
      const previous = this.previousPosition(definition, index, context.fields);
      if (previous === null) {
        return this.leave(context, definition.parent);
      }
      await this.present(definition, context, previous);
      return { status: 'active', context };
    }

    let outcome: StepOutcome<F, R>;
    try {
      outcome = await step.handle(input, context.fields, context.references, bindingOf(context));
    } catch (error) {
      return this.recover(definition, context, error);
    }

    if (outcome.type === 'reject') {
      await this.present(definition, context, context.position, outcome.hint);
      return { status: 'active', context };
    }

    context.fields = outcome.fields;
    if (outcome.references !== undefined) {
      context.references = outcome.references;
    }

    switch (outcome.type) {
      case 'stay':
        await this.refresh(definition, context, input, outcome.notice);
        break;
      case 'advance':
        await this.present(definition, context, this.nextPosition(definition, index), outcome.notice);
        break;
      case 'goto':
        await this.present(definition, context, { kind: 'step', stepId: outcome.stepId }, outcome.notice);
        break;
    }
    return { status: 'active', context };
  }

  private async recover<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    error: unknown,
  ): Promise<WizardTurn<F, R>> {
    if (error instanceof DialogueBindingError) {
      return this.abort(definition, context, error);
    }
    const reason = classifyFailure(error);
    wizardFailureCounter.inc({ dialogue: definition.kind, reason });

    if (error instanceof NotFoundError) {
      logger.info(`[wizard:${definition.kind}] ${error.message}, reloading references (userId=${context.userId})`);
      try {
        context.references = await definition.loadReferences(bindingOf(context));
      } catch (reloadError) {
        return this.recover(definition, context, reloadError);
      }
      await this.present(definition, context, context.position, STALE_SELECTION_TEXT);
      return { status: 'active', context };
    }

    const where = context.position.kind === 'step' ? context.position.stepId : context.position.kind;
    const line = `[wizard:${definition.kind}] Step ${where} failed (userId=${context.userId}, row=${context.row}${operationOf(error)}): ${errorMessage(error)}`;
    if (reason === 'unexpected') {
      logger.error(line);
    } else {
      logger.warn(line);
    }
    const messageId = await this.chat.send(context.chatId, describeFailure(error));
    recordMessage(context.tracker, 'bot', messageId);
    return { status: 'active', context };
  }

  private nextPosition<F, R>(definition: WizardDefinition<F, R>, fromIndex: number): WizardPosition {
    for (let index = fromIndex + 1; index < definition.steps.length; index += 1) {
      const candidate = definition.steps[index];
      if (!candidate.detour) {
        return { kind: 'step', stepId: candidate.id };
      }
    }
    return { kind: 'confirm' };
  }

  private previousPosition<F, R>(definition: WizardDefinition<F, R>, fromIndex: number, fields: F): WizardPosition | null {
    const target = definition.steps[fromIndex]?.backTo?.(fields) ?? null;
    if (target !== null) {
      return { kind: 'step', stepId: target };
    }
    for (let index = fromIndex - 1; index >= 0; index -= 1) {
      const candidate = definition.steps[index];
      if (!candidate.detour) {
        return { kind: 'step', stepId: candidate.id };
      }
    }
    return null;
  }

  private screenFor<F, R>(definition: WizardDefinition<F, R>, context: WizardContext<F, R>): Screen {
    const { position } = context;
    switch (position.kind) {
      case 'intro':
        return {
          text: definition.intro(context.references),
          controls: withNavigation({ kind: 'reply', rows: [[LABELS.start]] }, definition.parent),
        };
      case 'confirm':
        return {
          text: `${definition.review(context.fields, context.references)}\n\nSave these details?`,
          controls: withNavigation({ kind: 'reply', rows: [[LABELS.confirm, LABELS.edit]] }, definition.parent),
        };
      case 'step': {
        const step = definition.steps.find((candidate) => candidate.id === position.stepId);
        if (!step) {
          throw new DialogueBindingError(`Unknown ${definition.kind} step ${position.stepId}`);
        }
        const screen = step.render(context.fields, context.references);
        return { text: screen.text, controls: withNavigation(screen.controls, definition.parent) };
      }
    }
  }

  // Every new screen replaces the previous one: tracked messages go first, then the prompt is recorded.
  private async present<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    position: WizardPosition,
    notice?: string,
  ): Promise<void> {
    context.position = position;
    await flushTracker(this.chat, context.chatId, context.tracker);
    context.tracker = beginStep();
    const screen = this.screenFor(definition, context);
    const text = notice ? `${notice}\n\n${screen.text}` : screen.text;
    const messageId = await this.chat.send(context.chatId, text, { controls: screen.controls });
    recordMessage(context.tracker, 'prompt', messageId);
  }

  // Button presses on an inline screen update it in place; anything else re-sends the step.
  private async refresh<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    input: WizardInput,
    notice?: string,
  ): Promise<void> {
    const promptId = context.tracker.promptId;
    const screen = this.screenFor(definition, context);
    if (input.kind === 'action' && promptId !== null && screen.controls.kind === 'inline') {
      const text = notice ? `${notice}\n\n${screen.text}` : screen.text;
      try {
        await this.chat.edit(context.chatId, promptId, text, screen.controls);
        return;
      } catch (error) {
        if (!(error instanceof MessageGoneError)) {
          throw error;
        }
      }
    }
    await this.present(definition, context, context.position, notice);
  }

  private async leave<F, R>(context: WizardContext<F, R>, destination: ParentScreen): Promise<WizardTurn<F, R>> {
    await flushTracker(this.chat, context.chatId, context.tracker);
    return { status: 'exited', destination };
  }

  private async abort<F, R>(
    definition: WizardDefinition<F, R>,
    context: WizardContext<F, R>,
    error: DialogueBindingError,
  ): Promise<WizardTurn<F, R>> {
    logger.error(`[wizard:${definition.kind}] Dialogue aborted (userId=${context.userId}): ${error.message}`);
    await flushTracker(this.chat, context.chatId, context.tracker);
    await this.chat.send(context.chatId, BINDING_LOST_TEXT, { controls: { kind: 'remove' } });
    return { status: 'aborted' };
  }
}
