import { describeFailure, errorMessage, UNEXPECTED_FAILURE_TEXT } from '../../errors/userMessages.js';
import { botEventCounter } from '../../metrics/metrics.js';
import type { DashboardService } from '../../services/dashboardService.js';
import type { SessionStore } from '../../services/sessionStore.js';
import { CLOSE_ACTIONS, remainingSectionsText, type ShiftCloseService } from '../../services/shiftCloseService.js';
import { parseMenuChoice, type ShiftMenuService } from '../../services/shiftMenuService.js';
import type { ShiftSessionService } from '../../services/shiftSessionService.js';
import type { RowReference } from '../../types/shift.js';
import logger from '../../utils/logger.js';
import { sameLabel } from '../../utils/textNormalizer.js';
import { deleteMessageQuietly, flushTracker } from '../chat/messageTracker.js';
import type { ChatEvent, ChatPlatform, ChatUser } from '../chat/types.js';
import { LABELS, SECTION_TITLES } from '../labels.js';
import type { WizardEngine } from '../wizard/wizardEngine.js';
import type { DialogueKind, WizardBinding, WizardInput, WizardTurn } from '../wizard/types.js';
import {
  screenIdOf,
  type ActiveDialogue,
  type ConversationState,
  type DialogueTurn,
  type WizardRegistry,
} from './conversationState.js';

export type ConversationDependencies = {
  chat: ChatPlatform;
  states: SessionStore<ConversationState>;
  sessions: ShiftSessionService;
  engine: WizardEngine;
  wizards: WizardRegistry;
  menu: ShiftMenuService;
  close: ShiftCloseService;
  dashboard: DashboardService;
};

const PHOTO_OUTSIDE_MATERIALS_TEXT = `Photos are accepted in the “${SECTION_TITLES.materials}” section.`;

const toWizardInput = (event: ChatEvent): WizardInput | null => {
  switch (event.kind) {
    case 'text':
      return { kind: 'text', text: event.text, messageId: event.messageId };
    case 'photo':
      return { kind: 'photo', fileReference: event.fileReference, sentAt: event.sentAt, messageId: event.messageId };
    case 'callback':
      return { kind: 'action', data: event.data, messageId: event.messageId };
    case 'command':
      return null;
  }
};

const wrapTurn = <F, R>(
  turn: WizardTurn<F, R>,
  rewrap: (turn: Extract<WizardTurn<F, R>, { status: 'active' }>) => ActiveDialogue,
  kind: DialogueKind,
): DialogueTurn => {
  switch (turn.status) {
    case 'active':
      return { status: 'active', dialogue: rewrap(turn) };
    case 'saved':
      return { status: 'saved', kind };
    case 'exited':
      return { status: 'exited', destination: turn.destination };
    case 'aborted':
      return { status: 'aborted' };
  }
};

/**
 * Routes each chat event to the user's current screen: dashboard, shift menu, close confirmation
 * or the active section dialogue. Events of one user are handled strictly one after another.
 */
export class ConversationController {
  private readonly turns = new Map<number, Promise<void>>();

  constructor(private readonly deps: ConversationDependencies) {}

  handleEvent(event: ChatEvent): Promise<void> {
    botEventCounter.inc({ kind: event.kind });
    const previous = this.turns.get(event.userId) ?? Promise.resolve();
    const turn = previous.then(() => this.process(event));
    this.turns.set(event.userId, turn);
    return turn.finally(() => {
      if (this.turns.get(event.userId) === turn) {
        this.turns.delete(event.userId);
      }
    });
  }

  private async process(event: ChatEvent): Promise<void> {
    try {
      await this.dispatch(event);
    } catch (error) {
      logger.error(`[conversation] Unhandled ${event.kind} event (userId=${event.userId}): ${errorMessage(error)}`);
      try {
        await this.deps.chat.send(event.chatId, UNEXPECTED_FAILURE_TEXT);
      } catch (sendError) {
        logger.error(`[conversation] Could not report failure to chat ${event.chatId}: ${errorMessage(sendError)}`);
      }
    }
  }

  private async dispatch(event: ChatEvent): Promise<void> {
    const state = await this.deps.states.get(event.userId);

    if (event.kind === 'command' || !state) {
      if (state?.mode === 'dialogue') {
        await flushTracker(this.deps.chat, event.chatId, state.dialogue.context.tracker);
      }
      await this.openDashboard(event, screenIdOf(state));
      return;
    }

    switch (state.mode) {
      case 'dashboard':
        return this.onDashboard(event, state);
      case 'menu':
        return this.onMenu(event, state);
      case 'closing':
        return this.onClosing(event, state);
      case 'dialogue':
        return this.onDialogue(event, state);
    }
  }

  private async onDashboard(event: ChatEvent, state: Extract<ConversationState, { mode: 'dashboard' }>): Promise<void> {
    await this.discardUserMessage(event);
    if (event.kind === 'text' && state.registered && sameLabel(event.text, LABELS.startShift)) {
      await this.openMenu(event, null, state.screenId);
      return;
    }
    if (event.kind === 'text' && !state.registered && sameLabel(event.text, LABELS.register)) {
      if (state.screenId !== null) {
        await deleteMessageQuietly(this.deps.chat, event.chatId, state.screenId);
      }
      await this.startDialogue('registration', event, null);
      return;
    }
    await this.openDashboard(event, state.screenId);
  }

  private async onMenu(event: ChatEvent, state: Extract<ConversationState, { mode: 'menu' }>): Promise<void> {
    await this.discardUserMessage(event);
    const choice = event.kind === 'text' ? parseMenuChoice(event.text) : null;
    if (!choice) {
      const notice = event.kind === 'photo' ? PHOTO_OUTSIDE_MATERIALS_TEXT : 'Use the buttons below.';
      await this.openMenu(event, state.row, state.screenId, notice);
      return;
    }
    switch (choice.kind) {
      case 'dashboard':
        await this.openDashboard(event, state.screenId);
        return;
      case 'section':
        if (state.screenId !== null) {
          await deleteMessageQuietly(this.deps.chat, event.chatId, state.screenId);
        }
        await this.startDialogue(choice.section, event, state.row);
        return;
      case 'finish':
        await this.requestClose(event, state.row, state.screenId);
        return;
    }
  }

  private async requestClose(event: ChatEvent, row: RowReference, menuScreenId: number | null): Promise<void> {
    const result = await this.deps.close.requestClose(event, row);
    switch (result.status) {
      case 'confirming':
        if (menuScreenId !== null) {
          await deleteMessageQuietly(this.deps.chat, event.chatId, menuScreenId);
        }
        await this.deps.states.set(event.userId, { mode: 'closing', row, screenId: result.messageId });
        return;
      case 'incomplete':
        await this.openMenu(event, row, menuScreenId, remainingSectionsText(result.remaining));
        return;
      case 'already-closed':
        await this.openMenu(event, row, menuScreenId, '🔒 This shift is already closed.');
        return;
      case 'failed':
        return;
    }
  }

  private async onClosing(event: ChatEvent, state: Extract<ConversationState, { mode: 'closing' }>): Promise<void> {
    await this.discardUserMessage(event);
    const confirmed =
      (event.kind === 'callback' && event.data === CLOSE_ACTIONS.confirm) ||
      (event.kind === 'text' && sameLabel(event.text, LABELS.confirmClose));
    const cancelled =
      (event.kind === 'callback' && event.data === CLOSE_ACTIONS.cancel) ||
      (event.kind === 'text' && sameLabel(event.text, LABELS.cancelClose));

    if (cancelled) {
      await this.openMenu(event, state.row, state.screenId);
      return;
    }
    if (!confirmed) {
      await this.requestClose(event, state.row, state.screenId);
      return;
    }
    const result = await this.deps.close.confirmClose(event, state.row, state.screenId);
    switch (result.status) {
      case 'closed':
        await this.openDashboard(event, null, '✅ Shift closed. Thank you!');
        return;
      case 'already-closed':
        await this.openDashboard(event, null, 'ℹ️ This shift was already closed.');
        return;
      case 'failed':
        await this.openMenu(event, state.row, null);
        return;
    }
  }

  private async onDialogue(event: ChatEvent, state: Extract<ConversationState, { mode: 'dialogue' }>): Promise<void> {
    const input = toWizardInput(event);
    if (!input) {
      return;
    }
    const turn = await this.continueDialogue(state.dialogue, input, event.userId);
    switch (turn.status) {
      case 'active':
        await this.deps.states.set(event.userId, { mode: 'dialogue', row: state.row, dialogue: turn.dialogue });
        return;
      case 'saved':
        if (turn.kind === 'registration') {
          await this.openDashboard(event, null, '✅ Registration complete.');
          return;
        }
        await this.deps.sessions.markSectionDone(event.userId, turn.kind);
        if (state.row !== null) {
          await this.openMenu(event, state.row, null, `${SECTION_TITLES[turn.kind]} saved ✅`);
        } else {
          await this.openDashboard(event, null);
        }
        return;
      case 'exited':
        if (turn.destination === 'menu' && state.row !== null) {
          await this.openMenu(event, state.row, null);
        } else {
          await this.openDashboard(event, null);
        }
        return;
      case 'aborted':
        await this.deps.states.delete(event.userId);
        return;
    }
  }

  private async continueDialogue(dialogue: ActiveDialogue, input: WizardInput, actorId: number): Promise<DialogueTurn> {
    const { engine, wizards } = this.deps;
    switch (dialogue.kind) {
      case 'crew': {
        const turn = await engine.handle(wizards.crew, dialogue.context, input, actorId);
        return wrapTurn(turn, ({ context }) => ({ kind: 'crew', context }), 'crew');
      }
      case 'expenses': {
        const turn = await engine.handle(wizards.expenses, dialogue.context, input, actorId);
        return wrapTurn(turn, ({ context }) => ({ kind: 'expenses', context }), 'expenses');
      }
      case 'materials': {
        const turn = await engine.handle(wizards.materials, dialogue.context, input, actorId);
        return wrapTurn(turn, ({ context }) => ({ kind: 'materials', context }), 'materials');
      }
      case 'registration': {
        const turn = await engine.handle(wizards.registration, dialogue.context, input, actorId);
        return wrapTurn(turn, ({ context }) => ({ kind: 'registration', context }), 'registration');
      }
    }
  }

  private async startDialogue(kind: DialogueKind, user: ChatUser, row: RowReference | null): Promise<void> {
    const binding: WizardBinding = { userId: user.userId, chatId: user.chatId, row };
    let dialogue: ActiveDialogue;
    try {
      dialogue = await this.openDialogue(kind, binding);
    } catch (error) {
      logger.error(`[conversation] Could not start ${kind} (userId=${user.userId}, row=${row}): ${errorMessage(error)}`);
      const notice = describeFailure(error);
      if (row !== null) {
        await this.openMenu(user, row, null, notice);
      } else {
        await this.openDashboard(user, null, notice);
      }
      return;
    }
    await this.deps.states.set(user.userId, { mode: 'dialogue', row, dialogue });
  }

  private async openDialogue(kind: DialogueKind, binding: WizardBinding): Promise<ActiveDialogue> {
    const { engine, wizards } = this.deps;
    switch (kind) {
      case 'crew':
        return { kind, context: await engine.start(wizards.crew, binding) };
      case 'expenses':
        return { kind, context: await engine.start(wizards.expenses, binding) };
      case 'materials':
        return { kind, context: await engine.start(wizards.materials, binding) };
      case 'registration':
        return { kind, context: await engine.start(wizards.registration, binding) };
    }
  }

  private async openMenu(
    user: ChatUser,
    row: RowReference | null,
    previousMessageId: number | null,
    notice?: string,
  ): Promise<void> {
    const result = await this.deps.menu.render({ userId: user.userId, chatId: user.chatId, row, previousMessageId, notice });
    if (result.status === 'rendered') {
      await this.deps.states.set(user.userId, { mode: 'menu', row: result.row, screenId: result.messageId });
    } else if (result.status === 'failed' && row !== null) {
      await this.deps.states.set(user.userId, { mode: 'menu', row, screenId: previousMessageId });
    }
  }

  private async openDashboard(user: ChatUser, previousMessageId: number | null, notice?: string): Promise<void> {
    const result = await this.deps.dashboard.show(user, previousMessageId, notice);
    if (result.status === 'failed') {
      await this.deps.states.delete(user.userId);
      return;
    }
    await this.deps.states.set(user.userId, {
      mode: 'dashboard',
      screenId: result.messageId,
      registered: result.status === 'ready',
    });
  }

  // Reply-keyboard presses arrive as user messages; they are removed to keep one screen visible.
  private async discardUserMessage(event: ChatEvent): Promise<void> {
    if (event.kind === 'text' || event.kind === 'photo') {
      await deleteMessageQuietly(this.deps.chat, event.chatId, event.messageId);
    }
  }
}
