import { deleteMessageQuietly } from '../bot/chat/messageTracker.js';
import type { ChatPlatform, ChatUser } from '../bot/chat/types.js';
import { LABELS, SECTION_TITLES } from '../bot/labels.js';
import { describeFailure, errorMessage } from '../errors/userMessages.js';
import { shiftCloseCounter } from '../metrics/metrics.js';
import { SECTION_KEYS, type RowReference, type SectionKey, type ShiftProgress, type ShiftSummary } from '../types/shift.js';
import { displayDate, systemClock, type Clock } from '../utils/dates.js';
import logger from '../utils/logger.js';
import type { ShiftNotifier } from './notificationService.js';
import type { RecordStore } from './recordStore.js';
import type { ShiftSessionService } from './shiftSessionService.js';

export const CLOSE_ACTIONS = {
  confirm: 'close:confirm',
  cancel: 'close:cancel',
} as const;

export type CloseRequestResult =
  | { status: 'confirming'; messageId: number }
  | { status: 'incomplete'; remaining: SectionKey[] }
  | { status: 'already-closed' }
  | { status: 'failed' };

export type CloseCommitResult = { status: 'closed' } | { status: 'already-closed' } | { status: 'failed' };

export type ShiftCloseDependencies = {
  records: RecordStore;
  sessions: ShiftSessionService;
  notifier: ShiftNotifier;
  chat: ChatPlatform;
  clock?: Clock;
};

export const remainingSectionsText = (remaining: SectionKey[]): string =>
  `Not everything is filled yet: ${remaining.map((section) => SECTION_TITLES[section]).join(', ')}.`;

export class ShiftCloseService {
  private readonly clock: Clock;

  constructor(private readonly deps: ShiftCloseDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  async requestClose(user: ChatUser, row: RowReference): Promise<CloseRequestResult> {
    const { records, sessions, chat } = this.deps;
    let progress: ShiftProgress;
    try {
      const cached = await sessions.get(user.userId);
      progress = cached && cached.row === row ? cached : await records.readProgress(row);
    } catch (error) {
      logger.error(`[close] Failed to read progress (userId=${user.userId}, row=${row}): ${errorMessage(error)}`);
      await chat.send(user.chatId, describeFailure(error));
      return { status: 'failed' };
    }
    if (progress.closed) {
      return { status: 'already-closed' };
    }
    const remaining = SECTION_KEYS.filter((section) => !progress.sections[section]);
    if (remaining.length > 0) {
      return { status: 'incomplete', remaining };
    }
    const messageId = await chat.send(
      user.chatId,
      `🏁 Close the shift of ${displayDate(progress.shiftDate)}? The report goes to the coordinators and cannot be edited afterwards.`,
      {
        controls: {
          kind: 'inline',
          rows: [
            [{ text: LABELS.confirmClose, data: CLOSE_ACTIONS.confirm }],
            [{ text: LABELS.cancelClose, data: CLOSE_ACTIONS.cancel }],
          ],
        },
      },
    );
    return { status: 'confirming', messageId };
  }

  async confirmClose(user: ChatUser, row: RowReference, confirmMessageId: number | null): Promise<CloseCommitResult> {
    const { records, sessions, chat } = this.deps;
    if (confirmMessageId !== null) {
      await deleteMessageQuietly(chat, user.chatId, confirmMessageId);
    }
    let closedNow: boolean;
    try {
      const summary = await records.readSummary(row);
      closedNow = await this.commitClose(row, summary, user);
    } catch (error) {
      logger.error(`[close] Failed to close shift (userId=${user.userId}, row=${row}): ${errorMessage(error)}`);
      await chat.send(user.chatId, describeFailure(error));
      return { status: 'failed' };
    }
    await sessions.markClosed(user.userId);
    return closedNow ? { status: 'closed' } : { status: 'already-closed' };
  }

  /**
   * Writes the closed flag once. Returns true only for the call that closed the shift;
   * the group is notified on that call.
   */
  async commitClose(row: RowReference, summary: ShiftSummary, user: ChatUser): Promise<boolean> {
    const closedNow = await this.deps.records.markClosed(row, this.clock());
    shiftCloseCounter.inc({ outcome: closedNow ? 'closed' : 'already-closed' });
    if (!closedNow) {
      logger.info(`[close] Row ${row} was already closed (userId=${user.userId})`);
      return false;
    }
    logger.info(`[close] Row ${row} closed (userId=${user.userId})`);
    const brigadier = await this.resolveBrigadier(summary, user);
    await this.deps.notifier.notifyShiftClosed(summary, brigadier);
    return true;
  }

  private async resolveBrigadier(summary: ShiftSummary, user: ChatUser): Promise<string> {
    if (summary.brigadier) {
      return summary.brigadier;
    }
    try {
      const profile = await this.deps.records.findUser(user.userId);
      if (profile?.compactName) {
        return profile.compactName;
      }
    } catch (error) {
      logger.warn(`[close] Could not load profile of user ${user.userId}: ${errorMessage(error)}`);
    }
    return user.displayName ?? `id ${user.userId}`;
  }
}
