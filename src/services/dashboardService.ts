import { deleteMessageQuietly } from '../bot/chat/messageTracker.js';
import type { ChatPlatform, ChatUser } from '../bot/chat/types.js';
import { LABELS } from '../bot/labels.js';
import { describeFailure, errorMessage } from '../errors/userMessages.js';
import type { UserProfile } from '../types/directory.js';
import logger from '../utils/logger.js';
import type { RecordStore } from './recordStore.js';
import type { ShiftSessionService } from './shiftSessionService.js';

export type DashboardResult =
  | { status: 'ready'; messageId: number }
  | { status: 'unregistered'; messageId: number }
  | { status: 'archived'; messageId: number }
  | { status: 'failed' };

export class DashboardService {
  constructor(
    private readonly records: RecordStore,
    private readonly chat: ChatPlatform,
    private readonly sessions: ShiftSessionService,
  ) {}

  async show(user: ChatUser, previousMessageId: number | null, notice?: string): Promise<DashboardResult> {
    if (previousMessageId !== null) {
      await deleteMessageQuietly(this.chat, user.chatId, previousMessageId);
    }
    const prefix = notice ? `${notice}\n\n` : '';

    let profile: UserProfile | null;
    let closedToday = false;
    try {
      profile = await this.records.findUser(user.userId);
      if (profile && profile.status === 'active') {
        const row = await this.records.findRow(user.userId);
        if (row === null) {
          await this.sessions.reset(user.userId);
        } else {
          const session = await this.sessions.sync(user.userId, row, await this.records.readProgress(row));
          closedToday = session.closed;
        }
      }
    } catch (error) {
      logger.error(`[dashboard] Failed to load user ${user.userId}: ${errorMessage(error)}`);
      await this.chat.send(user.chatId, describeFailure(error));
      return { status: 'failed' };
    }

    if (!profile) {
      const messageId = await this.chat.send(
        user.chatId,
        `${prefix}👋 Welcome! You are not registered yet. Press “${LABELS.register}” to get started.`,
        { controls: { kind: 'reply', rows: [[LABELS.register]] } },
      );
      return { status: 'unregistered', messageId };
    }
    if (profile.status === 'archived') {
      const messageId = await this.chat.send(
        user.chatId,
        `${prefix}⛔ Your account is archived. Contact the coordinator.`,
        { controls: { kind: 'remove' } },
      );
      return { status: 'archived', messageId };
    }

    const lines = [`👋 Hello, ${profile.compactName}!`, `Closed shifts: ${profile.closedShifts}`];
    if (closedToday) {
      lines.push('', "🔒 Today's shift is closed. A new one opens tomorrow.");
    }
    const messageId = await this.chat.send(user.chatId, `${prefix}${lines.join('\n')}`, {
      controls: closedToday ? { kind: 'remove' } : { kind: 'reply', rows: [[LABELS.startShift]] },
    });
    return { status: 'ready', messageId };
  }
}
