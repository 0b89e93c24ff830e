import { deleteMessageQuietly } from '../bot/chat/messageTracker.js';
import type { ChatControls, ChatPlatform } from '../bot/chat/types.js';
import { LABELS, SECTION_TITLES } from '../bot/labels.js';
import { describeFailure, errorMessage } from '../errors/userMessages.js';
import { SECTION_KEYS, allSectionsDone, type RowReference, type SectionKey } from '../types/shift.js';
import { displayDate } from '../utils/dates.js';
import logger from '../utils/logger.js';
import { normalize, sameLabel } from '../utils/textNormalizer.js';
import type { RecordStore } from './recordStore.js';
import type { ShiftSession, ShiftSessionService } from './shiftSessionService.js';
import type { UserLockService } from './userLockService.js';

export const BUSY_TEXT = '⏳ The previous action is still running. Try again in a few seconds.';

const BADGE_DONE = '✅ done';
const BADGE_PENDING = '✍️ to fill';

export type MenuRenderRequest = {
  userId: number;
  chatId: number;
  row?: RowReference | null;
  previousMessageId?: number | null;
  notice?: string;
};

export type MenuRenderResult =
  | { status: 'rendered'; row: RowReference; messageId: number; session: ShiftSession }
  | { status: 'busy' }
  | { status: 'failed' };

export type MenuChoice = { kind: 'section'; section: SectionKey } | { kind: 'finish' } | { kind: 'dashboard' };

export const sectionButton = (section: SectionKey, done: boolean): string =>
  `${SECTION_TITLES[section]} · ${done ? BADGE_DONE : BADGE_PENDING}`;

export const canFinish = (session: ShiftSession): boolean => allSectionsDone(session.sections) && !session.closed;

export const menuControls = (session: ShiftSession): ChatControls => {
  const rows = SECTION_KEYS.map((section) => [sectionButton(section, session.sections[section])]);
  if (canFinish(session)) {
    rows.push([LABELS.finishShift]);
  }
  rows.push([LABELS.dashboard]);
  return { kind: 'reply', rows };
};

export const menuText = (session: ShiftSession): string => {
  const lines = [
    `🗓 Shift of ${displayDate(session.shiftDate)}`,
    '',
    ...SECTION_KEYS.map((section) => `${SECTION_TITLES[section]}: ${session.sections[section] ? BADGE_DONE : BADGE_PENDING}`),
  ];
  if (session.closed) {
    lines.push('', '🔒 This shift is closed.');
  } else if (allSectionsDone(session.sections)) {
    lines.push('', `All sections are filled. Press “${LABELS.finishShift}” to close the shift.`);
  }
  return lines.join('\n');
};

// Section buttons carry a status badge, so they are matched by their title prefix.
export const parseMenuChoice = (text: string): MenuChoice | null => {
  if (sameLabel(text, LABELS.finishShift)) {
    return { kind: 'finish' };
  }
  if (sameLabel(text, LABELS.dashboard)) {
    return { kind: 'dashboard' };
  }
  const typed = normalize(text);
  const section = SECTION_KEYS.find((key) => typed.startsWith(normalize(SECTION_TITLES[key])));
  return section ? { kind: 'section', section } : null;
};

export type ShiftMenuDependencies = {
  records: RecordStore;
  sessions: ShiftSessionService;
  locks: UserLockService;
  chat: ChatPlatform;
};

/** Badges come from the cached shift session; storage is read only when the cache holds another row. */
export class ShiftMenuService {
  constructor(private readonly deps: ShiftMenuDependencies) {}

  async render(request: MenuRenderRequest): Promise<MenuRenderResult> {
    const { records, sessions, locks, chat } = this.deps;
    const { userId, chatId } = request;

    let row = request.row ?? null;
    if (row === null) {
      const token = locks.tryAcquire(userId);
      if (!token) {
        await chat.send(chatId, BUSY_TEXT);
        return { status: 'busy' };
      }
      try {
        row = await records.openRow(userId);
      } catch (error) {
        logger.error(`[menu] Failed to open shift row (userId=${userId}): ${errorMessage(error)}`);
        await chat.send(chatId, describeFailure(error));
        return { status: 'failed' };
      } finally {
        locks.release(token);
      }
    }

    let session: ShiftSession;
    try {
      const cached = await sessions.get(userId);
      session =
        cached && cached.row === row ? cached : await sessions.sync(userId, row, await records.readProgress(row));
    } catch (error) {
      logger.error(`[menu] Failed to read shift progress (userId=${userId}, row=${row}): ${errorMessage(error)}`);
      await chat.send(chatId, describeFailure(error));
      return { status: 'failed' };
    }

    if (request.previousMessageId) {
      await deleteMessageQuietly(chat, chatId, request.previousMessageId);
    }
    const text = request.notice ? `${request.notice}\n\n${menuText(session)}` : menuText(session);
    const messageId = await chat.send(chatId, text, { controls: menuControls(session) });
    return { status: 'rendered', row, messageId, session };
  }
}
