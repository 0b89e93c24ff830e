import { FakeChatPlatform } from '../../__tests__/support/fakeChatPlatform';
import { FakeRecordStore } from '../../__tests__/support/fakeRecordStore';
import type { ChatUser } from '../../bot/chat/types';
import { ShiftNotifier } from '../notificationService';
import { InMemorySessionStore } from '../sessionStore';
import { CLOSE_ACTIONS, ShiftCloseService } from '../shiftCloseService';
import { ShiftSessionService, type ShiftSession } from '../shiftSessionService';

const GROUP = -100500;
const user: ChatUser = { userId: 1, chatId: 1, displayName: 'Pavel' };

describe('ShiftCloseService', () => {
  let chat: FakeChatPlatform;
  let records: FakeRecordStore;
  let sessions: ShiftSessionService;
  let close: ShiftCloseService;
  let row: number;

  const fillAllSections = async () => {
    await records.writeSection(row, { section: 'crew', record: { driver: 'Ivanov I.', workers: ['Orlov O.'] } });
    await records.writeSection(row, {
      section: 'expenses',
      record: {
        ship: 'Volga',
        holds: 2,
        amounts: { transport: 1000, foreman: 0, workers: 0, auxiliary: 0, food: 0, taxi: 0, other: 0 },
        total: 1000,
      },
    });
    await records.writeSection(row, {
      section: 'materials',
      record: { pvdMeters: 10, pvcTubes: 0, tape: 0, photosLink: 'https://files.example.test/f' },
    });
  };

  beforeEach(async () => {
    chat = new FakeChatPlatform();
    records = new FakeRecordStore();
    sessions = new ShiftSessionService(new InMemorySessionStore<ShiftSession>());
    const notifier = new ShiftNotifier({ chat, groupChatId: GROUP, enabled: true });
    close = new ShiftCloseService({ records, sessions, notifier, chat, clock: () => new Date('2026-10-19T15:00:00Z') });
    row = await records.openRow(1);
  });

  it('lists the sections that are still missing', async () => {
    await records.writeSection(row, { section: 'crew', record: { driver: 'Ivanov I.', workers: ['Orlov O.'] } });

    await expect(close.requestClose(user, row)).resolves.toEqual({
      status: 'incomplete',
      remaining: ['expenses', 'materials'],
    });
    expect(chat.sent).toHaveLength(0);
  });

  it('asks for confirmation with inline buttons', async () => {
    await fillAllSections();

    const result = await close.requestClose(user, row);

    expect(result).toEqual({ status: 'confirming', messageId: chat.lastSent().messageId });
    expect(chat.lastSent().options?.controls).toEqual({
      kind: 'inline',
      rows: [
        [{ text: '✅ Close shift', data: CLOSE_ACTIONS.confirm }],
        [{ text: '↩️ Not yet', data: CLOSE_ACTIONS.cancel }],
      ],
    });
  });

  it('takes the finish guard from the shift session', async () => {
    await sessions.sync(1, row, {
      shiftDate: '2026-10-19',
      sections: { crew: true, expenses: true, materials: true },
      closed: false,
    });
    const readProgress = jest.spyOn(records, 'readProgress');

    await expect(close.requestClose(user, row)).resolves.toMatchObject({ status: 'confirming' });

    expect(readProgress).not.toHaveBeenCalled();
    expect(chat.lastSent().text.startsWith('🏁 Close the shift of 19.10.2026?')).toBe(true);
  });

  it('commits once and notifies the group once', async () => {
    await fillAllSections();
    const summary = await records.readSummary(row);

    await expect(close.commitClose(row, summary, user)).resolves.toBe(true);
    await expect(close.commitClose(row, summary, user)).resolves.toBe(false);

    const groupMessages = chat.sent.filter((message) => message.chatId === GROUP);
    expect(groupMessages).toHaveLength(1);
    expect(groupMessages[0].text.split('\n')[2]).toBe('👤 Brigadier: Pavel');
    expect(records.rows.get(row)?.closedAt).toEqual(new Date('2026-10-19T15:00:00Z'));
  });

  it('prefers the stored brigadier name', async () => {
    records.seedUser(2, 'Petrov', 'Pavel');
    const ownRow = await records.openRow(2);
    const summary = await records.readSummary(ownRow);

    await close.commitClose(ownRow, summary, { userId: 2, chatId: 2, displayName: 'pasha' });

    expect(chat.lastSent().text.split('\n')[2]).toBe('👤 Brigadier: Petrov P.');
  });

  it('closes on confirm, removes the question and marks the session', async () => {
    await fillAllSections();
    await sessions.sync(1, row, await records.readProgress(row));

    await expect(close.confirmClose(user, row, 77)).resolves.toEqual({ status: 'closed' });
    await expect(close.confirmClose(user, row, null)).resolves.toEqual({ status: 'already-closed' });

    expect(chat.deleted).toEqual([77]);
    await expect(sessions.get(1)).resolves.toMatchObject({ closed: true });
    await expect(close.requestClose(user, row)).resolves.toEqual({ status: 'already-closed' });
  });
});
