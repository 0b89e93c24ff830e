import { FakeChatPlatform } from '../../__tests__/support/fakeChatPlatform';
import type { ShiftSummary } from '../../types/shift';
import { formatShiftClosedMessage, ShiftNotifier } from '../notificationService';

const summary = (row = 5): ShiftSummary => ({
  row,
  shiftDate: '2026-10-19',
  userId: 42,
  brigadier: 'Petrov P.',
  expenses: {
    ship: 'Volga <7>',
    holds: 3,
    amounts: { transport: 1500, foreman: 0, workers: 3000, auxiliary: 0, food: 0, taxi: 0, other: 0 },
    total: 4500,
  },
  materials: { pvdMeters: 120, pvcTubes: 0, tape: 4, photosLink: 'https://files.example.test/f?a=1&b=2' },
  crew: { driver: 'Ivanov I.', workers: ['Sidorov S.', 'Orlov O.'] },
});

describe('formatShiftClosedMessage', () => {
  it('lists non-zero expenses, materials, photos and crew with escaped values', () => {
    expect(formatShiftClosedMessage(summary(), 'Petrov P.')).toBe(
      [
        '<b>✅ Shift closed</b>',
        '📅 19.10.2026',
        '👤 Brigadier: Petrov P.',
        '🚢 Ship: Volga &lt;7&gt; (holds: 3)',
        '',
        '💸 Expenses:',
        '• Transport (driver): 1 500 ₽',
        '• Workers: 3 000 ₽',
        '<b>Total: 4 500 ₽</b>',
        '',
        '📦 Materials: PVD 120 m; Tape 4 pcs',
        '🖼 <a href="https://files.example.test/f?a=1&amp;b=2">Photos</a>',
        '👥 Crew: Ivanov I., Sidorov S., Orlov O.',
      ].join('\n'),
    );
  });

  it('uses dashes for empty sections', () => {
    const empty: ShiftSummary = {
      ...summary(),
      expenses: {
        ship: null,
        holds: null,
        amounts: { transport: 0, foreman: 0, workers: 0, auxiliary: 0, food: 0, taxi: 0, other: 0 },
        total: 0,
      },
      materials: { pvdMeters: 0, pvcTubes: 0, tape: 0, photosLink: null },
      crew: { driver: null, workers: [] },
    };
    const lines = formatShiftClosedMessage(empty, 'id 42').split('\n');

    expect(lines).toContain('🚢 Ship: —');
    expect(lines).toContain('📦 Materials: —');
    expect(lines).toContain('👥 Crew: —');
    expect(lines[lines.indexOf('💸 Expenses:') + 1]).toBe('—');
  });
});

describe('ShiftNotifier', () => {
  const GROUP = -100500;

  it('posts once per row inside the dedupe window', async () => {
    const chat = new FakeChatPlatform();
    let now = Date.parse('2026-10-19T10:00:00Z');
    const notifier = new ShiftNotifier({ chat, groupChatId: GROUP, enabled: true, clock: () => new Date(now) });

    await expect(notifier.notifyShiftClosed(summary(), 'Petrov P.')).resolves.toBe(true);
    await expect(notifier.notifyShiftClosed(summary(), 'Petrov P.')).resolves.toBe(false);
    expect(chat.sent).toHaveLength(1);
    expect(chat.sent[0].chatId).toBe(GROUP);
    expect(chat.sent[0].options).toEqual({ format: 'html' });

    now += 10 * 60 * 1000;
    expect(notifier.wasNotifiedRecently(5)).toBe(false);
    await expect(notifier.notifyShiftClosed(summary(), 'Petrov P.')).resolves.toBe(true);
    expect(chat.sent).toHaveLength(2);
  });

  it('marks the row even when notifications are disabled', async () => {
    const chat = new FakeChatPlatform();
    const notifier = new ShiftNotifier({ chat, groupChatId: GROUP, enabled: false });

    await expect(notifier.notifyShiftClosed(summary(), 'Petrov P.')).resolves.toBe(false);
    expect(notifier.wasNotifiedRecently(5)).toBe(true);
    expect(chat.sent).toHaveLength(0);
  });

  it('skips without a group chat', async () => {
    const chat = new FakeChatPlatform();
    const notifier = new ShiftNotifier({ chat, groupChatId: null, enabled: true });

    await expect(notifier.notifyShiftClosed(summary(), 'Petrov P.')).resolves.toBe(false);
    expect(chat.sent).toHaveLength(0);
  });

  it('never throws when the group is unreachable', async () => {
    const chat = new FakeChatPlatform();
    chat.failSendsTo.add(GROUP);
    const notifier = new ShiftNotifier({ chat, groupChatId: GROUP, enabled: true });

    await expect(notifier.notifyShiftClosed(summary(7), 'Petrov P.')).resolves.toBe(false);
    expect(notifier.wasNotifiedRecently(7)).toBe(true);
  });
});
