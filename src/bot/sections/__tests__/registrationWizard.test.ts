import { FakeChatPlatform } from '../../../__tests__/support/fakeChatPlatform';
import { FakeRecordStore } from '../../../__tests__/support/fakeRecordStore';
import { DUPLICATE_TEXT } from '../../../errors/userMessages';
import { ACTIONS, LABELS, SKIP_TOKEN } from '../../labels';
import type { WizardInput } from '../../wizard/types';
import { WizardEngine } from '../../wizard/wizardEngine';
import { createRegistrationWizard } from '../registrationWizard';

let nextMessageId = 4000;
const text = (value: string): WizardInput => {
  nextMessageId += 1;
  return { kind: 'text', text: value, messageId: nextMessageId };
};

describe('registration wizard', () => {
  const register = async (records: FakeRecordStore, chat: FakeChatPlatform, userId: number, answers: string[]) => {
    const engine = new WizardEngine(chat);
    const definition = createRegistrationWizard(records);
    const binding = { userId, chatId: userId, row: null };
    const context = await engine.start(definition, binding);
    await engine.handle(definition, context, { kind: 'action', data: ACTIONS.start, messageId: null }, userId);
    for (const answer of answers) {
      await engine.handle(definition, context, text(answer), userId);
    }
    return { turn: await engine.handle(definition, context, text(LABELS.confirm), userId), context };
  };

  it('registers the user with title-cased names', async () => {
    const records = new FakeRecordStore();
    const chat = new FakeChatPlatform();

    const { turn } = await register(records, chat, 5, ['kozlov', 'kirill', SKIP_TOKEN]);

    expect(turn.status).toBe('saved');
    expect(records.users).toEqual([
      {
        userId: 5,
        lastName: 'Kozlov',
        firstName: 'Kirill',
        middleName: '',
        fullName: 'Kozlov Kirill',
        compactName: 'Kozlov K.',
        closedShifts: 0,
        status: 'active',
      },
    ]);
  });

  it('shows the review with the full name', async () => {
    const records = new FakeRecordStore();
    const chat = new FakeChatPlatform();
    const engine = new WizardEngine(chat);
    const definition = createRegistrationWizard(records);
    const context = await engine.start(definition, { userId: 6, chatId: 6, row: null });
    await engine.handle(definition, context, text(LABELS.start), 6);
    for (const answer of ['Orlova', 'Olga', 'Petrovna']) {
      await engine.handle(definition, context, text(answer), 6);
    }

    expect(chat.lastSent().text).toBe('📝 Registration\n\nName: Orlova Olga Petrovna\n\nSave these details?');
  });

  it('ends with a specific message when the account already exists', async () => {
    const records = new FakeRecordStore();
    records.seedUser(7, 'Petrov', 'Pavel');
    const chat = new FakeChatPlatform();

    const { turn } = await register(records, chat, 7, ['Petrov', 'Pavel', '-']);

    expect(turn).toEqual({ status: 'exited', destination: 'dashboard' });
    expect(chat.lastSent().text).toBe(DUPLICATE_TEXT['telegram-id']);
    expect(records.users).toHaveLength(1);
  });
});
