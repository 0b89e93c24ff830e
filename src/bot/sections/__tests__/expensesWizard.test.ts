import { FakeChatPlatform } from '../../../__tests__/support/fakeChatPlatform';
import { FakeRecordStore } from '../../../__tests__/support/fakeRecordStore';
import { amountHint } from '../../../utils/amountParser';
import { ACTIONS, LABELS, SKIP_TOKEN } from '../../labels';
import type { WizardBinding, WizardContext, WizardInput } from '../../wizard/types';
import { WizardEngine } from '../../wizard/wizardEngine';
import { completeAmounts, createExpensesWizard, type ExpensesFields, type ExpensesReferences } from '../expensesWizard';

let nextMessageId = 2000;
const text = (value: string): WizardInput => {
  nextMessageId += 1;
  return { kind: 'text', text: value, messageId: nextMessageId };
};

describe('expenses wizard', () => {
  let chat: FakeChatPlatform;
  let records: FakeRecordStore;
  let engine: WizardEngine;
  let binding: WizardBinding;

  const openAtShipStep = async () => {
    const definition = createExpensesWizard(records);
    const context = await engine.start(definition, binding);
    await engine.handle(definition, context, { kind: 'action', data: ACTIONS.start, messageId: null }, binding.userId);
    return { definition, context };
  };

  const answer = async (
    definition: ReturnType<typeof createExpensesWizard>,
    context: WizardContext<ExpensesFields, ExpensesReferences>,
    values: string[],
  ) => {
    for (const value of values) {
      await engine.handle(definition, context, text(value), binding.userId);
    }
  };

  beforeEach(async () => {
    chat = new FakeChatPlatform();
    records = new FakeRecordStore();
    records.seedDirectory('ship', ['Volga']);
    engine = new WizardEngine(chat);
    binding = { userId: 3, chatId: 3, row: await records.openRow(3) };
  });

  it('totals the amounts on the review and stores them', async () => {
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['volga', '3', '1500', SKIP_TOKEN, '3000', SKIP_TOKEN, SKIP_TOKEN, SKIP_TOKEN, SKIP_TOKEN]);

    expect(context.position).toEqual({ kind: 'confirm' });
    const review = chat.lastSent().text.split('\n');
    expect(review).toContain('Ship: Volga');
    expect(review).toContain('Holds: 3');
    expect(review).toContain('Transport (driver): 1 500 ₽');
    expect(review).toContain('Total: 4 500 ₽');

    const turn = await engine.handle(definition, context, text(LABELS.confirm), binding.userId);

    expect(turn.status).toBe('saved');
    expect(records.writes).toEqual([
      {
        row: binding.row,
        write: {
          section: 'expenses',
          record: {
            ship: 'Volga',
            holds: 3,
            amounts: { transport: 1500, foreman: 0, workers: 3000, auxiliary: 0, food: 0, taxi: 0, other: 0 },
            total: 4500,
          },
        },
      },
    ]);
  });

  it('keeps the step and the answers on an invalid amount', async () => {
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['Volga', '2']);
    chat.clear();

    await answer(definition, context, ['1 500']);

    expect(context.position).toEqual({ kind: 'step', stepId: 'transport' });
    expect(context.fields.amounts).toEqual({});
    expect(chat.sent).toHaveLength(1);
    expect(chat.sent[0].text.startsWith(amountHint(SKIP_TOKEN))).toBe(true);
  });

  it('adds an unknown ship after confirmation', async () => {
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['neva']);
    expect(context.position).toEqual({ kind: 'step', stepId: 'newShip' });

    await answer(definition, context, [LABELS.addShip]);

    expect(records.addedEntries).toEqual([{ kind: 'ship', name: 'Neva' }]);
    expect(context.fields.ship).toBe('Neva');
    expect(context.references.ships).toEqual(['Volga', 'Neva']);
    expect(context.position).toEqual({ kind: 'step', stepId: 'holds' });
    expect(chat.lastSent().text.startsWith('Ship “Neva” added.')).toBe(true);
  });

  it('sends an archived ship back to the ship step', async () => {
    records.seedDirectory('ship', ['Neva'], 'archived');
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['Neva', LABELS.addShip]);

    expect(records.addedEntries).toEqual([]);
    expect(context.fields.ship).toBeNull();
    expect(context.position).toEqual({ kind: 'step', stepId: 'ship' });
  });

  it('skips the new ship step when going back from holds', async () => {
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['Volga', LABELS.back]);

    expect(context.position).toEqual({ kind: 'step', stepId: 'ship' });
  });

  it('rejects holds out of range', async () => {
    const { definition, context } = await openAtShipStep();
    await answer(definition, context, ['Volga', '9']);

    expect(context.fields.holds).toBeNull();
    expect(context.position).toEqual({ kind: 'step', stepId: 'holds' });
  });
});

describe('completeAmounts', () => {
  it('needs every amount', () => {
    expect(completeAmounts({ transport: 1 })).toBeNull();
    expect(
      completeAmounts({ transport: 1, foreman: 2, workers: 3, auxiliary: 4, food: 5, taxi: 6, other: 7 }),
    ).toEqual({ transport: 1, foreman: 2, workers: 3, auxiliary: 4, food: 5, taxi: 6, other: 7 });
  });
});
