import DialogueBindingError from '../../errors/DialogueBindingError.js';
import type { RecordStore } from '../../services/recordStore.js';
import { EXPENSE_KEYS, sumExpenses, type ExpenseAmounts, type ExpenseKey } from '../../types/shift.js';
import { HOLDS_MAX, HOLDS_MIN, parseAmount, parseHolds } from '../../utils/amountParser.js';
import { formatMoney } from '../../utils/formatters.js';
import { validateShipName } from '../../utils/names.js';
import { normalize, sameLabel } from '../../utils/textNormalizer.js';
import { EXPENSE_LABELS, LABELS, SECTION_TITLES, SKIP_TOKEN } from '../labels.js';
import type { StepDefinition, WizardDefinition } from '../wizard/types.js';
import { chunk } from './keyboards.js';

export type ExpensesFields = {
  ship: string | null;
  holds: number | null;
  amounts: Partial<ExpenseAmounts>;
  pendingShip: string | null;
};

export type ExpensesReferences = {
  ships: string[];
};

const SHIP_SUGGESTIONS = 12;

export const completeAmounts = (amounts: Partial<ExpenseAmounts>): ExpenseAmounts | null => {
  if (!EXPENSE_KEYS.every((key) => amounts[key] !== undefined)) {
    return null;
  }
  return {
    transport: amounts.transport ?? 0,
    foreman: amounts.foreman ?? 0,
    workers: amounts.workers ?? 0,
    auxiliary: amounts.auxiliary ?? 0,
    food: amounts.food ?? 0,
    taxi: amounts.taxi ?? 0,
    other: amounts.other ?? 0,
  };
};

const amountStep = (key: ExpenseKey): StepDefinition<ExpensesFields, ExpensesReferences> => ({
  id: key,
  render: () => ({
    text: `${EXPENSE_LABELS[key]}: enter the amount or press “${SKIP_TOKEN}”.`,
    controls: { kind: 'reply', rows: [[SKIP_TOKEN]] },
  }),
  handle: (input, fields) => {
    if (input.kind !== 'text') {
      return { type: 'reject', hint: 'Type the amount as digits.' };
    }
    const result = parseAmount(input.text, SKIP_TOKEN);
    if (!result.ok) {
      return { type: 'reject', hint: result.error.hint };
    }
    return { type: 'advance', fields: { ...fields, amounts: { ...fields.amounts, [key]: result.value } } };
  },
});

export const createExpensesWizard = (records: RecordStore): WizardDefinition<ExpensesFields, ExpensesReferences> => {
  const steps: StepDefinition<ExpensesFields, ExpensesReferences>[] = [
    {
      id: 'ship',
      render: (_fields, references) => ({
        text: 'Enter the ship name or pick one below.',
        controls: { kind: 'reply', rows: chunk(references.ships.slice(0, SHIP_SUGGESTIONS), 2) },
      }),
      handle: (input, fields, references) => {
        if (input.kind !== 'text') {
          return { type: 'reject', hint: 'Type the ship name.' };
        }
        const wanted = normalize(input.text);
        const known = references.ships.find((ship) => normalize(ship) === wanted);
        if (known) {
          return { type: 'advance', fields: { ...fields, ship: known, pendingShip: null } };
        }
        const result = validateShipName(input.text);
        if (!result.ok) {
          return { type: 'reject', hint: result.error.hint };
        }
        return { type: 'goto', stepId: 'newShip', fields: { ...fields, pendingShip: result.value } };
      },
    },
    {
      id: 'newShip',
      detour: true,
      backTo: () => 'ship',
      render: (fields) => ({
        text: `“${fields.pendingShip ?? ''}” is not in the list. Add it as a new ship?`,
        controls: { kind: 'reply', rows: [[LABELS.addShip]] },
      }),
      handle: async (input, fields, references) => {
        const name = fields.pendingShip;
        if (name === null) {
          return { type: 'goto', stepId: 'ship', fields };
        }
        if (input.kind !== 'text' || !sameLabel(input.text, LABELS.addShip)) {
          return { type: 'reject', hint: `Press “${LABELS.addShip}” or go back to type another name.` };
        }
        const status = await records.getStatus('ship', name);
        if (status === 'archived') {
          return {
            type: 'goto',
            stepId: 'ship',
            fields: { ...fields, pendingShip: null },
            notice: `“${name}” is in the archive. Contact the coordinator to restore it.`,
          };
        }
        if (status === null) {
          await records.addEntry('ship', name);
        }
        const ships = references.ships.some((ship) => normalize(ship) === normalize(name))
          ? references.ships
          : [...references.ships, name];
        return {
          type: 'advance',
          fields: { ...fields, ship: name, pendingShip: null },
          references: { ships },
          notice: status === null ? `Ship “${name}” added.` : undefined,
        };
      },
    },
    {
      id: 'holds',
      render: () => ({
        text: `How many holds were worked (${HOLDS_MIN}–${HOLDS_MAX})?`,
        controls: { kind: 'reply', rows: [['1', '2', '3', '4'], ['5', '6', '7']] },
      }),
      handle: (input, fields) => {
        if (input.kind !== 'text') {
          return { type: 'reject', hint: 'Choose a number on the keyboard.' };
        }
        const result = parseHolds(input.text);
        if (!result.ok) {
          return { type: 'reject', hint: result.error.hint };
        }
        return { type: 'advance', fields: { ...fields, holds: result.value } };
      },
    },
    ...EXPENSE_KEYS.map(amountStep),
  ];

  return {
    kind: 'expenses',
    parent: 'menu',
    requiresRow: true,
    intro: () =>
      `${SECTION_TITLES.expenses}\n\nShip, number of holds and seven amounts in whole rubles. Press “${SKIP_TOKEN}” for zero.`,
    initialFields: () => ({ ship: null, holds: null, amounts: {}, pendingShip: null }),
    loadReferences: async () => ({ ships: await records.listActive('ship') }),
    steps,
    review: (fields) => {
      const amounts = completeAmounts(fields.amounts);
      const lines = EXPENSE_KEYS.map((key) => `${EXPENSE_LABELS[key]}: ${formatMoney(fields.amounts[key] ?? 0)}`);
      return [
        SECTION_TITLES.expenses,
        '',
        `Ship: ${fields.ship ?? '—'}`,
        `Holds: ${fields.holds ?? '—'}`,
        ...lines,
        '',
        `Total: ${formatMoney(amounts ? sumExpenses(amounts) : 0)}`,
      ].join('\n');
    },
    missing: (fields) =>
      fields.ship === null || fields.holds === null || completeAmounts(fields.amounts) === null
        ? `Some answers are missing. Press “${LABELS.edit}” to fill them in.`
        : null,
    persist: async (fields, _references, binding) => {
      const amounts = completeAmounts(fields.amounts);
      if (binding.row === null) {
        throw new DialogueBindingError('Expenses save without a shift row');
      }
      if (fields.ship === null || fields.holds === null || amounts === null) {
        throw new Error('Expenses save with missing answers');
      }
      await records.writeSection(binding.row, {
        section: 'expenses',
        record: { ship: fields.ship, holds: fields.holds, amounts, total: sumExpenses(amounts) },
      });
    },
  };
};
