import type { ExpenseKey } from '../types/shift.js';

// Button captions. Typed text is matched against them through normalize().
export const LABELS = {
  back: '⬅️ Back',
  menu: '📋 Shift menu',
  home: '🏠 Home',
  start: '▶️ Start',
  confirm: '✅ Confirm',
  edit: '✏️ Edit',
  skip: 'Skip',
  done: '➡️ Done',
  deleteLastPhoto: '🗑 Delete last photo',
  addShip: '➕ Add ship',
  register: '📝 Register',
  startShift: '🚀 Start shift',
  finishShift: '🏁 Finish shift',
  dashboard: '🏠 Back to dashboard',
  confirmClose: '✅ Close shift',
  cancelClose: '↩️ Not yet',
} as const;

export const SKIP_TOKEN = LABELS.skip;

export const ACTIONS = {
  back: 'nav:back',
  menu: 'nav:menu',
  home: 'nav:home',
  start: 'wizard:start',
  confirm: 'wizard:confirm',
  edit: 'wizard:edit',
} as const;

export const SECTION_TITLES = {
  crew: '👥 Crew',
  expenses: '💸 Expenses',
  materials: '📦 Materials',
} as const;

export const EXPENSE_LABELS: Record<ExpenseKey, string> = {
  transport: 'Transport (driver)',
  foreman: 'Foreman (yourself)',
  workers: 'Workers',
  auxiliary: 'Auxiliary staff',
  food: 'Food',
  taxi: 'Taxi',
  other: 'Other',
};
