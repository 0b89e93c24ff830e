export const SECTION_KEYS = ['crew', 'expenses', 'materials'] as const;

export type SectionKey = (typeof SECTION_KEYS)[number];

export type SectionFlags = Record<SectionKey, boolean>;

/** Row number in the shifts sheet. */
export type RowReference = number;

export const EXPENSE_KEYS = ['transport', 'foreman', 'workers', 'auxiliary', 'food', 'taxi', 'other'] as const;

export type ExpenseKey = (typeof EXPENSE_KEYS)[number];

export type ExpenseAmounts = Record<ExpenseKey, number>;

export type ShiftProgress = {
  shiftDate: string;
  sections: SectionFlags;
  closed: boolean;
};

export type CrewRecord = {
  driver: string;
  workers: string[];
};

export type ExpensesRecord = {
  ship: string;
  holds: number;
  amounts: ExpenseAmounts;
  total: number;
};

export type MaterialsRecord = {
  pvdMeters: number;
  pvcTubes: number;
  tape: number;
  photosLink: string;
};

export type SectionWrite =
  | { section: 'crew'; record: CrewRecord }
  | { section: 'expenses'; record: ExpensesRecord }
  | { section: 'materials'; record: MaterialsRecord };

export type ShiftSummary = {
  row: RowReference;
  shiftDate: string;
  userId: number | null;
  brigadier: string | null;
  expenses: {
    ship: string | null;
    holds: number | null;
    amounts: ExpenseAmounts;
    total: number;
  };
  materials: {
    pvdMeters: number;
    pvcTubes: number;
    tape: number;
    photosLink: string | null;
  };
  crew: {
    driver: string | null;
    workers: string[];
  };
};

export const sumExpenses = (amounts: ExpenseAmounts): number =>
  EXPENSE_KEYS.reduce((total, key) => total + amounts[key], 0);

export const emptyExpenseAmounts = (): ExpenseAmounts => ({
  transport: 0,
  foreman: 0,
  workers: 0,
  auxiliary: 0,
  food: 0,
  taxi: 0,
  other: 0,
});

export const allSectionsDone = (sections: SectionFlags): boolean => SECTION_KEYS.every((key) => sections[key]);
