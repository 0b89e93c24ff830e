import DuplicateError from '../errors/DuplicateError.js';
import ExternalServiceError from '../errors/ExternalServiceError.js';
import { toServiceError } from '../errors/googleErrors.js';
import type { DirectoryKind, DirectoryStatus, Registration, UserProfile } from '../types/directory.js';
import {
  EXPENSE_KEYS,
  emptyExpenseAmounts,
  sumExpenses,
  type ExpenseAmounts,
  type RowReference,
  type SectionWrite,
  type ShiftProgress,
  type ShiftSummary,
} from '../types/shift.js';
import { shiftDateOf, systemClock, timestampOf, type Clock } from '../utils/dates.js';
import logger from '../utils/logger.js';
import { formatCompactName, formatFullName } from '../utils/names.js';
import { normalize } from '../utils/textNormalizer.js';
import type { RecordStore } from './recordStore.js';
import type { CellValue, SheetsGateway } from './sheetsGateway.js';

// Shifts sheet columns, one row per (user, date)
const SHIFT_COLUMNS = {
  date: 0,
  userId: 1,
  brigadier: 2,
  ship: 3,
  holds: 4,
  firstAmount: 5,
  total: 12,
  pvdMeters: 13,
  pvcTubes: 14,
  tape: 15,
  photosLink: 16,
  driver: 17,
  workers: 18,
  closedAt: 19,
} as const;

// Directory sheet: users in A–G, then one (name, status) column pair per kind.
// The lists sit side by side, so writes target cells directly; an append would land in the users block.
const DIRECTORY_COLUMNS: Record<DirectoryKind, { name: string; status: string }> = {
  ship: { name: 'H', status: 'I' },
  driver: { name: 'J', status: 'K' },
  worker: { name: 'L', status: 'M' },
};

const STATUS_ACTIVE = 'Active';

export type SheetsRecordStoreOptions = {
  gateway: SheetsGateway;
  shiftsSheet: string;
  directorySheet: string;
  timezone: string;
  clock?: Clock;
};

const isFilled = (value: CellValue | undefined): boolean =>
  value !== null && value !== undefined && String(value).trim().length > 0;

const text = (value: CellValue | undefined): string => (isFilled(value) ? String(value).trim() : '');

const toNumber = (value: CellValue | undefined): number => {
  if (typeof value === 'number') {
    return value;
  }
  const digits = text(value).replace(/\s/g, '').replace(',', '.');
  const parsed = Number.parseFloat(digits);
  return Number.isFinite(parsed) ? parsed : 0;
};

const statusOf = (value: CellValue | undefined): DirectoryStatus =>
  /^(archiv|архив)/i.test(text(value)) ? 'archived' : 'active';

// 0-based index of the last filled first cell, -1 when there is none
const lastFilledIndex = (rows: CellValue[][]): number => {
  for (let index = rows.length - 1; index >= 0; index -= 1) {
    if (isFilled(rows[index][0])) {
      return index;
    }
  }
  return -1;
};

export const rowOfRange = (range: string): number | null => {
  const match = /![A-Z]+(\d+)/.exec(range);
  return match ? Number.parseInt(match[1], 10) : null;
};

export class SheetsRecordStore implements RecordStore {
  private readonly gateway: SheetsGateway;
  private readonly clock: Clock;
  private readonly closedRows = new Set<RowReference>();

  constructor(private readonly options: SheetsRecordStoreOptions) {
    this.gateway = options.gateway;
    this.clock = options.clock ?? systemClock;
  }

  private shifts(range: string): string {
    return `'${this.options.shiftsSheet}'!${range}`;
  }

  private directory(range: string): string {
    return `'${this.options.directorySheet}'!${range}`;
  }

  private today(): string {
    return shiftDateOf(this.clock(), this.options.timezone);
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof DuplicateError) {
        throw error;
      }
      throw toServiceError(`sheets.${operation}`, error);
    }
  }

  private async readShiftRow(row: RowReference): Promise<CellValue[]> {
    const [cells] = await this.gateway.getValues(this.shifts(`A${row}:T${row}`));
    return cells ?? [];
  }

  findRow(userId: number): Promise<RowReference | null> {
    return this.call('findRow', async () => {
      const today = this.today();
      const rows = await this.gateway.getValues(this.shifts('A2:B'));
      for (let index = rows.length - 1; index >= 0; index -= 1) {
        const [date, owner] = rows[index];
        if (text(date) === today && text(owner) === String(userId)) {
          return index + 2;
        }
      }
      return null;
    });
  }

  openRow(userId: number): Promise<RowReference> {
    return this.call('openRow', async () => {
      const existing = await this.findRow(userId);
      if (existing !== null) {
        return existing;
      }
      const profile = await this.findUser(userId);
      const updatedRange = await this.gateway.appendValues(this.shifts('A:C'), [
        [this.today(), String(userId), profile?.compactName ?? ''],
      ]);
      const row = rowOfRange(updatedRange);
      if (row === null) {
        throw new ExternalServiceError('sheets.openRow', `Unexpected append range "${updatedRange}"`);
      }
      logger.info(`[sheets] Opened shift row ${row} for user ${userId}`);
      return row;
    });
  }

  readProgress(row: RowReference): Promise<ShiftProgress> {
    return this.call('readProgress', async () => {
      const cells = await this.readShiftRow(row);
      const filled = (from: number, to: number): boolean => {
        for (let index = from; index <= to; index += 1) {
          if (!isFilled(cells[index])) {
            return false;
          }
        }
        return true;
      };
      const closed = this.closedRows.has(row) || isFilled(cells[SHIFT_COLUMNS.closedAt]);
      return {
        shiftDate: text(cells[SHIFT_COLUMNS.date]),
        sections: {
          expenses: filled(SHIFT_COLUMNS.ship, SHIFT_COLUMNS.total),
          materials: filled(SHIFT_COLUMNS.pvdMeters, SHIFT_COLUMNS.photosLink),
          crew: filled(SHIFT_COLUMNS.driver, SHIFT_COLUMNS.workers),
        },
        closed,
      };
    });
  }

  readSummary(row: RowReference): Promise<ShiftSummary> {
    return this.call('readSummary', async () => {
      const cells = await this.readShiftRow(row);
      const amounts: ExpenseAmounts = emptyExpenseAmounts();
      EXPENSE_KEYS.forEach((key, offset) => {
        amounts[key] = toNumber(cells[SHIFT_COLUMNS.firstAmount + offset]);
      });
      const storedTotal = cells[SHIFT_COLUMNS.total];
      const ownerId = Number.parseInt(text(cells[SHIFT_COLUMNS.userId]), 10);
      return {
        row,
        shiftDate: text(cells[SHIFT_COLUMNS.date]),
        userId: Number.isFinite(ownerId) ? ownerId : null,
        brigadier: text(cells[SHIFT_COLUMNS.brigadier]) || null,
        expenses: {
          ship: text(cells[SHIFT_COLUMNS.ship]) || null,
          holds: isFilled(cells[SHIFT_COLUMNS.holds]) ? toNumber(cells[SHIFT_COLUMNS.holds]) : null,
          amounts,
          total: isFilled(storedTotal) ? toNumber(storedTotal) : sumExpenses(amounts),
        },
        materials: {
          pvdMeters: toNumber(cells[SHIFT_COLUMNS.pvdMeters]),
          pvcTubes: toNumber(cells[SHIFT_COLUMNS.pvcTubes]),
          tape: toNumber(cells[SHIFT_COLUMNS.tape]),
          photosLink: text(cells[SHIFT_COLUMNS.photosLink]) || null,
        },
        crew: {
          driver: text(cells[SHIFT_COLUMNS.driver]) || null,
          workers: text(cells[SHIFT_COLUMNS.workers])
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0),
        },
      };
    });
  }

  writeSection(row: RowReference, write: SectionWrite): Promise<void> {
    return this.call(`writeSection:${write.section}`, async () => {
      switch (write.section) {
        case 'crew':
          await this.gateway.batchUpdateValues([
            { range: this.shifts(`R${row}:S${row}`), values: [[write.record.driver, write.record.workers.join(', ')]] },
          ]);
          break;
        case 'expenses': {
          const { ship, holds, amounts, total } = write.record;
          await this.gateway.batchUpdateValues([
            {
              range: this.shifts(`D${row}:M${row}`),
              values: [[ship, holds, ...EXPENSE_KEYS.map((key) => amounts[key]), total]],
            },
          ]);
          break;
        }
        case 'materials': {
          const { pvdMeters, pvcTubes, tape, photosLink } = write.record;
          await this.gateway.batchUpdateValues([
            { range: this.shifts(`N${row}:Q${row}`), values: [[pvdMeters, pvcTubes, tape, photosLink]] },
          ]);
          break;
        }
      }
      logger.info(`[sheets] Saved ${write.section} for row ${row}`);
    });
  }

  markClosed(row: RowReference, closedAt: Date): Promise<boolean> {
    return this.call('markClosed', async () => {
      if (this.closedRows.has(row)) {
        return false;
      }
      const cells = await this.readShiftRow(row);
      if (isFilled(cells[SHIFT_COLUMNS.closedAt])) {
        this.closedRows.add(row);
        return false;
      }
      await this.gateway.batchUpdateValues([
        { range: this.shifts(`T${row}`), values: [[timestampOf(closedAt, this.options.timezone)]] },
      ]);
      this.closedRows.add(row);

      const ownerId = text(cells[SHIFT_COLUMNS.userId]);
      if (ownerId) {
        await this.incrementClosedShifts(ownerId);
      }
      return true;
    });
  }

  private async incrementClosedShifts(ownerId: string): Promise<void> {
    try {
      const users = await this.gateway.getValues(this.directory('A2:G'));
      const index = users.findIndex((cells) => text(cells[0]) === ownerId);
      if (index < 0) {
        return;
      }
      const row = index + 2;
      const current = toNumber(users[index][5]);
      await this.gateway.batchUpdateValues([{ range: this.directory(`F${row}`), values: [[current + 1]] }]);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`[sheets] Shift closed but the counter of user ${ownerId} was not updated: ${message}`);
    }
  }

  private async readDirectory(kind: DirectoryKind): Promise<Array<{ name: string; status: DirectoryStatus }>> {
    const columns = DIRECTORY_COLUMNS[kind];
    const rows = await this.gateway.getValues(this.directory(`${columns.name}2:${columns.status}`));
    return rows
      .map(([name, status]) => ({ name: text(name), status: statusOf(status) }))
      .filter((entry) => entry.name.length > 0);
  }

  listActive(kind: DirectoryKind): Promise<string[]> {
    return this.call(`listActive:${kind}`, async () => {
      const seen = new Set<string>();
      const names: string[] = [];
      for (const entry of await this.readDirectory(kind)) {
        const key = normalize(entry.name);
        if (entry.status === 'archived' || seen.has(key)) {
          continue;
        }
        seen.add(key);
        names.push(entry.name);
      }
      return names;
    });
  }

  addEntry(kind: DirectoryKind, name: string): Promise<void> {
    return this.call(`addEntry:${kind}`, async () => {
      const columns = DIRECTORY_COLUMNS[kind];
      const names = await this.gateway.getValues(this.directory(`${columns.name}2:${columns.name}`));
      const row = lastFilledIndex(names) + 3;
      await this.gateway.batchUpdateValues([
        { range: this.directory(`${columns.name}${row}:${columns.status}${row}`), values: [[name, STATUS_ACTIVE]] },
      ]);
      logger.info(`[sheets] Added ${kind} "${name}" to the directory`);
    });
  }

  getStatus(kind: DirectoryKind, name: string): Promise<DirectoryStatus | null> {
    return this.call(`getStatus:${kind}`, async () => {
      const wanted = normalize(name);
      const matches = (await this.readDirectory(kind)).filter((entry) => normalize(entry.name) === wanted);
      if (matches.length === 0) {
        return null;
      }
      return matches.some((entry) => entry.status === 'active') ? 'active' : 'archived';
    });
  }

  private toProfile(cells: CellValue[]): UserProfile {
    const lastName = text(cells[1]);
    const firstName = text(cells[2]);
    const middleName = text(cells[3]);
    return {
      userId: Number.parseInt(text(cells[0]), 10),
      lastName,
      firstName,
      middleName,
      fullName: formatFullName(lastName, firstName, middleName),
      compactName: text(cells[4]) || formatCompactName(lastName, firstName, middleName),
      closedShifts: toNumber(cells[5]),
      status: statusOf(cells[6]),
    };
  }

  findUser(userId: number): Promise<UserProfile | null> {
    return this.call('findUser', async () => {
      const users = await this.gateway.getValues(this.directory('A2:G'));
      const cells = users.find((candidate) => text(candidate[0]) === String(userId));
      return cells ? this.toProfile(cells) : null;
    });
  }

  registerUser(registration: Registration): Promise<UserProfile> {
    return this.call('registerUser', async () => {
      const rows = await this.gateway.getValues(this.directory('A2:G'));
      const users = rows.filter((cells) => isFilled(cells[0])).map((cells) => this.toProfile(cells));

      const existing = users.find((profile) => profile.userId === registration.userId);
      if (existing) {
        throw existing.status === 'archived'
          ? new DuplicateError('archived', `User ${registration.userId} is archived`)
          : new DuplicateError('telegram-id', `User ${registration.userId} is already registered`);
      }

      const fullName = formatFullName(registration.lastName, registration.firstName, registration.middleName);
      const sameName = users.find(
        (profile) => profile.status === 'active' && normalize(profile.fullName) === normalize(fullName),
      );
      if (sameName) {
        throw new DuplicateError('full-name', `"${fullName}" is already registered by user ${sameName.userId}`);
      }

      const compactName = formatCompactName(registration.lastName, registration.firstName, registration.middleName);
      const row = lastFilledIndex(rows) + 3;
      await this.gateway.batchUpdateValues([
        {
          range: this.directory(`A${row}:G${row}`),
          values: [
            [
              String(registration.userId),
              registration.lastName,
              registration.firstName,
              registration.middleName,
              compactName,
              0,
              STATUS_ACTIVE,
            ],
          ],
        },
      ]);
      logger.info(`[sheets] Registered user ${registration.userId} as ${compactName}`);
      return {
        userId: registration.userId,
        lastName: registration.lastName,
        firstName: registration.firstName,
        middleName: registration.middleName,
        fullName,
        compactName,
        closedShifts: 0,
        status: 'active',
      };
    });
  }
}
