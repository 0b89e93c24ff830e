import type { CellValue, SheetsGateway, ValueRangeUpdate } from '../../services/sheetsGateway';

type Grid = CellValue[][];

type ParsedRange = { sheet: string; firstColumn: number; lastColumn: number; firstRow: number; lastRow: number | null };

const columnIndex = (letters: string): number =>
  letters.split('').reduce((total, letter) => total * 26 + (letter.charCodeAt(0) - 64), 0) - 1;

const columnLetter = (index: number): string => String.fromCharCode(65 + index);

// Handles the shapes the record store sends: 'Sheet'!A2:B, 'Sheet'!A5:T5, 'Sheet'!T5, 'Sheet'!A:G
export const parseRange = (range: string): ParsedRange => {
  const match = /^'(.+)'!([A-Z]+)(\d*)(?::([A-Z]+)(\d*))?$/.exec(range);
  if (!match) {
    throw new Error(`unsupported range ${range}`);
  }
  const [, sheet, fromColumn, fromRow, toColumn, toRow] = match;
  const firstRow = fromRow ? Number.parseInt(fromRow, 10) : 1;
  let lastRow: number | null = null;
  if (toColumn === undefined) {
    lastRow = firstRow;
  } else if (toRow) {
    lastRow = Number.parseInt(toRow, 10);
  }
  return {
    sheet,
    firstColumn: columnIndex(fromColumn),
    lastColumn: columnIndex(toColumn ?? fromColumn),
    firstRow,
    lastRow,
  };
};

/** In-memory spreadsheet: one grid per sheet, rows and columns 1-based like A1 notation. */
export class FakeSheetsGateway implements SheetsGateway {
  sheets = new Map<string, Grid>();
  updates: ValueRangeUpdate[] = [];
  appends: Array<{ range: string; values: CellValue[][] }> = [];

  seed(sheet: string, rows: CellValue[][]): void {
    this.sheets.set(sheet, rows.map((row) => [...row]));
  }

  grid(sheet: string): Grid {
    let grid = this.sheets.get(sheet);
    if (!grid) {
      grid = [];
      this.sheets.set(sheet, grid);
    }
    return grid;
  }

  cell(sheet: string, a1: string): CellValue | undefined {
    const { firstColumn, firstRow } = parseRange(`'${sheet}'!${a1}`);
    return this.grid(sheet)[firstRow - 1]?.[firstColumn];
  }

  async getValues(range: string): Promise<CellValue[][]> {
    const parsed = parseRange(range);
    const grid = this.grid(parsed.sheet);
    const lastRow = parsed.lastRow ?? grid.length;
    const rows: CellValue[][] = [];
    for (let row = parsed.firstRow; row <= lastRow; row += 1) {
      const cells = grid[row - 1] ?? [];
      rows.push(cells.slice(parsed.firstColumn, parsed.lastColumn + 1).map((value) => value ?? ''));
    }
    return rows;
  }

  async batchUpdateValues(data: ValueRangeUpdate[]): Promise<void> {
    for (const update of data) {
      this.updates.push(update);
      const parsed = parseRange(update.range);
      const grid = this.grid(parsed.sheet);
      update.values.forEach((values, offset) => {
        const index = parsed.firstRow - 1 + offset;
        while (grid.length <= index) {
          grid.push([]);
        }
        values.forEach((value, column) => {
          grid[index][parsed.firstColumn + column] = value;
        });
      });
    }
  }

  // Like the API on a sheet holding one table: the row after the last row with any filled cell
  async appendValues(range: string, values: CellValue[][]): Promise<string> {
    this.appends.push({ range, values });
    const parsed = parseRange(range);
    const grid = this.grid(parsed.sheet);
    let lastFilled = 0;
    grid.forEach((cells, index) => {
      if (cells.some((value) => value !== undefined && value !== null && value !== '')) {
        lastFilled = index + 1;
      }
    });
    const firstRow = lastFilled + 1;
    await this.batchUpdateValues([
      { range: `'${parsed.sheet}'!${columnLetter(parsed.firstColumn)}${firstRow}`, values },
    ]);
    this.updates.pop();
    const lastColumn = columnLetter(parsed.firstColumn + (values[0]?.length ?? 1) - 1);
    return `'${parsed.sheet}'!${columnLetter(parsed.firstColumn)}${firstRow}:${lastColumn}${firstRow + values.length - 1}`;
  }
}
