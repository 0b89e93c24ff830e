import { google, type Auth } from 'googleapis';
import { withGoogleRetry } from '../utils/googleRetry.js';

export type CellValue = string | number | boolean | null;

export type ValueRangeUpdate = {
  range: string;
  values: CellValue[][];
};

/** The slice of the Sheets values API the record store uses. */
export interface SheetsGateway {
  getValues(range: string): Promise<CellValue[][]>;
  batchUpdateValues(data: ValueRangeUpdate[]): Promise<void>;
  /** Appends below the table found in `range`; returns the A1 range that was written. */
  appendValues(range: string, values: CellValue[][]): Promise<string>;
}

export const createSheetsGateway = (spreadsheetId: string, auth: Auth.JWT): SheetsGateway => {
  const sheets = google.sheets({ version: 'v4', auth });
  return {
    async getValues(range) {
      const response = await withGoogleRetry(`values.get ${range}`, () =>
        sheets.spreadsheets.values.get({ spreadsheetId, range, valueRenderOption: 'UNFORMATTED_VALUE' }),
      );
      return response.data.values ?? [];
    },
    async batchUpdateValues(data) {
      await withGoogleRetry(`values.batchUpdate ${data.map((entry) => entry.range).join(',')}`, () =>
        sheets.spreadsheets.values.batchUpdate({
          spreadsheetId,
          requestBody: { valueInputOption: 'RAW', data },
        }),
      );
    },
    async appendValues(range, values) {
      const response = await withGoogleRetry(`values.append ${range}`, () =>
        sheets.spreadsheets.values.append({
          spreadsheetId,
          range,
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values },
        }),
      );
      return response.data.updates?.updatedRange ?? '';
    },
  };
};
