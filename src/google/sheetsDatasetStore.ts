import type { sheets_v4 } from 'googleapis';
import type { DatasetStore, ValueInputOption } from '../stores/types.js';
import type { CellValue } from '../types.js';
import { withRetry, type RetryOptions } from './retry.js';

export function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value === null || value === undefined) return '';
  return String(value);
}

export class SheetsDatasetStore implements DatasetStore {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    private readonly retry: RetryOptions = {}
  ) {}

  async read(range: string): Promise<CellValue[][]> {
    const res = await withRetry(
      () =>
        this.sheets.spreadsheets.values.get({
          spreadsheetId: this.spreadsheetId,
          range,
          valueRenderOption: 'UNFORMATTED_VALUE',
          dateTimeRenderOption: 'FORMATTED_STRING'
        }),
      this.retry
    );
    const values: unknown[][] = res.data.values ?? [];
    return values.map(row => row.map(toCellValue));
  }

  async append(range: string, rows: CellValue[][], valueInputOption: ValueInputOption = 'USER_ENTERED'): Promise<void> {
    if (rows.length === 0) return;
    await withRetry(
      () =>
        this.sheets.spreadsheets.values.append({
          spreadsheetId: this.spreadsheetId,
          range,
          valueInputOption,
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: rows }
        }),
      this.retry
    );
  }

  async update(range: string, rows: CellValue[][], valueInputOption: ValueInputOption = 'RAW'): Promise<void> {
    await withRetry(
      () =>
        this.sheets.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range,
          valueInputOption,
          requestBody: { values: rows }
        }),
      this.retry
    );
  }

  async clear(range: string): Promise<void> {
    await withRetry(
      () =>
        this.sheets.spreadsheets.values.clear({
          spreadsheetId: this.spreadsheetId,
          range,
          requestBody: {}
        }),
      this.retry
    );
  }
}
