/**
 * Appends parsed rows to the dataset sheet, aligned to its header.
 *
 * The header is read once per run and kept in step with what this appender
 * writes. Into an empty sheet the incoming columns become the header. For an
 * existing header, each incoming column is placed in the header column that
 * the dataset indexes would read it back from: anchored columns (the key and
 * source columns) through the same substring match the indexes use, the rest
 * by case-insensitive name. Columns with no home are added to the header row
 * before the rows go in.
 */

import { cellText } from '../cells.js';
import { locateColumn } from '../index/datasetIndexes.js';
import type { Logger } from '../logger.js';
import type { DatasetStore } from '../stores/types.js';
import type { CellValue, DatasetRow } from '../types.js';
import { sheetRange } from './ranges.js';

/** Incoming column name to the needle its header column is located by. */
export type ColumnAnchors = ReadonlyMap<string, string>;

export interface Placement {
  /** Incoming column written at each header position, if any. */
  slots: (string | undefined)[];
  missing: string[];
}

export class DatasetAppender {
  private header: string[] | null = null;

  constructor(
    private readonly store: DatasetStore,
    private readonly sheetName: string,
    private readonly logger: Logger
  ) {}

  async getHeader(): Promise<string[]> {
    if (this.header) return this.header;
    try {
      const values = await this.store.read(sheetRange(this.sheetName, '1:1'));
      const first = values[0] ?? [];
      let end = first.length;
      while (end > 0 && cellText(first[end - 1]) === '') end--;
      this.header = first.slice(0, end).map(cell => cellText(cell));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not read header of sheet "${this.sheetName}", treating it as empty: ${message}`);
      this.header = [];
    }
    return this.header;
  }

  /**
   * Append `rows` (keyed by `columns`) and return how many were written.
   */
  async append(columns: string[], rows: DatasetRow[], anchors: ColumnAnchors = new Map()): Promise<number> {
    if (rows.length === 0) return 0;
    const header = await this.getHeader();

    if (header.length === 0) {
      const values: CellValue[][] = [columns, ...rows.map(row => project(row, columns))];
      await this.store.append(sheetRange(this.sheetName, 'A1'), values, 'USER_ENTERED');
      this.header = [...columns];
      return rows.length;
    }

    const { slots, missing } = placeColumns(header, columns, anchors);
    if (missing.length > 0) {
      const target = [...header, ...missing];
      await this.store.update(sheetRange(this.sheetName, 'A1'), [target], 'RAW');
      this.header = target;
      slots.push(...missing);
      this.logger.info(`Added ${missing.length} new column(s) to "${this.sheetName}": ${missing.join(', ')}`);
    }

    await this.store.append(
      sheetRange(this.sheetName, 'A1'),
      rows.map(row => project(row, slots)),
      'USER_ENTERED'
    );
    return rows.length;
  }
}

/**
 * Map incoming columns onto header positions. Anchored columns claim their
 * positions first; a position is never claimed twice.
 */
export function placeColumns(header: string[], columns: string[], anchors: ColumnAnchors): Placement {
  const slots: (string | undefined)[] = header.map(() => undefined);
  const claim = (column: string, index: number): boolean => {
    if (index < 0 || slots[index] !== undefined) return false;
    slots[index] = column;
    return true;
  };

  const unplaced: string[] = [];
  for (const column of columns) {
    const needle = anchors.get(column);
    if (needle === undefined || !claim(column, locateColumn(header, needle))) unplaced.push(column);
  }

  const missing: string[] = [];
  for (const column of unplaced) {
    const wanted = column.toLowerCase();
    const index = header.findIndex((name, i) => slots[i] === undefined && name.toLowerCase() === wanted);
    if (!claim(column, index)) missing.push(column);
  }
  return { slots, missing };
}

function project(row: DatasetRow, slots: (string | undefined)[]): CellValue[] {
  return slots.map(column => (column === undefined ? '' : row[column] ?? ''));
}
