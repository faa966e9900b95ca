import { isBlank } from '../cells.js';
import type { CellValue, DatasetRow, ParsedTable } from '../types.js';
import type { RawCell, RawGrid, TableOptions } from './types.js';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Workbook dates carry no zone; decoders hand them over as UTC instants.
 */
export function formatSheetDate(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`
  );
}

export function cleanCell(value: RawCell | undefined): CellValue {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : formatSheetDate(value);
  }
  if (typeof value === 'number') return Number.isNaN(value) ? '' : value;
  if (typeof value === 'boolean') return value;
  return value.trim().replace(/'/g, '');
}

/**
 * Column names for a header line: blanks become `Column_<n>` and repeated
 * names get `.1`, `.2`, ... suffixes.
 */
export function uniqueHeaders(line: CellValue[], width: number): string[] {
  const used = new Set<string>();
  const headers: string[] = [];
  for (let i = 0; i < width; i++) {
    const base = isBlank(line[i]) ? `Column_${i + 1}` : String(line[i]).trim();
    let name = base;
    let suffix = 1;
    while (used.has(name)) {
      name = `${base}.${suffix}`;
      suffix++;
    }
    used.add(name);
    headers.push(name);
  }
  return headers;
}

function isBlankLine(line: CellValue[]): boolean {
  return line.every(cell => isBlank(cell));
}

function isMissingRequired(value: CellValue | undefined): boolean {
  if (value === undefined || isBlank(value)) return true;
  return String(value).trim().toLowerCase() === 'nan';
}

/**
 * Turn a decoded grid into the table handed to the reconciler.
 */
export function buildTable(grid: RawGrid, options: TableOptions): ParsedTable {
  const lines = grid.map(line => line.map(cleanCell)).filter(line => !isBlankLine(line));
  const width = lines.reduce((max, line) => Math.max(max, line.length), 0);
  if (width === 0) return { columns: [], rows: [] };

  let columns: string[];
  let body: CellValue[][];
  if (options.headerRow < 0) {
    columns = Array.from({ length: width }, (_, i) => `Column_${i + 1}`);
    body = lines;
  } else {
    if (lines.length <= options.headerRow) return { columns: [], rows: [] };
    columns = uniqueHeaders(lines[options.headerRow], width);
    body = lines.slice(options.headerRow + 1);
  }

  const required = options.requiredColumnIndex;
  const checkRequired = required >= 0 && columns.length > required;
  const seen = new Set<string>();
  const rows: DatasetRow[] = [];

  for (const line of body) {
    if (checkRequired && isMissingRequired(line[required])) continue;
    const cells = columns.map((_, i) => line[i] ?? '');
    const fingerprint = JSON.stringify(cells);
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);

    const row: DatasetRow = {};
    columns.forEach((column, i) => {
      row[column] = cells[i];
    });
    rows.push(row);
  }

  return { columns, rows };
}
