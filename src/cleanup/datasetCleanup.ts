/**
 * Dataset Cleanup Pass
 *
 * Re-reads the whole dataset, removes content-key duplicates (first occurrence
 * wins) and blank rows and columns, sorts by the PO column and rewrites the
 * sheet. Applying the pass to its own output changes nothing.
 */

import { cellText } from '../cells.js';
import { contentKeyFromCells } from '../identity/contentKey.js';
import { locateColumn } from '../index/datasetIndexes.js';
import type { Logger } from '../logger.js';
import type { DatasetStore } from '../stores/types.js';
import { sheetRange } from '../dataset/ranges.js';
import type { CellValue, ColumnMatchers } from '../types.js';
import { coerceCell } from './cellCoercion.js';

export interface CleanedDataset {
  header: string[];
  rows: CellValue[][];
  duplicatesRemoved: number;
  blankRowsRemoved: number;
}

function isBlankCell(value: CellValue): boolean {
  return cellText(value) === '';
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Pure part of the pass. `values[0]` is the header row.
 */
export function cleanDataset(values: CellValue[][], matchers: ColumnMatchers): CleanedDataset {
  if (values.length === 0) {
    return { header: [], rows: [], duplicatesRemoved: 0, blankRowsRemoved: 0 };
  }

  const width = values.reduce((max, row) => Math.max(max, row.length), 0);
  let header = Array.from({ length: width }, (_, i) => cellText(values[0][i]) || `Column_${i + 1}`);
  let rows = values.slice(1).map(row => Array.from({ length: width }, (_, i) => coerceCell(row[i])));

  // Duplicates by content key; keyless rows always stay
  const po = locateColumn(header, matchers.po);
  const sku = locateColumn(header, matchers.sku);
  let duplicatesRemoved = 0;
  if (po >= 0 && sku >= 0) {
    const seen = new Set<string>();
    const kept: CellValue[][] = [];
    for (const row of rows) {
      const key = contentKeyFromCells(row[po], row[sku]);
      if (key !== undefined) {
        if (seen.has(key)) {
          duplicatesRemoved++;
          continue;
        }
        seen.add(key);
      }
      kept.push(row);
    }
    rows = kept;
  }

  const beforeBlank = rows.length;
  rows = rows.filter(row => !row.every(isBlankCell));
  const blankRowsRemoved = beforeBlank - rows.length;

  if (rows.length > 0) {
    const keep = header.map((_, i) => rows.some(row => !isBlankCell(row[i])));
    if (keep.includes(false)) {
      header = header.filter((_, i) => keep[i]);
      rows = rows.map(row => row.filter((_, i) => keep[i]));
    }
  }

  const sortColumn = locateColumn(header, matchers.po);
  if (sortColumn >= 0) {
    // Array.prototype.sort is stable, so equal POs keep their order
    rows = [...rows].sort((a, b) => compareText(String(a[sortColumn]), String(b[sortColumn])));
  }

  return { header, rows, duplicatesRemoved, blankRowsRemoved };
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Write the cleaned grid into the just-cleared sheet, retrying once. A second
 * failure leaves the sheet empty and is rethrown with the row count lost.
 */
async function writeBack(store: DatasetStore, sheetName: string, values: CellValue[][], logger: Logger): Promise<void> {
  const range = sheetRange(sheetName, 'A1');
  try {
    await store.update(range, values, 'RAW');
    return;
  } catch (err) {
    logger.error(`Sheet "${sheetName}" was cleared but writing the cleaned rows failed: ${errorText(err)}; retrying once`);
  }
  try {
    await store.update(range, values, 'RAW');
  } catch (err) {
    throw new Error(
      `sheet was left empty; ${values.length - 1} cleaned rows could not be written back: ${errorText(err)}`
    );
  }
}

/**
 * Run the pass against the live sheet. Returns rows removed (duplicates plus
 * blank rows); any failure is logged and counts as nothing removed.
 */
export async function runCleanupPass(
  store: DatasetStore,
  sheetName: string,
  matchers: ColumnMatchers,
  logger: Logger
): Promise<number> {
  try {
    const values = await store.read(sheetRange(sheetName));
    if (values.length === 0) return 0;

    const cleaned = cleanDataset(values, matchers);
    await store.clear(sheetRange(sheetName));
    await writeBack(store, sheetName, [cleaned.header, ...cleaned.rows], logger);

    logger.info(`Removed ${cleaned.duplicatesRemoved} duplicates and ${cleaned.blankRowsRemoved} blank rows`);
    return cleaned.duplicatesRemoved + cleaned.blankRowsRemoved;
  } catch (err) {
    logger.error(`Error cleaning sheet "${sheetName}": ${errorText(err)}`);
    return 0;
  }
}
