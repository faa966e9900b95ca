import { computeContentKey } from '../identity/contentKey.js';
import type { DatasetRow } from '../types.js';

export interface KeyColumnNames {
  po?: string;
  sku?: string;
}

export interface RowPartition {
  fresh: DatasetRow[];
  /** Keys of the fresh rows, to be indexed once the append succeeds. */
  freshKeys: string[];
  duplicates: number;
}

/**
 * Split a file's rows into those to append and those already present.
 *
 * A row is a duplicate when its content key is already known, or when an
 * earlier row of the same batch carried the same key. Rows without a key are
 * always kept; only the file-level check guards them.
 */
export function partitionRows(
  rows: DatasetRow[],
  columns: KeyColumnNames,
  isKnown: (key: string) => boolean
): RowPartition {
  const fresh: DatasetRow[] = [];
  const freshKeys: string[] = [];
  const batchKeys = new Set<string>();
  let duplicates = 0;

  for (const row of rows) {
    const key = computeContentKey(row, columns.po, columns.sku);
    if (key === undefined) {
      fresh.push(row);
      continue;
    }
    if (isKnown(key) || batchKeys.has(key)) {
      duplicates++;
      continue;
    }
    batchKeys.add(key);
    freshKeys.push(key);
    fresh.push(row);
  }

  return { fresh, freshKeys, duplicates };
}
