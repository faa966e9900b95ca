/**
 * Lookup sets derived from a raw dataset read (first row = header).
 */

import { cellText } from "../cells.js";
import { contentKeyFromCells } from "../identity/contentKey.js";
import type { Logger } from "../logger.js";
import type { CellValue, ColumnMatchers } from "../types.js";

/**
 * Index of the first header containing `needle` (case-insensitive), or -1.
 */
export function locateColumn(headers: readonly (CellValue | null | undefined)[], needle: string): number {
  const wanted = needle.toLowerCase();
  if (!wanted) return -1;
  return headers.findIndex(h => cellText(h).toLowerCase().includes(wanted));
}

export type KeyColumns = {
  po: number;
  sku: number;
};

export function locateKeyColumns(
  headers: readonly (CellValue | null | undefined)[],
  matchers: ColumnMatchers
): KeyColumns | null {
  const po = locateColumn(headers, matchers.po);
  const sku = locateColumn(headers, matchers.sku);
  if (po < 0 || sku < 0) return null;
  return { po, sku };
}

export function buildContentKeyIndex(
  values: CellValue[][],
  matchers: ColumnMatchers,
  logger?: Logger
): Set<string> {
  const keys = new Set<string>();
  if (values.length === 0) return keys;

  const columns = locateKeyColumns(values[0], matchers);
  if (!columns) {
    logger?.info(
      `Dataset has no columns matching "${matchers.po}" and "${matchers.sku}"; row-level duplicate check disabled`
    );
    return keys;
  }

  for (const row of values.slice(1)) {
    const key = contentKeyFromCells(row[columns.po], row[columns.sku]);
    if (key) keys.add(key);
  }
  logger?.info(`Found ${keys.size} unique records in dataset`);
  return keys;
}

export function buildProcessedSourceFileIndex(
  values: CellValue[][],
  sourceFileHeader: string,
  logger?: Logger
): Set<string> {
  const names = new Set<string>();
  if (values.length === 0) return names;

  const column = locateColumn(values[0], sourceFileHeader);
  if (column < 0) {
    logger?.info(`No '${sourceFileHeader}' column found in dataset`);
    return names;
  }

  for (const row of values.slice(1)) {
    const name = cellText(row[column]);
    if (name) names.add(name);
  }
  logger?.info(`Found ${names.size} source files already recorded in dataset`);
  return names;
}
