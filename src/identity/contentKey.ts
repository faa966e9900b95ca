import { cellText } from "../cells.js";
import type { CellValue, DatasetRow } from "../types.js";

/**
 * Composite identity of a dataset row: "<po>|<sku>".
 * Undefined when either side is missing or blank; such rows are never treated
 * as content duplicates.
 */
export function contentKeyFromCells(
  po: CellValue | null | undefined,
  sku: CellValue | null | undefined
): string | undefined {
  const poText = cellText(po);
  const skuText = cellText(sku);
  if (!poText || !skuText) return undefined;
  return `${poText}|${skuText}`;
}

export function computeContentKey(
  row: DatasetRow,
  poColumn: string | undefined,
  skuColumn: string | undefined
): string | undefined {
  if (poColumn === undefined || skuColumn === undefined) return undefined;
  return contentKeyFromCells(row[poColumn], row[skuColumn]);
}
