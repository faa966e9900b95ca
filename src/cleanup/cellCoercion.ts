import { isBlank } from '../cells.js';
import type { CellValue } from '../types.js';

const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT_LITERAL = /^[+-]?\d+$/;

/**
 * Normalize a dataset cell before it is written back:
 * blank -> "", numeric text -> number, anything else unchanged.
 *
 * Text is read as a float only when it contains `.`, `e` or `E`; otherwise
 * only integer text that fits a safe integer becomes a number.
 */
export function coerceCell(value: CellValue | null | undefined): CellValue {
  if (isBlank(value)) return '';
  if (typeof value !== 'string') return value ?? '';

  const text = value.trim();
  if (/[.eE]/.test(text)) {
    return FLOAT_LITERAL.test(text) ? Number(text) : value;
  }
  if (INT_LITERAL.test(text)) {
    const parsed = Number(text);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  return value;
}
