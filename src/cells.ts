import type { CellValue } from "./types.js";

/** Null, undefined, NaN and whitespace-only text are empty cells. */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  return typeof value === "number" && Number.isNaN(value);
}

export function cellText(value: CellValue | null | undefined): string {
  if (isBlank(value)) return "";
  return String(value).trim();
}
