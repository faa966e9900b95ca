import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { ErrorRecord } from "./types.js";

export const ERROR_COLUMNS: (keyof ErrorRecord)[] = ["timestamp", "scope", "item", "errorMessage"];

export function renderErrorsCsv(errors: ErrorRecord[]): string {
  return stringify(errors, { header: true, columns: ERROR_COLUMNS });
}

export async function writeErrorsOut(outPath: string, errors: ErrorRecord[]): Promise<void> {
  if (errors.length === 0) return;
  const ext = path.extname(outPath).toLowerCase();
  if (ext === ".csv") {
    await fs.promises.writeFile(outPath, renderErrorsCsv(errors), "utf8");
  } else {
    await fs.promises.writeFile(outPath, JSON.stringify(errors, null, 2), "utf8");
  }
}
