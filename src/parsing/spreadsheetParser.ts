/**
 * Spreadsheet parser
 *
 * Tries each decoding strategy in order and returns the first non-empty table.
 * When every strategy comes up empty the result is an empty table, which the
 * reconciler counts as a failed file.
 */

import type { Logger } from '../logger.js';
import type { ParsedTable } from '../types.js';
import { delimitedTextStrategy } from './delimitedTextStrategy.js';
import { rawContainerStrategy } from './rawContainerStrategy.js';
import { buildTable } from './tableBuilder.js';
import type { ParseStrategy, RawGrid, TableOptions } from './types.js';
import { workbookStrategy } from './workbookStrategy.js';

export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [
  workbookStrategy,
  rawContainerStrategy,
  delimitedTextStrategy
];

export interface SpreadsheetParserOptions extends TableOptions {
  strategies?: readonly ParseStrategy[];
  logger?: Logger;
}

export async function parseSpreadsheet(
  content: Uint8Array,
  fileName: string,
  options: SpreadsheetParserOptions
): Promise<ParsedTable> {
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;

  for (const strategy of strategies) {
    let grid: RawGrid | null;
    try {
      grid = await strategy.decode(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      options.logger?.warn(`${strategy.name} reader failed on ${fileName}: ${message}`);
      continue;
    }
    if (!grid) continue;

    const table = buildTable(grid, options);
    if (table.rows.length > 0) {
      options.logger?.info(`Read ${table.rows.length} rows from ${fileName} (${strategy.name})`);
      return table;
    }
  }

  return { columns: [], rows: [] };
}

/**
 * Bind the table options once per run, in the shape the file reconciler takes.
 */
export function createSpreadsheetParser(options: SpreadsheetParserOptions) {
  return (content: Uint8Array, fileName: string): Promise<ParsedTable> =>
    parseSpreadsheet(content, fileName, options);
}
