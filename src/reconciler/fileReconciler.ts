/**
 * Source file reconciliation: file-level skip, then row-level filtering.
 */

import type { ColumnAnchors, DatasetAppender } from '../dataset/datasetAppender.js';
import type { ExistingStateIndex } from '../index/existingStateIndex.js';
import { locateColumn } from '../index/datasetIndexes.js';
import type { Logger } from '../logger.js';
import type { FileStore } from '../stores/types.js';
import type { ColumnMatchers, ParsedTable, SourceFile } from '../types.js';
import { partitionRows, type KeyColumnNames } from './rowPartition.js';
import { errorMessage, type ItemOutcome } from './types.js';

export type TableParser = (content: Uint8Array, fileName: string) => Promise<ParsedTable>;

export interface FileReconcilerDeps {
  index: ExistingStateIndex;
  files: FileStore;
  appender: DatasetAppender;
  parse: TableParser;
  matchers: ColumnMatchers;
  sourceFileColumn: string;
  logger: Logger;
}

export function keyColumnNames(columns: string[], matchers: ColumnMatchers): KeyColumnNames {
  const po = locateColumn(columns, matchers.po);
  const sku = locateColumn(columns, matchers.sku);
  return {
    po: po >= 0 ? columns[po] : undefined,
    sku: sku >= 0 ? columns[sku] : undefined
  };
}

/**
 * Anchor the key and source columns to the dataset columns the indexes read
 * them back from.
 */
export function columnAnchors(keyColumns: KeyColumnNames, matchers: ColumnMatchers, sourceFileColumn: string): ColumnAnchors {
  const anchors = new Map<string, string>();
  if (keyColumns.po !== undefined) anchors.set(keyColumns.po, matchers.po);
  if (keyColumns.sku !== undefined) anchors.set(keyColumns.sku, matchers.sku);
  anchors.set(sourceFileColumn, sourceFileColumn);
  return anchors;
}

/**
 * Tag every row with the file it came from. The source column is appended
 * last, replacing any same-named column the file itself carried.
 */
export function tagWithSourceFile(table: ParsedTable, column: string, fileName: string): ParsedTable {
  const columns = [...table.columns.filter(c => c !== column), column];
  const rows = table.rows.map(row => ({ ...row, [column]: fileName }));
  return { columns, rows };
}

export async function reconcileSourceFile(file: SourceFile, deps: FileReconcilerDeps): Promise<ItemOutcome> {
  const { index, files, appender, parse, matchers, sourceFileColumn, logger } = deps;

  if (index.hasSourceFile(file.name)) {
    logger.info(`[SKIP] ${file.name} is already recorded in ${sourceFileColumn}`);
    return { kind: 'skipped', item: file.name, reason: 'already-ingested' };
  }

  try {
    const content = await files.download(file.id);
    const parsed = await parse(content, file.name);
    if (parsed.rows.length === 0) {
      logger.warn(`No data in ${file.name}`);
      return { kind: 'failed', item: file.name, error: 'No rows could be read from file' };
    }

    // Key columns come from the file's own headers, before tagging
    const keyColumns = keyColumnNames(parsed.columns, matchers);
    const table = tagWithSourceFile(parsed, sourceFileColumn, file.name);
    const partition = partitionRows(table.rows, keyColumns, key => index.hasContentKey(key));

    if (partition.duplicates > 0) {
      logger.info(`  Filtered out ${partition.duplicates} duplicate rows from ${file.name}`);
    }
    if (partition.fresh.length === 0) {
      logger.info(`  All data from ${file.name} already exists in the dataset`);
      return { kind: 'skipped', item: file.name, reason: 'all-rows-duplicate' };
    }

    const appended = await appender.append(
      table.columns,
      partition.fresh,
      columnAnchors(keyColumns, matchers, sourceFileColumn)
    );
    for (const key of partition.freshKeys) {
      index.addContentKey(key);
    }
    index.addSourceFile(file.name);

    logger.info(`[OK] Appended ${appended} new rows from ${file.name}`);
    return { kind: 'accepted', item: file.name, rowsAppended: appended, duplicateRows: partition.duplicates };
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`Failed to process ${file.name}: ${message}`);
    return { kind: 'failed', item: file.name, error: message };
  }
}
