/**
 * Drive to Sheet: append the new rows of recent source files to the dataset,
 * then compact the dataset if anything was appended.
 */

import { runCleanupPass } from '../cleanup/datasetCleanup.js';
import { DatasetAppender } from '../dataset/datasetAppender.js';
import { sheetRange } from '../dataset/ranges.js';
import type { RunContext } from '../orchestrator/types.js';
import { createSpreadsheetParser } from '../parsing/spreadsheetParser.js';
import { reconcileSourceFile } from '../reconciler/fileReconciler.js';
import { errorMessage, type ItemOutcome } from '../reconciler/types.js';
import { SPREADSHEET_MIME_TYPES } from '../stores/types.js';
import { daysBefore } from '../time.js';
import type { CellValue, SourceFile } from '../types.js';

export interface DatasetWorkflowResult {
  filesFound: number;
  outcomes: ItemOutcome[];
  duplicatesRemoved: number;
}

/**
 * Recent spreadsheet files, newest first, capped at `maxFiles`.
 */
export async function listSourceFiles(ctx: RunContext): Promise<SourceFile[]> {
  const { config, collaborators } = ctx;
  const { folderId, daysBack, maxFiles } = config.sourceFiles;
  const found: SourceFile[] = [];
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;

  while (found.length < maxFiles) {
    const page = await collaborators.files.list(folderId, {
      pageToken,
      pageSize: Math.min(maxFiles - found.length, 1000),
      createdAfter: daysBefore(ctx.now, daysBack),
      mimeTypes: SPREADSHEET_MIME_TYPES,
      orderBy: 'createdTime desc'
    });
    found.push(...page.items);
    if (!page.nextPageToken || seenTokens.has(page.nextPageToken)) break;
    seenTokens.add(page.nextPageToken);
    pageToken = page.nextPageToken;
  }

  return found.slice(0, maxFiles);
}

export async function runDatasetWorkflow(ctx: RunContext): Promise<DatasetWorkflowResult> {
  const { config, collaborators, index, logger, progress } = ctx;
  const result: DatasetWorkflowResult = { filesFound: 0, outcomes: [], duplicatesRemoved: 0 };

  logger.step('Drive to Sheet');

  let files: SourceFile[];
  try {
    files = await listSourceFiles(ctx);
  } catch (err) {
    logger.error(`Listing source files failed: ${errorMessage(err)}`);
    ctx.recordError('workflow', 'source file listing', err);
    return result;
  }

  result.filesFound = files.length;
  logger.info(`Found ${files.length} spreadsheet files`);
  if (files.length === 0) return result;

  let values: CellValue[][] = [];
  try {
    values = await collaborators.dataset.read(sheetRange(config.datasetSheetName));
  } catch (err) {
    logger.error(`Reading dataset "${config.datasetSheetName}" failed, treating it as empty: ${errorMessage(err)}`);
  }
  index.seedFromDataset(values, config.columns.matchers, config.columns.sourceFile);

  const deps = {
    index,
    files: collaborators.files,
    appender: new DatasetAppender(collaborators.dataset, config.datasetSheetName, logger),
    parse: createSpreadsheetParser({
      headerRow: config.sourceFiles.headerRow,
      requiredColumnIndex: config.sourceFiles.requiredColumnIndex,
      logger
    }),
    matchers: config.columns.matchers,
    sourceFileColumn: config.columns.sourceFile,
    logger
  };

  progress.startPhase('Files', files.length);
  for (const [i, file] of files.entries()) {
    logger.info(`Processing ${file.name} (${i + 1}/${files.length})`);
    const outcome = await reconcileSourceFile(file, deps);
    result.outcomes.push(outcome);
    if (outcome.kind === 'failed') ctx.recordError('file', outcome.item, outcome.error);
    progress.increment(file.name);
  }
  progress.finish();

  if (result.outcomes.some(outcome => outcome.kind === 'accepted')) {
    logger.info('Running final duplicate cleanup...');
    result.duplicatesRemoved = await runCleanupPass(
      collaborators.dataset,
      config.datasetSheetName,
      config.columns.matchers,
      logger
    );
  }

  return result;
}
