import { sheetRange } from '../dataset/ranges.js';
import type { Logger } from '../logger.js';
import type { DatasetStore } from '../stores/types.js';
import { formatTimestamp } from '../time.js';
import type { CellValue, RunSummary } from '../types.js';

export const SUMMARY_HEADERS = [
  'Start Time',
  'End Time',
  'Emails Checked',
  'Attachments Found',
  'Attachments Saved',
  'Attachments Skipped',
  'Attachments Failed',
  'Files Found',
  'Files Processed',
  'Files Skipped',
  'Files Failed',
  'Duplicates Removed',
  'Status'
];

export function summaryRow(summary: RunSummary): CellValue[] {
  return [
    formatTimestamp(summary.startedAt),
    summary.endedAt ? formatTimestamp(summary.endedAt) : '',
    summary.emailsChecked,
    summary.attachmentsFound,
    summary.attachmentsSaved,
    summary.attachmentsSkipped,
    summary.attachmentsFailed,
    summary.filesFound,
    summary.filesProcessed,
    summary.filesSkipped,
    summary.filesFailed,
    summary.duplicatesRemoved,
    summary.status
  ];
}

async function hasHeader(store: DatasetStore, sheetName: string): Promise<boolean> {
  try {
    const values = await store.read(sheetRange(sheetName, 'A1'));
    return values.length > 0 && values[0].length > 0;
  } catch {
    // Missing or unreadable sheet: write the header and let the append report
    return false;
  }
}

/**
 * Append one row for the run to the log sheet, writing the header first when
 * the sheet has none. Throws on failure; the caller decides how much that matters.
 */
export async function appendRunSummary(
  store: DatasetStore,
  sheetName: string,
  summary: RunSummary,
  logger: Logger
): Promise<void> {
  if (!(await hasHeader(store, sheetName))) {
    await store.update(sheetRange(sheetName, 'A1'), [SUMMARY_HEADERS], 'RAW');
  }
  await store.append(sheetRange(sheetName, 'A1'), [summaryRow(summary)], 'RAW');
  logger.info('Workflow summary saved');
}
