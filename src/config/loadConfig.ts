/**
 * Reads the job configuration from environment variables.
 *
 * Values are parsed but not judged here; numbers that fail to parse come
 * through as NaN and are reported by validateConfig.
 */

import type { IngestConfig } from './types.js';

type Env = Record<string, string | undefined>;

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function textOr(env: Env, name: string, fallback: string): string {
  return text(env, name) ?? fallback;
}

function numberOr(env: Env, name: string, fallback: number): number {
  const value = text(env, name);
  return value === undefined ? fallback : Number(value);
}

const TRUE_WORDS = ['true', '1', 'yes', 'y', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'n', 'off'];

function booleanOr(env: Env, name: string, fallback: boolean): boolean {
  const value = text(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (TRUE_WORDS.includes(value)) return true;
  if (FALSE_WORDS.includes(value)) return false;
  return fallback;
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function loadConfig(env: Env = process.env): IngestConfig {
  return {
    spreadsheetId: textOr(env, 'SPREADSHEET_ID', ''),
    datasetSheetName: textOr(env, 'DATASET_SHEET_NAME', 'data'),
    summarySheetName: textOr(env, 'SUMMARY_SHEET_NAME', 'workflow_log'),
    gmail: {
      sender: text(env, 'GMAIL_SENDER'),
      searchTerm: text(env, 'GMAIL_SEARCH_TERM'),
      daysBack: numberOr(env, 'GMAIL_DAYS_BACK', 2),
      maxResults: numberOr(env, 'GMAIL_MAX_RESULTS', 5)
    },
    attachments: {
      parentFolderId: text(env, 'ATTACHMENTS_PARENT_FOLDER_ID'),
      folderName: textOr(env, 'ATTACHMENTS_FOLDER_NAME', 'Gmail_Attachments')
    },
    sourceFiles: {
      folderId: textOr(env, 'SOURCE_FOLDER_ID', ''),
      daysBack: numberOr(env, 'FILES_DAYS_BACK', 2),
      maxFiles: numberOr(env, 'MAX_FILES', 1000),
      headerRow: numberOr(env, 'HEADER_ROW', 0),
      requiredColumnIndex: numberOr(env, 'REQUIRED_COLUMN_INDEX', 4)
    },
    columns: {
      matchers: {
        po: textOr(env, 'PO_HEADER_MATCH', 'po'),
        sku: textOr(env, 'SKU_HEADER_MATCH', 'sku')
      },
      sourceFile: textOr(env, 'SOURCE_FILE_COLUMN', 'source_file_name')
    },
    notification: {
      recipients: parseList(env.NOTIFY_RECIPIENTS),
      notifySelf: booleanOr(env, 'NOTIFY_SELF', true),
      subjectPrefix: textOr(env, 'NOTIFY_SUBJECT_PREFIX', 'Inbox Ingest')
    },
    scheduleIntervalHours: numberOr(env, 'SCHEDULE_INTERVAL_HOURS', 3),
    google: {
      credentialsPath: textOr(env, 'GOOGLE_CREDENTIALS_PATH', 'credentials.json'),
      tokenPath: textOr(env, 'GOOGLE_TOKEN_PATH', 'token.json'),
      tokenJson: text(env, 'GOOGLE_TOKEN_JSON')
    },
    lease: {
      dir: textOr(env, 'LOCK_DIR', '.ingest-lock'),
      ttlMinutes: numberOr(env, 'LEASE_TTL_MINUTES', 120)
    },
    logFile: text(env, 'LOG_FILE'),
    errorsOutPath: text(env, 'ERRORS_OUT'),
    quiet: booleanOr(env, 'QUIET', false)
  };
}
