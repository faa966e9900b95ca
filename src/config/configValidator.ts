/**
 * Validates the job configuration before the first run.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '../logger.js';
import type { IngestConfig } from './types.js';

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

function checkInteger(errors: string[], name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    errors.push(`${name} must be an integer >= ${min} (got ${value})`);
  }
}

export function validateConfig(config: IngestConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // 1. Required identifiers
  if (!config.spreadsheetId) errors.push('SPREADSHEET_ID is required');
  if (!config.sourceFiles.folderId) errors.push('SOURCE_FOLDER_ID is required');
  if (config.datasetSheetName === config.summarySheetName) {
    errors.push('DATASET_SHEET_NAME and SUMMARY_SHEET_NAME must name different sheets');
  }

  // 2. Numeric settings
  checkInteger(errors, 'GMAIL_DAYS_BACK', config.gmail.daysBack, 0);
  checkInteger(errors, 'GMAIL_MAX_RESULTS', config.gmail.maxResults, 1);
  checkInteger(errors, 'FILES_DAYS_BACK', config.sourceFiles.daysBack, 0);
  checkInteger(errors, 'MAX_FILES', config.sourceFiles.maxFiles, 1);
  checkInteger(errors, 'HEADER_ROW', config.sourceFiles.headerRow, -1);
  checkInteger(errors, 'REQUIRED_COLUMN_INDEX', config.sourceFiles.requiredColumnIndex, -1);
  if (!Number.isFinite(config.scheduleIntervalHours) || config.scheduleIntervalHours <= 0) {
    errors.push(`SCHEDULE_INTERVAL_HOURS must be a positive number (got ${config.scheduleIntervalHours})`);
  }
  if (!Number.isFinite(config.lease.ttlMinutes) || config.lease.ttlMinutes <= 0) {
    errors.push(`LEASE_TTL_MINUTES must be a positive number (got ${config.lease.ttlMinutes})`);
  }

  // 3. Credentials
  if (!fs.existsSync(config.google.credentialsPath)) {
    errors.push(`OAuth client file not found: ${config.google.credentialsPath}`);
  }

  // 4. Things that work but are probably not intended
  if (!config.gmail.sender && !config.gmail.searchTerm) {
    warnings.push('Neither GMAIL_SENDER nor GMAIL_SEARCH_TERM is set; every recent message with an attachment is searched');
  }
  if (config.notification.recipients.length === 0 && !config.notification.notifySelf) {
    warnings.push('No notification recipients configured; run summaries will not be e-mailed');
  }
  if (config.errorsOutPath) {
    const ext = path.extname(config.errorsOutPath).toLowerCase();
    if (ext !== '.csv' && ext !== '.json') {
      warnings.push(`ERRORS_OUT has extension "${ext}"; errors will be written as JSON`);
    }
  }

  return { errors, warnings };
}

/**
 * Log warnings and throw when the configuration cannot be used.
 */
export function assertValidConfig(config: IngestConfig, logger: Logger): void {
  const { errors, warnings } = validateConfig(config);
  for (const warning of warnings) logger.warn(warning);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  ${errors.join('\n  ')}`);
  }
}
