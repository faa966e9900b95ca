import { google } from 'googleapis';
import type { IngestConfig } from '../config/types.js';
import type { Logger } from '../logger.js';
import type { Collaborators } from '../stores/types.js';
import { authorize } from './auth.js';
import { DriveFileStore } from './driveFileStore.js';
import { GmailInbox } from './gmailInbox.js';
import { GmailNotifier } from './gmailNotifier.js';
import type { RetryOptions } from './retry.js';
import { SheetsDatasetStore } from './sheetsDatasetStore.js';

/**
 * Authenticate once and build the Gmail, Drive and Sheets backed stores.
 */
export async function connectGoogle(
  config: IngestConfig,
  logger: Logger,
  retry: RetryOptions = {}
): Promise<Collaborators> {
  const auth = await authorize({ ...config.google, logger });
  const gmail = google.gmail({ version: 'v1', auth });
  const drive = google.drive({ version: 'v3', auth });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    inbox: new GmailInbox(gmail, retry),
    files: new DriveFileStore(drive, retry),
    dataset: new SheetsDatasetStore(sheets, config.spreadsheetId, retry),
    notifier: new GmailNotifier(gmail, retry)
  };
}
