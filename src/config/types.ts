import type { ColumnMatchers } from '../types.js';

export interface GmailSettings {
  sender?: string;
  searchTerm?: string;
  daysBack: number;
  maxResults: number;
}

export interface AttachmentSettings {
  /** Drive folder the base folder is created under; Drive root when unset. */
  parentFolderId?: string;
  folderName: string;
}

export interface SourceFileSettings {
  folderId: string;
  daysBack: number;
  maxFiles: number;
  headerRow: number;
  requiredColumnIndex: number;
}

export interface NotificationSettings {
  recipients: string[];
  notifySelf: boolean;
  subjectPrefix: string;
}

export interface GoogleSettings {
  credentialsPath: string;
  tokenPath: string;
  tokenJson?: string;
}

export interface IngestConfig {
  spreadsheetId: string;
  datasetSheetName: string;
  summarySheetName: string;
  gmail: GmailSettings;
  attachments: AttachmentSettings;
  sourceFiles: SourceFileSettings;
  columns: {
    matchers: ColumnMatchers;
    sourceFile: string;
  };
  notification: NotificationSettings;
  scheduleIntervalHours: number;
  google: GoogleSettings;
  lease: {
    dir: string;
    ttlMinutes: number;
  };
  logFile?: string;
  errorsOutPath?: string;
  quiet: boolean;
}
