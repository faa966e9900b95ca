export type CellValue = string | number | boolean;

/**
 * One dataset row keyed by column name. Rows produced by ingestion always
 * carry the source file column in addition to the columns of the file itself.
 */
export type DatasetRow = Record<string, CellValue>;

export type ParsedTable = {
  columns: string[];
  rows: DatasetRow[];
};

export type SourceFile = {
  id: string;
  name: string;
  createdAt?: string;
};

export type AttachmentCandidate = {
  messageId: string;
  rawFilename: string;
  sender: string;
  mimeType: string;
  // Deferred so that duplicate checks run before any download
  loadContent: () => Promise<Uint8Array>;
};

export type ColumnMatchers = {
  po: string;
  sku: string;
};

export type ErrorRecord = {
  scope: "email" | "attachment" | "file" | "workflow";
  item: string;
  errorMessage: string;
  timestamp: string;
};

export type RunStatus =
  | "Not Started"
  | "Running"
  | "Completed Successfully"
  | "Completed With Errors"
  | "Skipped - Another Run In Progress"
  | "Failed - Authentication Error"
  | `Failed - ${string}`;

export type RunSummary = {
  startedAt: Date;
  endedAt: Date | null;
  gmailDaysBack: number;
  filesDaysBack: number;
  emailsChecked: number;
  attachmentsFound: number;
  attachmentsSaved: number;
  attachmentsSkipped: number;
  attachmentsFailed: number;
  filesFound: number;
  filesProcessed: number;
  filesSkipped: number;
  filesFailed: number;
  duplicatesRemoved: number;
  status: RunStatus;
};
