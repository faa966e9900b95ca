/**
 * Contracts of the external collaborators.
 *
 * The reconciliation logic only ever talks to these interfaces; the Google
 * adapters in src/google implement them, tests use in-memory fakes.
 */

import type { FetchedMessage } from '../mail/messageTree.js';
import type { CellValue, SourceFile } from '../types.js';

export interface MessageHandle {
  id: string;
  threadId?: string;
}

export interface InboxQuery {
  sender?: string;
  term?: string;
  since: Date;
  limit: number;
}

export interface Inbox {
  search(query: InboxQuery): Promise<MessageHandle[]>;
  get(id: string): Promise<FetchedMessage>;
  getAttachment(messageId: string, attachmentId: string): Promise<Uint8Array>;
  /** Address of the authenticated mailbox. */
  ownAddress(): Promise<string>;
}

export interface ListOptions {
  pageToken?: string;
  pageSize?: number;
  createdAfter?: Date;
  mimeTypes?: string[];
  orderBy?: 'createdTime desc';
}

export interface FileListPage {
  items: SourceFile[];
  nextPageToken?: string;
}

export interface FolderHandle {
  id: string;
  /** False when a folder of that name already existed under the parent. */
  created: boolean;
}

export interface FileStore {
  list(folderId: string, options?: ListOptions): Promise<FileListPage>;
  createFolder(name: string, parentId?: string): Promise<FolderHandle>;
  upload(parentId: string, name: string, content: Uint8Array, mimeType: string): Promise<string>;
  download(fileId: string): Promise<Uint8Array>;
}

export type ValueInputOption = 'RAW' | 'USER_ENTERED';

export interface DatasetStore {
  read(range: string): Promise<CellValue[][]>;
  append(range: string, rows: CellValue[][], valueInputOption?: ValueInputOption): Promise<void>;
  update(range: string, rows: CellValue[][], valueInputOption?: ValueInputOption): Promise<void>;
  clear(range: string): Promise<void>;
}

export interface NotificationMessage {
  recipients: string[];
  subject: string;
  html: string;
  text: string;
}

export interface NotificationSink {
  send(message: NotificationMessage): Promise<void>;
}

export interface Collaborators {
  inbox: Inbox;
  files: FileStore;
  dataset: DatasetStore;
  notifier: NotificationSink;
}

export const SPREADSHEET_MIME_TYPES = [
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel'
];

export const XLSX_MIME_TYPE = SPREADSHEET_MIME_TYPES[0];
