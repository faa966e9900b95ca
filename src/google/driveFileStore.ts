import { Readable } from 'node:stream';
import type { drive_v3 } from 'googleapis';
import type { FileListPage, FileStore, FolderHandle, ListOptions } from '../stores/types.js';
import { withRetry, type RetryOptions } from './retry.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/** Escape a value for use inside a single-quoted Drive query literal. */
export function escapeQueryLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function buildListQuery(folderId: string, options: ListOptions): string {
  const clauses = [`'${escapeQueryLiteral(folderId)}' in parents`, 'trashed = false'];
  if (options.mimeTypes && options.mimeTypes.length > 0) {
    const anyOf = options.mimeTypes.map(type => `mimeType = '${escapeQueryLiteral(type)}'`).join(' or ');
    clauses.push(`(${anyOf})`);
  }
  if (options.createdAfter) {
    clauses.push(`createdTime > '${options.createdAfter.toISOString()}'`);
  }
  return clauses.join(' and ');
}

export class DriveFileStore implements FileStore {
  constructor(
    private readonly drive: drive_v3.Drive,
    private readonly retry: RetryOptions = {}
  ) {}

  async list(folderId: string, options: ListOptions = {}): Promise<FileListPage> {
    const res = await withRetry(
      () =>
        this.drive.files.list({
          q: buildListQuery(folderId, options),
          pageSize: options.pageSize ?? 100,
          pageToken: options.pageToken,
          orderBy: options.orderBy,
          fields: 'nextPageToken, files(id, name, createdTime)',
          supportsAllDrives: true,
          includeItemsFromAllDrives: true
        }),
      this.retry
    );

    const items: FileListPage['items'] = [];
    for (const file of res.data.files ?? []) {
      if (file.id && file.name) {
        items.push({ id: file.id, name: file.name, createdAt: file.createdTime ?? undefined });
      }
    }
    return { items, nextPageToken: res.data.nextPageToken ?? undefined };
  }

  async createFolder(name: string, parentId?: string): Promise<FolderHandle> {
    const clauses = [
      `name = '${escapeQueryLiteral(name)}'`,
      `mimeType = '${FOLDER_MIME_TYPE}'`,
      'trashed = false'
    ];
    if (parentId) clauses.push(`'${escapeQueryLiteral(parentId)}' in parents`);

    const existing = await withRetry(
      () =>
        this.drive.files.list({
          q: clauses.join(' and '),
          pageSize: 1,
          fields: 'files(id, name)',
          supportsAllDrives: true,
          includeItemsFromAllDrives: true
        }),
      this.retry
    );
    const found = existing.data.files?.[0]?.id;
    if (found) return { id: found, created: false };

    const res = await withRetry(
      () =>
        this.drive.files.create({
          requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: parentId ? [parentId] : undefined },
          fields: 'id',
          supportsAllDrives: true
        }),
      this.retry
    );
    if (!res.data.id) throw new Error(`Drive did not return an id for new folder "${name}"`);
    return { id: res.data.id, created: true };
  }

  async upload(parentId: string, name: string, content: Uint8Array, mimeType: string): Promise<string> {
    const res = await withRetry(
      () =>
        this.drive.files.create({
          requestBody: { name, parents: [parentId] },
          // A fresh stream per attempt; a consumed one cannot be re-sent
          media: { mimeType, body: Readable.from([Buffer.from(content)]) },
          fields: 'id',
          supportsAllDrives: true
        }),
      this.retry
    );
    if (!res.data.id) throw new Error(`Drive did not return an id for uploaded file "${name}"`);
    return res.data.id;
  }

  async download(fileId: string): Promise<Uint8Array> {
    return withRetry(async () => {
      const res = await this.drive.files.get(
        { fileId, alt: 'media', supportsAllDrives: true },
        { responseType: 'stream' }
      );
      const chunks: Buffer[] = [];
      for await (const chunk of res.data) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    }, this.retry);
  }
}
