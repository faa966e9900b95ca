import type { gmail_v1 } from 'googleapis';
import { buildSearchQuery } from '../mail/searchQuery.js';
import type { FetchedMessage, MessageHeader, MessageNode } from '../mail/messageTree.js';
import type { Inbox, InboxQuery, MessageHandle } from '../stores/types.js';
import { withRetry, type RetryOptions } from './retry.js';

export function decodeBase64Url(data: string): Uint8Array {
  return Buffer.from(data.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

/**
 * Convert a Gmail payload into the message-part tree the attachment walk uses.
 */
export function toMessageNode(part: gmail_v1.Schema$MessagePart): MessageNode {
  const mimeType = part.mimeType ?? '';
  const children = part.parts ?? [];
  if (children.length > 0) {
    return { kind: 'branch', mimeType, children: children.map(toMessageNode) };
  }

  const filename = part.filename ?? '';
  const body = part.body;
  if (body?.attachmentId) {
    return { kind: 'leaf', mimeType, filename, body: { kind: 'attachment', attachmentId: body.attachmentId } };
  }
  if (body?.data) {
    return { kind: 'leaf', mimeType, filename, body: { kind: 'inline', data: decodeBase64Url(body.data) } };
  }
  return { kind: 'leaf', mimeType, filename, body: { kind: 'empty' } };
}

export function toFetchedMessage(message: gmail_v1.Schema$Message): FetchedMessage {
  const payload = message.payload ?? {};
  const headers: MessageHeader[] = (payload.headers ?? []).map(h => ({ name: h.name ?? '', value: h.value ?? '' }));
  return { id: message.id ?? '', headers, root: toMessageNode(payload) };
}

export class GmailInbox implements Inbox {
  private address: string | null = null;

  constructor(
    private readonly gmail: gmail_v1.Gmail,
    private readonly retry: RetryOptions = {}
  ) {}

  async search(query: InboxQuery): Promise<MessageHandle[]> {
    const q = buildSearchQuery(query);
    const res = await withRetry(
      () => this.gmail.users.messages.list({ userId: 'me', q, maxResults: query.limit }),
      this.retry
    );
    const handles: MessageHandle[] = [];
    for (const message of res.data.messages ?? []) {
      if (message.id) handles.push({ id: message.id, threadId: message.threadId ?? undefined });
    }
    return handles;
  }

  async get(id: string): Promise<FetchedMessage> {
    const res = await withRetry(
      () => this.gmail.users.messages.get({ userId: 'me', id, format: 'full' }),
      this.retry
    );
    return toFetchedMessage(res.data);
  }

  async getAttachment(messageId: string, attachmentId: string): Promise<Uint8Array> {
    const res = await withRetry(
      () => this.gmail.users.messages.attachments.get({ userId: 'me', messageId, id: attachmentId }),
      this.retry
    );
    if (!res.data.data) {
      throw new Error(`Attachment ${attachmentId} of message ${messageId} has no data`);
    }
    return decodeBase64Url(res.data.data);
  }

  async ownAddress(): Promise<string> {
    if (this.address !== null) return this.address;
    const res = await withRetry(() => this.gmail.users.getProfile({ userId: 'me' }), this.retry);
    this.address = res.data.emailAddress ?? '';
    return this.address;
  }
}
