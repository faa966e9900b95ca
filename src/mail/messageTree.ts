/**
 * Message part tree
 *
 * A fetched message is a tree: multipart containers hold children, leaves
 * carry a file name and either inline data or a reference to an attachment
 * that has to be fetched separately.
 */

import { extractSenderAddress, isSpreadsheetFileName } from '../identity/fileNames.js';
import type { AttachmentCandidate } from '../types.js';

export type LeafBody =
  | { kind: 'inline'; data: Uint8Array }
  | { kind: 'attachment'; attachmentId: string }
  | { kind: 'empty' };

export type MessageNode =
  | { kind: 'leaf'; mimeType: string; filename: string; body: LeafBody }
  | { kind: 'branch'; mimeType: string; children: MessageNode[] };

export interface MessageHeader {
  name: string;
  value: string;
}

export interface FetchedMessage {
  id: string;
  headers: MessageHeader[];
  root: MessageNode;
}

export type AttachmentLeaf = Extract<MessageNode, { kind: 'leaf' }>;

export function getHeader(headers: MessageHeader[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find(h => h.name.toLowerCase() === wanted)?.value;
}

/**
 * Depth-first, document-order walk over the leaves that carry a file name and
 * some content. Uses an explicit stack so deeply nested multiparts cannot
 * exhaust the call stack.
 */
export function* iterateFileLeaves(root: MessageNode): Generator<AttachmentLeaf> {
  const stack: MessageNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.kind === 'branch') {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
      continue;
    }
    if (node.filename && node.body.kind !== 'empty') {
      yield node;
    }
  }
}

export type AttachmentFetcher = (messageId: string, attachmentId: string) => Promise<Uint8Array>;

/**
 * Lazily produce one candidate per spreadsheet attachment of a message.
 * The sequence is finite and single-use, like any generator.
 */
export function* attachmentCandidates(
  message: FetchedMessage,
  fetchAttachment: AttachmentFetcher,
  accept: (filename: string) => boolean = isSpreadsheetFileName
): Generator<AttachmentCandidate> {
  const sender = extractSenderAddress(getHeader(message.headers, 'From'));
  for (const leaf of iterateFileLeaves(message.root)) {
    if (!accept(leaf.filename)) continue;
    const body = leaf.body;
    const loadContent =
      body.kind === 'inline'
        ? () => Promise.resolve(body.data)
        : body.kind === 'attachment'
          ? () => fetchAttachment(message.id, body.attachmentId)
          : () => Promise.resolve(new Uint8Array());
    yield {
      messageId: message.id,
      rawFilename: leaf.filename,
      sender,
      mimeType: leaf.mimeType,
      loadContent
    };
  }
}
