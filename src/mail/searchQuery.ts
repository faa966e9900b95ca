import type { InboxQuery } from '../stores/types.js';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '')}"`;
}

/**
 * Gmail search expression for spreadsheet-carrying messages, e.g.
 * `has:attachment from:"alerts@example.com" "GRN" after:2025/01/03`.
 */
export function buildSearchQuery(query: InboxQuery): string {
  const parts = ['has:attachment'];
  if (query.sender && query.sender.trim()) {
    parts.push(`from:${quote(query.sender.trim())}`);
  }
  if (query.term && query.term.trim()) {
    parts.push(quote(query.term.trim()));
  }
  const since = query.since;
  parts.push(`after:${since.getFullYear()}/${pad2(since.getMonth() + 1)}/${pad2(since.getDate())}`);
  return parts.join(' ');
}
