import type { gmail_v1 } from 'googleapis';
import type { NotificationMessage, NotificationSink } from '../stores/types.js';
import { withRetry, type RetryOptions } from './retry.js';

export function base64UrlEncode(content: string | Buffer): string {
  return Buffer.from(content).toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

function encodeHeaderWord(value: string): string {
  // eslint-disable-next-line no-control-regex
  return /^[\x00-\x7F]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

function base64Body(content: string): string {
  const encoded = Buffer.from(content, 'utf8').toString('base64');
  return encoded.match(/.{1,76}/g)?.join('\r\n') ?? '';
}

/**
 * RFC 2822 message with a plain-text and an HTML alternative.
 */
export function buildMimeMessage(message: NotificationMessage, boundary: string): string {
  const lines = [
    `To: ${message.recipients.join(', ')}`,
    `Subject: ${encodeHeaderWord(message.subject)}`,
    'MIME-Version: 1.0',
    `Content-Type: multipart/alternative; boundary="${boundary}"`,
    '',
    `--${boundary}`,
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    base64Body(message.text),
    `--${boundary}`,
    'Content-Type: text/html; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    base64Body(message.html),
    `--${boundary}--`,
    ''
  ];
  return lines.join('\r\n');
}

export class GmailNotifier implements NotificationSink {
  constructor(
    private readonly gmail: gmail_v1.Gmail,
    private readonly retry: RetryOptions = {}
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const boundary = `part_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 10)}`;
    const raw = base64UrlEncode(buildMimeMessage(message, boundary));
    await withRetry(
      () => this.gmail.users.messages.send({ userId: 'me', requestBody: { raw } }),
      this.retry
    );
  }
}
