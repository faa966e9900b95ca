/**
 * Run summary e-mail: subject, recipients and the two body alternatives.
 */

import type { NotificationMessage } from '../stores/types.js';
import { formatClock, formatTimestamp } from '../time.js';
import type { RunSummary } from '../types.js';

export interface SummarySection {
  title: string;
  items: [label: string, value: string][];
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildSubject(prefix: string, at: Date): string {
  return `${prefix} Workflow Summary - ${formatTimestamp(at)}`;
}

/**
 * Configured recipients plus, optionally, the mailbox's own address.
 * Addresses are de-duplicated without regard to case; order is kept.
 */
export function resolveRecipients(configured: string[], ownAddress: string | undefined): string[] {
  const seen = new Set<string>();
  const recipients: string[] = [];
  for (const address of [...configured, ownAddress ?? '']) {
    const trimmed = address.trim();
    if (!trimmed || seen.has(trimmed.toLowerCase())) continue;
    seen.add(trimmed.toLowerCase());
    recipients.push(trimmed);
  }
  return recipients;
}

export function durationMinutes(summary: RunSummary, now: Date): string {
  const end = summary.endedAt ?? now;
  return ((end.getTime() - summary.startedAt.getTime()) / 60000).toFixed(2);
}

export function workflowTime(summary: RunSummary, now: Date): string {
  return `${formatTimestamp(summary.startedAt)} to ${formatClock(summary.endedAt ?? now)}`;
}

export function summarySections(summary: RunSummary): SummarySection[] {
  return [
    {
      title: 'Mail to Drive',
      items: [
        ['Days Back Parameter', `${summary.gmailDaysBack} days`],
        ['Emails Checked', String(summary.emailsChecked)],
        ['Attachments Found', String(summary.attachmentsFound)],
        ['Attachments Uploaded', String(summary.attachmentsSaved)],
        ['Attachments Skipped', String(summary.attachmentsSkipped)],
        ['Failed to Upload', String(summary.attachmentsFailed)]
      ]
    },
    {
      title: 'Drive to Sheet',
      items: [
        ['Days Back Parameter', `${summary.filesDaysBack} days`],
        ['Files Found', String(summary.filesFound)],
        ['Files Processed', String(summary.filesProcessed)],
        ['Files Skipped', String(summary.filesSkipped)],
        ['Files Failed to Process', String(summary.filesFailed)],
        ['Duplicate Records Removed', String(summary.duplicatesRemoved)]
      ]
    }
  ];
}

export function renderText(summary: RunSummary, now: Date): string {
  const lines = [
    'Workflow Summary',
    '',
    `Workflow Time: ${workflowTime(summary, now)}`,
    `Duration: ${durationMinutes(summary, now)} minutes`,
    `Status: ${summary.status}`
  ];
  for (const section of summarySections(summary)) {
    lines.push('', `${section.title}:`);
    for (const [label, value] of section.items) {
      lines.push(`- ${label}: ${value}`);
    }
  }
  lines.push('', '---', `Sent at ${formatTimestamp(now)}`);
  return lines.join('\n');
}

export function renderHtml(summary: RunSummary, now: Date): string {
  const parts = [
    '<html><body style="font-family: Arial, sans-serif; line-height: 1.6;">',
    '<h2>Workflow Summary</h2>',
    `<p><strong>Workflow Time:</strong> ${escapeHtml(workflowTime(summary, now))}</p>`,
    `<p><strong>Duration:</strong> ${durationMinutes(summary, now)} minutes</p>`,
    `<p><strong>Status:</strong> ${escapeHtml(summary.status)}</p>`
  ];
  for (const section of summarySections(summary)) {
    parts.push(`<h3>${escapeHtml(section.title)}</h3>`, '<ul>');
    for (const [label, value] of section.items) {
      parts.push(`<li><strong>${escapeHtml(label)}:</strong> ${escapeHtml(value)}</li>`);
    }
    parts.push('</ul>');
  }
  parts.push(
    '<hr>',
    `<p style="color: #666; font-size: 0.9em;">Sent at ${escapeHtml(formatTimestamp(now))}</p>`,
    '</body></html>'
  );
  return parts.join('\n');
}

export function buildNotification(
  summary: RunSummary,
  recipients: string[],
  subjectPrefix: string,
  now: Date
): NotificationMessage {
  return {
    recipients,
    subject: buildSubject(subjectPrefix, now),
    html: renderHtml(summary, now),
    text: renderText(summary, now)
  };
}
