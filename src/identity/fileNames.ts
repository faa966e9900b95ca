/**
 * Stored-name derivation for attachments.
 *
 * The stored name is the only handle we have for "was this attachment already
 * uploaded?", so it must be a pure function of (message id, file name).
 */

export const MAX_FILE_NAME_LENGTH = 100;

const ILLEGAL_FILE_NAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Replace characters that are illegal in file names and bound the length,
 * keeping the final extension when the name has to be cut.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(ILLEGAL_FILE_NAME_CHARS, "_");
  if (cleaned.length <= MAX_FILE_NAME_LENGTH) return cleaned;

  const dot = cleaned.lastIndexOf(".");
  const extension = dot > 0 ? cleaned.slice(dot + 1) : "";
  // The base needs at least one character plus the dot
  if (!extension || extension.length + 2 > MAX_FILE_NAME_LENGTH) {
    return cleaned.slice(0, MAX_FILE_NAME_LENGTH);
  }
  const base = cleaned.slice(0, dot);
  return `${base.slice(0, MAX_FILE_NAME_LENGTH - extension.length - 1)}.${extension}`;
}

export function computeStoredFileKey(messageId: string, rawFilename: string): string {
  return sanitizeFileName(`${messageId}_${rawFilename}`);
}

/**
 * Pull the bare address out of a From header ("Name <a@b.c>" -> "a@b.c").
 */
export function extractSenderAddress(fromHeader: string | undefined): string {
  const header = (fromHeader ?? "").trim();
  if (!header) return "Unknown";
  const open = header.indexOf("<");
  const close = header.indexOf(">", open + 1);
  if (open >= 0 && close > open) {
    const address = header.slice(open + 1, close).trim();
    if (address) return address;
  }
  return header;
}

const SPREADSHEET_EXTENSIONS = [".xls", ".xlsx", ".xlsm"];

export function isSpreadsheetFileName(name: string): boolean {
  const lower = name.toLowerCase();
  return SPREADSHEET_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Mime type used when storing an attachment. Everything but legacy .xls is
 * stored as OOXML so the dataset listing (which filters by mime type) sees it.
 */
export function spreadsheetMimeType(name: string): string {
  return name.toLowerCase().endsWith(".xls")
    ? "application/vnd.ms-excel"
    : "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
}
