import { parse } from 'csv-parse/sync';
import type { ParseStrategy, RawGrid } from './types.js';

function looksBinary(text: string): boolean {
  return text.slice(0, 1024).includes('\u0000');
}

function detectDelimiter(firstLine: string): string {
  const tabs = firstLine.split('\t').length - 1;
  const commas = firstLine.split(',').length - 1;
  return tabs > commas ? '\t' : ',';
}

/**
 * Tab- or comma-separated text saved under a spreadsheet extension, as some
 * reporting systems export it.
 */
export const delimitedTextStrategy: ParseStrategy = {
  name: 'delimited-text',

  async decode(content: Uint8Array): Promise<RawGrid | null> {
    const text = Buffer.from(content).toString('utf8');
    if (!text.trim() || looksBinary(text)) return null;

    const firstLine = text.split(/\r?\n/, 1)[0];
    try {
      const records: string[][] = parse(text, {
        delimiter: detectDelimiter(firstLine),
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true
      });
      return records.length > 0 ? records : null;
    } catch {
      return null;
    }
  }
};
