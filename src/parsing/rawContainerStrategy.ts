/**
 * Reads cell values straight out of the OOXML package for workbooks the
 * workbook reader rejects. Styles, formulas and types beyond the stored value
 * are ignored.
 */

import AdmZip from 'adm-zip';
import type { ParseStrategy, RawCell, RawGrid } from './types.js';

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

export function decodeXmlText(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) return String.fromCodePoint(parseInt(entity.slice(2), 16));
    if (entity.startsWith('#')) return String.fromCodePoint(parseInt(entity.slice(1), 10));
    return ENTITIES[entity] ?? match;
  });
}

function textRuns(xml: string): string {
  const parts: string[] = [];
  for (const match of xml.matchAll(/<t(?:\s[^>]*)?>([\s\S]*?)<\/t>/g)) {
    parts.push(decodeXmlText(match[1]));
  }
  return parts.join('');
}

export function parseSharedStrings(xml: string): string[] {
  return [...xml.matchAll(/<si>([\s\S]*?)<\/si>/g)].map(match => textRuns(match[1]));
}

/** "AB12" -> { column: 28, row: 12 } (both 1-based). */
export function parseCellRef(ref: string): { column: number; row: number } | null {
  const match = /^([A-Z]+)(\d+)$/.exec(ref);
  if (!match) return null;
  let column = 0;
  for (const letter of match[1]) {
    column = column * 26 + (letter.charCodeAt(0) - 64);
  }
  return { column, row: parseInt(match[2], 10) };
}

function attribute(attrs: string, name: string): string | undefined {
  return new RegExp(`\\b${name}="([^"]*)"`).exec(attrs)?.[1];
}

function cellValue(type: string | undefined, inner: string, sharedStrings: string[]): RawCell {
  if (type === 'inlineStr') return textRuns(inner);
  const raw = /<v(?:\s[^>]*)?>([\s\S]*?)<\/v>/.exec(inner)?.[1];
  if (raw === undefined) return null;
  const text = decodeXmlText(raw);
  switch (type) {
    case 's':
      return sharedStrings[parseInt(text, 10)] ?? text;
    case 'b':
      return text === '1';
    case 'str':
    case 'e':
      return text;
    default: {
      const n = Number(text);
      return text.trim() !== '' && Number.isFinite(n) ? n : text;
    }
  }
}

export function parseWorksheet(xml: string, sharedStrings: string[]): RawGrid {
  const cells = new Map<string, RawCell>();
  let maxRow = 0;
  let maxColumn = 0;

  for (const match of xml.matchAll(/<c\b([^>]*?)(?:\/>|>([\s\S]*?)<\/c>)/g)) {
    const attrs = match[1];
    const ref = attribute(attrs, 'r');
    const position = ref ? parseCellRef(ref) : null;
    if (!position) continue;
    cells.set(`${position.row}:${position.column}`, cellValue(attribute(attrs, 't'), match[2] ?? '', sharedStrings));
    maxRow = Math.max(maxRow, position.row);
    maxColumn = Math.max(maxColumn, position.column);
  }

  const grid: RawGrid = [];
  for (let r = 1; r <= maxRow; r++) {
    const line: RawCell[] = [];
    for (let c = 1; c <= maxColumn; c++) {
      line.push(cells.get(`${r}:${c}`) ?? null);
    }
    grid.push(line);
  }
  return grid;
}

function worksheetOrder(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

export const rawContainerStrategy: ParseStrategy = {
  name: 'raw-container',

  async decode(content: Uint8Array): Promise<RawGrid | null> {
    let zip: AdmZip;
    try {
      zip = new AdmZip(Buffer.from(content));
    } catch {
      return null;
    }

    const entries = zip.getEntries();
    const sharedEntry = entries.find(entry => entry.entryName === 'xl/sharedStrings.xml');
    const sharedStrings = sharedEntry ? parseSharedStrings(sharedEntry.getData().toString('utf8')) : [];

    const sheets = entries
      .map(entry => entry.entryName)
      .filter(name => /^xl\/worksheets\/[^/]+\.xml$/.test(name))
      .sort(worksheetOrder);
    if (sheets.length === 0) return null;

    const sheetEntry = zip.getEntry(sheets[0]);
    if (!sheetEntry) return null;
    const grid = parseWorksheet(sheetEntry.getData().toString('utf8'), sharedStrings);
    return grid.length > 0 ? grid : null;
  }
};
