import { Readable } from 'node:stream';
import ExcelJS from 'exceljs';
import type { CellValue as ExcelCellValue } from 'exceljs';
import type { ParseStrategy, RawCell, RawGrid } from './types.js';

export function fromExcelValue(value: ExcelCellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map(part => part.text).join('');
  if ('hyperlink' in value) return typeof value.text === 'string' ? value.text : value.hyperlink;
  if ('result' in value) return value.result === undefined ? null : fromExcelValue(value.result);
  // Formula without cached result, or an error cell
  return null;
}

/**
 * First worksheet of an OOXML workbook, read with ExcelJS.
 */
export const workbookStrategy: ParseStrategy = {
  name: 'workbook',

  async decode(content: Uint8Array): Promise<RawGrid | null> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.read(Readable.from([Buffer.from(content)]));
    } catch {
      return null;
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) return null;

    const width = sheet.columnCount;
    const grid: RawGrid = [];
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const line: RawCell[] = [];
      for (let c = 1; c <= width; c++) {
        line.push(fromExcelValue(row.getCell(c).value));
      }
      grid.push(line);
    }
    return grid.length > 0 ? grid : null;
  }
};
