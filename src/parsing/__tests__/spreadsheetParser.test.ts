/**
 * Tests for spreadsheet parsing
 *
 * Usage: node --import tsx --test src/parsing/__tests__/spreadsheetParser.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import AdmZip from 'adm-zip';
import ExcelJS from 'exceljs';
import { createCaptureLogger } from '../../testing/captureLogger.js';
import { decodeXmlText, parseCellRef, rawContainerStrategy } from '../rawContainerStrategy.js';
import { parseSpreadsheet } from '../spreadsheetParser.js';
import { buildTable, cleanCell, uniqueHeaders } from '../tableBuilder.js';
import type { ParseStrategy } from '../types.js';

const options = { headerRow: 0, requiredColumnIndex: 0 };
const encode = (text: string) => new TextEncoder().encode(text);

function rawPackage(): Uint8Array {
  const zip = new AdmZip();
  zip.addFile(
    'xl/sharedStrings.xml',
    Buffer.from(
      '<sst><si><t>PO No</t></si><si><t>Sku Code</t></si>' +
        '<si><r><t>PO</t></r><r><t xml:space="preserve">1</t></r></si><si><t>A &amp; B</t></si></sst>'
    )
  );
  zip.addFile(
    'xl/worksheets/sheet1.xml',
    Buffer.from(
      '<worksheet><sheetData>' +
        '<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c>' +
        '<c r="C1" t="inlineStr"><is><t>Qty</t></is></c></row>' +
        '<row r="2"><c r="A2" t="s"><v>2</v></c><c r="B2" t="s"><v>3</v></c><c r="C2"><v>12.5</v></c></row>' +
        '<row r="3"><c r="A3" t="str"><v>PO2</v></c><c r="C3" t="b"><v>1</v></c></row>' +
        '</sheetData></worksheet>'
    )
  );
  return new Uint8Array(zip.toBuffer());
}

describe('tableBuilder', () => {
  it('cleans cells, drops blank lines, missing required values and repeated rows', () => {
    const table = buildTable(
      [
        ['PO No', 'Sku Code', null],
        [' PO1 ', "SKU'1", 5],
        ['PO1', 'SKU1', 5],
        [null, null, null],
        ['nan', 'x', 1],
        ['', 'y', 2]
      ],
      options
    );
    assert.deepEqual(table, {
      columns: ['PO No', 'Sku Code', 'Column_3'],
      rows: [{ 'PO No': 'PO1', 'Sku Code': 'SKU1', Column_3: 5 }]
    });
  });

  it('numbers repeated headers', () => {
    assert.deepEqual(uniqueHeaders(['A', 'A', '', 'A'], 4), ['A', 'A.1', 'Column_3', 'A.2']);
  });

  it('names columns by position when the file has no header line', () => {
    const table = buildTable([['x', 1]], { headerRow: -1, requiredColumnIndex: -1 });
    assert.deepEqual(table, { columns: ['Column_1', 'Column_2'], rows: [{ Column_1: 'x', Column_2: 1 }] });
  });

  it('returns an empty table when the header line is past the data', () => {
    assert.deepEqual(buildTable([['a'], ['b']], { headerRow: 2, requiredColumnIndex: 0 }), { columns: [], rows: [] });
  });

  it('ignores a required column the table does not have', () => {
    const table = buildTable([['A', 'B'], ['', 'y']], { headerRow: 0, requiredColumnIndex: 5 });
    assert.deepEqual(table.rows, [{ A: '', B: 'y' }]);
  });

  it('formats dates in UTC', () => {
    assert.equal(cleanCell(new Date(Date.UTC(2024, 0, 5, 7, 8, 9))), '2024-01-05 07:08:09');
    assert.equal(cleanCell(Number.NaN), '');
  });
});

describe('rawContainerStrategy', () => {
  it('reads shared, inline, boolean and numeric cells', async () => {
    const grid = await rawContainerStrategy.decode(rawPackage());
    assert.deepEqual(grid, [
      ['PO No', 'Sku Code', 'Qty'],
      ['PO1', 'A & B', 12.5],
      ['PO2', null, true]
    ]);
  });

  it('returns null for content that is not a zip package', async () => {
    assert.equal(await rawContainerStrategy.decode(encode('plain text')), null);
  });

  it('decodes cell references and entities', () => {
    assert.deepEqual(parseCellRef('AB12'), { column: 28, row: 12 });
    assert.equal(parseCellRef('a1'), null);
    assert.equal(decodeXmlText('&lt;&#65;&#x42;&unknown;'), '<AB&unknown;');
  });
});

describe('parseSpreadsheet', () => {
  it('reads a workbook written by ExcelJS', async () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('GRN');
    sheet.addRow(['PO No', 'Sku Code', 'Qty']);
    sheet.addRow(['PO1', 'SKU1', 4]);
    sheet.addRow(['PO2', 'SKU2', 8]);
    const buffer = await workbook.xlsx.writeBuffer();
    const { logger, lines } = createCaptureLogger();

    const table = await parseSpreadsheet(new Uint8Array(buffer), 'grn.xlsx', { ...options, logger });

    assert.deepEqual(table, {
      columns: ['PO No', 'Sku Code', 'Qty'],
      rows: [
        { 'PO No': 'PO1', 'Sku Code': 'SKU1', Qty: 4 },
        { 'PO No': 'PO2', 'Sku Code': 'SKU2', Qty: 8 }
      ]
    });
    assert.deepEqual(lines, [{ level: 'INFO', message: 'Read 2 rows from grn.xlsx (workbook)' }]);
  });

  it('reads a bare OOXML package through the raw reader', async () => {
    const table = await parseSpreadsheet(rawPackage(), 'raw.xlsx', { ...options, strategies: [rawContainerStrategy] });
    assert.deepEqual(table.rows, [
      { 'PO No': 'PO1', 'Sku Code': 'A & B', Qty: 12.5 },
      { 'PO No': 'PO2', 'Sku Code': '', Qty: true }
    ]);
  });

  it('falls back to delimited text saved under a workbook name', async () => {
    const table = await parseSpreadsheet(encode('PO No\tSku Code\tQty\nPO1\tSKU1\t5\n'), 'export.xls', options);
    assert.deepEqual(table, {
      columns: ['PO No', 'Sku Code', 'Qty'],
      rows: [{ 'PO No': 'PO1', 'Sku Code': 'SKU1', Qty: '5' }]
    });
  });

  it('reads comma-separated text', async () => {
    const table = await parseSpreadsheet(encode('PO No,Sku Code\n"PO1","SKU, large"\n'), 'export.xls', options);
    assert.deepEqual(table.rows, [{ 'PO No': 'PO1', 'Sku Code': 'SKU, large' }]);
  });

  it('logs a failing reader and moves on to the next', async () => {
    const broken: ParseStrategy = {
      name: 'broken',
      decode: () => Promise.reject(new Error('bad header'))
    };
    const fallback: ParseStrategy = {
      name: 'fallback',
      decode: async () => [['PO No'], ['PO9']]
    };
    const { logger, lines } = createCaptureLogger();

    const table = await parseSpreadsheet(encode('x'), 'f.xlsx', { ...options, strategies: [broken, fallback], logger });

    assert.deepEqual(table.rows, [{ 'PO No': 'PO9' }]);
    assert.deepEqual(lines, [
      { level: 'WARNING', message: 'broken reader failed on f.xlsx: bad header' },
      { level: 'INFO', message: 'Read 1 rows from f.xlsx (fallback)' }
    ]);
  });

  it('returns an empty table when no reader understands the file', async () => {
    const table = await parseSpreadsheet(new Uint8Array([0, 1, 2, 0]), 'junk.xlsx', options);
    assert.deepEqual(table, { columns: [], rows: [] });
  });
});
