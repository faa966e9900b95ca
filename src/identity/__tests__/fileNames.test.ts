/**
 * Tests for stored-name derivation
 *
 * Usage: node --import tsx --test src/identity/__tests__/fileNames.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  MAX_FILE_NAME_LENGTH,
  computeStoredFileKey,
  extractSenderAddress,
  isSpreadsheetFileName,
  sanitizeFileName,
  spreadsheetMimeType
} from '../fileNames.js';

describe('sanitizeFileName', () => {
  it('replaces every illegal character with an underscore', () => {
    assert.equal(sanitizeFileName('a<b>c:d"e/f\\g|h?i*j.xlsx'), 'a_b_c_d_e_f_g_h_i_j.xlsx');
  });

  it('leaves names within the limit untouched', () => {
    assert.equal(sanitizeFileName('grn_jan.xlsx'), 'grn_jan.xlsx');
  });

  it('keeps the extension when truncating', () => {
    const result = sanitizeFileName(`${'x'.repeat(150)}.xlsx`);
    assert.equal(result.length, MAX_FILE_NAME_LENGTH);
    assert.equal(result, `${'x'.repeat(95)}.xlsx`);
  });

  it('cuts at the limit when there is no extension', () => {
    assert.equal(sanitizeFileName('y'.repeat(120)), 'y'.repeat(100));
  });
});

describe('computeStoredFileKey', () => {
  it('joins message id and file name', () => {
    assert.equal(computeStoredFileKey('m123', 'report.xlsx'), 'm123_report.xlsx');
  });

  it('is deterministic', () => {
    const name = `${'long name '.repeat(20)}.xlsm`;
    assert.equal(computeStoredFileKey('m1', name), computeStoredFileKey('m1', name));
  });

  it('sanitizes the joined name', () => {
    assert.equal(computeStoredFileKey('m9', 'q1/q2.xlsx'), 'm9_q1_q2.xlsx');
  });
});

describe('extractSenderAddress', () => {
  it('takes the address between angle brackets', () => {
    assert.equal(extractSenderAddress('Alerts Team <alerts@example.com>'), 'alerts@example.com');
  });

  it('falls back to the whole header', () => {
    assert.equal(extractSenderAddress('  plain@example.com '), 'plain@example.com');
  });

  it('uses Unknown for a missing header', () => {
    assert.equal(extractSenderAddress(undefined), 'Unknown');
    assert.equal(extractSenderAddress('   '), 'Unknown');
  });
});

describe('spreadsheet file types', () => {
  it('recognizes the three workbook extensions in any case', () => {
    assert.equal(isSpreadsheetFileName('A.XLSX'), true);
    assert.equal(isSpreadsheetFileName('b.xlsm'), true);
    assert.equal(isSpreadsheetFileName('c.xls'), true);
    assert.equal(isSpreadsheetFileName('d.csv'), false);
  });

  it('maps legacy .xls to its own mime type', () => {
    assert.equal(spreadsheetMimeType('old.XLS'), 'application/vnd.ms-excel');
    assert.equal(
      spreadsheetMimeType('new.xlsm'),
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
  });
});
