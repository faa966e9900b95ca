/**
 * Tests for DatasetAppender
 *
 * Usage: node --import tsx --test src/dataset/__tests__/datasetAppender.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { createCaptureLogger } from '../../testing/captureLogger.js';
import { InMemoryDatasetStore } from '../../testing/inMemoryStores.js';
import { DatasetAppender, placeColumns } from '../datasetAppender.js';
import { sheetRange } from '../ranges.js';

describe('sheetRange', () => {
  it('quotes sheet names', () => {
    assert.equal(sheetRange('data'), "'data'");
    assert.equal(sheetRange("Bob's data", 'A1'), "'Bob''s data'!A1");
  });
});

describe('DatasetAppender', () => {
  it('writes the header together with the first rows of an empty sheet', async () => {
    const store = new InMemoryDatasetStore();
    const appender = new DatasetAppender(store, 'data', createCaptureLogger().logger);

    const written = await appender.append(['PO No', 'Qty'], [{ 'PO No': 'PO1', Qty: 3 }]);

    assert.equal(written, 1);
    assert.deepEqual(store.calls, ["read 'data'!1:1", "append 'data'!A1 USER_ENTERED 2"]);
    assert.deepEqual(store.values('data'), [
      ['PO No', 'Qty'],
      ['PO1', 3]
    ]);
  });

  it('projects rows onto the existing header order', async () => {
    const store = new InMemoryDatasetStore({ data: [['Qty', 'PO No', 'Note']] });
    const appender = new DatasetAppender(store, 'data', createCaptureLogger().logger);

    await appender.append(['PO No', 'Qty'], [{ 'PO No': 'PO1', Qty: 3 }]);

    assert.deepEqual(store.values('data'), [
      ['Qty', 'PO No', 'Note'],
      [3, 'PO1']
    ]);
  });

  it('adds columns the header lacks before appending', async () => {
    const store = new InMemoryDatasetStore({ data: [['PO No'], ['PO0']] });
    const { logger, lines } = createCaptureLogger();
    const appender = new DatasetAppender(store, 'data', logger);

    await appender.append(['PO No', 'source_file_name'], [{ 'PO No': 'PO1', source_file_name: 'a.xlsx' }]);

    assert.deepEqual(store.calls, [
      "read 'data'!1:1",
      "update 'data'!A1 RAW 1",
      "append 'data'!A1 USER_ENTERED 1"
    ]);
    assert.deepEqual(store.values('data'), [['PO No', 'source_file_name'], ['PO0'], ['PO1', 'a.xlsx']]);
    assert.deepEqual(lines, [{ level: 'INFO', message: 'Added 1 new column(s) to "data": source_file_name' }]);
  });

  it('writes into differently-cased and anchored header columns without adding any', async () => {
    const store = new InMemoryDatasetStore({ data: [['Qty', 'Purchase PO', 'Source_File_Name']] });
    const appender = new DatasetAppender(store, 'data', createCaptureLogger().logger);
    const anchors = new Map([
      ['PO No', 'po'],
      ['source_file_name', 'source_file_name']
    ]);

    await appender.append(
      ['PO No', 'QTY', 'source_file_name'],
      [{ 'PO No': 'PO1', QTY: 3, source_file_name: 'a.xlsx' }],
      anchors
    );

    assert.deepEqual(store.calls, ["read 'data'!1:1", "append 'data'!A1 USER_ENTERED 1"]);
    assert.deepEqual(store.values('data'), [
      ['Qty', 'Purchase PO', 'Source_File_Name'],
      [3, 'PO1', 'a.xlsx']
    ]);
  });

  it('reads the header once per run', async () => {
    const store = new InMemoryDatasetStore();
    const appender = new DatasetAppender(store, 'data', createCaptureLogger().logger);

    await appender.append(['A'], [{ A: 1 }]);
    await appender.append(['A'], [{ A: 2 }]);

    assert.equal(store.calls.filter(call => call.startsWith('read')).length, 1);
    assert.deepEqual(store.values('data'), [['A'], [1], [2]]);
  });

  it('writes nothing for an empty batch', async () => {
    const store = new InMemoryDatasetStore();
    const appender = new DatasetAppender(store, 'data', createCaptureLogger().logger);
    assert.equal(await appender.append(['A'], []), 0);
    assert.deepEqual(store.calls, []);
  });

  it('treats an unreadable header as empty', async () => {
    const store = new InMemoryDatasetStore();
    store.failReads.add('data');
    const { logger, lines } = createCaptureLogger();
    const appender = new DatasetAppender(store, 'data', logger);

    assert.deepEqual(await appender.getHeader(), []);
    assert.deepEqual(lines, [
      { level: 'WARNING', message: 'Could not read header of sheet "data", treating it as empty: cannot read data' }
    ]);
  });
});

describe('placeColumns', () => {
  it('lets anchored columns claim their position before name matches', () => {
    const placement = placeColumns(['PO Date', 'po date', 'Qty'], ['PO Date', 'PO No'], new Map([['PO No', 'po']]));
    assert.deepEqual(placement, { slots: ['PO No', 'PO Date', undefined], missing: [] });
  });

  it('reports columns with no free position as missing', () => {
    const placement = placeColumns(['SKU'], ['sku', 'Sku Code'], new Map([['Sku Code', 'sku']]));
    assert.deepEqual(placement, { slots: ['Sku Code'], missing: ['sku'] });
  });
});
