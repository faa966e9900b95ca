/**
 * Tests for run status and the summary box
 *
 * Usage: node --import tsx --test src/__tests__/summary.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { createRunSummary } from '../orchestrator/runOrchestrator.js';
import { computeStatus, renderSummaryBox } from '../summary.js';

// eslint-disable-next-line no-control-regex
const stripColor = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, '');

describe('computeStatus', () => {
  it('reports errors only when an item failed', () => {
    assert.equal(computeStatus({ attachmentsFailed: 0, filesFailed: 0 }), 'Completed Successfully');
    assert.equal(computeStatus({ attachmentsFailed: 1, filesFailed: 0 }), 'Completed With Errors');
    assert.equal(computeStatus({ attachmentsFailed: 0, filesFailed: 2 }), 'Completed With Errors');
  });
});

describe('renderSummaryBox', () => {
  it('pads every line to the widest one', () => {
    const summary = createRunSummary(new Date(2025, 0, 3, 9, 0, 0), 2, 2);
    Object.assign(summary, {
      endedAt: new Date(2025, 0, 3, 9, 1, 30),
      attachmentsFound: 3,
      attachmentsSaved: 2,
      attachmentsSkipped: 1,
      status: 'Completed Successfully'
    });

    const lines = stripColor(renderSummaryBox(summary)).split('\n');

    assert.equal(lines[0], `┌${'─'.repeat(46)}┐`);
    assert.equal(lines[1], `│ ${'SUMMARY'.padEnd(44)} │`);
    assert.equal(lines[4], '│ Attachments saved/skipped/failed: 2/1/0 of 3 │');
    assert.equal(lines[7], `│ ${'Duration: 1m 30s'.padEnd(44)} │`);
    assert.equal(lines[8], `└${'─'.repeat(46)}┘`);
  });

  it('adds folder listing statistics when there were lookups', () => {
    const summary = createRunSummary(new Date(2025, 0, 3, 9, 0, 0), 2, 2);
    const text = stripColor(
      renderSummaryBox(summary, { hits: 4, misses: 2, invalidations: 1, pagesFetched: 3, folders: 2 })
    );
    assert.match(text, /│ Folder listing hits\/misses: 4\/2 +│/);
    assert.match(text, /│ Folder listing pages: 3 +│/);
  });
});
