/**
 * Tests for RunOrchestrator
 *
 * Usage: node --import tsx --test src/orchestrator/__tests__/runOrchestrator.test.ts
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from '../../config/loadConfig.js';
import { AuthenticationError } from '../../google/auth.js';
import { LEASE_FILE_NAME, type LeaseAttempt } from '../../lock/runLease.js';
import { SUMMARY_HEADERS } from '../../runLog/summaryLog.js';
import { createCaptureLogger } from '../../testing/captureLogger.js';
import {
  InMemoryDatasetStore,
  InMemoryFileStore,
  InMemoryInbox,
  RecordingNotifier,
  buildMessage
} from '../../testing/inMemoryStores.js';
import { formatTimestamp } from '../../time.js';
import { RunOrchestrator } from '../runOrchestrator.js';

const NOW = new Date('2025-01-03T09:00:00.000Z');
const STAMP = formatTimestamp(NOW);
const DATASET_HEADER = ['PO No', 'Sku Code', 'Qty', 'source_file_name'];

function buildWorld() {
  const files = new InMemoryFileStore();
  const inbox = new InMemoryInbox([
    buildMessage('m1', 'Alerts <alerts@example.com>', [{ filename: 'grn.xlsx' }]),
    buildMessage('m2', 'Alerts <alerts@example.com>', [{ filename: 'grn.xlsx' }, { filename: 'notes.pdf' }])
  ]);
  const dataset = new InMemoryDatasetStore({
    data: [DATASET_HEADER, ['PO1', 'SKU1', 5, 'grn_jan.xlsx'], ['PO1', 'SKU1', 5, 'grn_jan.xlsx']]
  });
  const notifier = new RecordingNotifier();
  return { files, inbox, dataset, notifier };
}

async function seedFiles(files: InMemoryFileStore): Promise<void> {
  const base = await files.createFolder('Gmail_Attachments');
  const sender = await files.createFolder('alerts@example.com', base.id);
  files.addFile(sender.id, 'm1_grn.xlsx');

  const encoder = new TextEncoder();
  files.addFile('source', 'grn_jan.xlsx', encoder.encode('PO No,Sku Code,Qty\nPO1,SKU1,5\n'), {
    createdAt: '2025-01-02T10:00:00.000Z'
  });
  files.addFile('source', 'grn_feb.xlsx', encoder.encode('PO No,Sku Code,Qty\nPO1,SKU1,5\nPO2,SKU2,6\n'), {
    createdAt: '2025-01-02T11:00:00.000Z'
  });
  files.addFile('source', 'broken.xlsx', new Uint8Array([0, 1, 2]), { createdAt: '2025-01-02T12:00:00.000Z' });
}

describe('RunOrchestrator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ingest-run-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function config(overrides: Record<string, string> = {}) {
    return loadConfig({
      SPREADSHEET_ID: 'sheet-1',
      SOURCE_FOLDER_ID: 'source',
      GMAIL_SENDER: 'alerts@example.com',
      NOTIFY_RECIPIENTS: 'team@example.com',
      REQUIRED_COLUMN_INDEX: '0',
      LOCK_DIR: path.join(dir, 'lock'),
      ...overrides
    });
  }

  it('runs both workflows and records the run', async () => {
    const world = buildWorld();
    await seedFiles(world.files);
    const { logger } = createCaptureLogger();
    const errorsPath = path.join(dir, 'errors.csv');

    const orchestrator = new RunOrchestrator({
      config: config({ ERRORS_OUT: errorsPath }),
      connect: async () => world,
      logger,
      clock: () => NOW
    });
    const { summary, errors } = await orchestrator.run();

    assert.equal(summary.status, 'Completed With Errors');
    assert.deepEqual(
      [summary.emailsChecked, summary.attachmentsFound, summary.attachmentsSaved, summary.attachmentsSkipped, summary.attachmentsFailed],
      [2, 2, 1, 1, 0]
    );
    assert.deepEqual(
      [summary.filesFound, summary.filesProcessed, summary.filesSkipped, summary.filesFailed, summary.duplicatesRemoved],
      [3, 1, 1, 1, 1]
    );

    assert.deepEqual(world.files.uploads, ['m2_grn.xlsx']);
    assert.deepEqual(world.inbox.queries.map(q => [q.sender, q.limit]), [['alerts@example.com', 5]]);
    assert.deepEqual(world.dataset.values('data'), [
      DATASET_HEADER,
      ['PO1', 'SKU1', 5, 'grn_jan.xlsx'],
      ['PO2', 'SKU2', 6, 'grn_feb.xlsx']
    ]);

    assert.deepEqual(errors, [
      { scope: 'file', item: 'broken.xlsx', errorMessage: 'No rows could be read from file', timestamp: STAMP }
    ]);
    assert.equal(
      await fs.promises.readFile(errorsPath, 'utf8'),
      `timestamp,scope,item,errorMessage\n${STAMP},file,broken.xlsx,No rows could be read from file\n`
    );

    assert.deepEqual(world.dataset.values('workflow_log'), [
      SUMMARY_HEADERS,
      [STAMP, STAMP, 2, 2, 1, 1, 0, 3, 1, 1, 1, 1, 'Completed With Errors']
    ]);

    assert.equal(world.notifier.sent.length, 1);
    assert.deepEqual(world.notifier.sent[0].recipients, ['team@example.com', 'ops@example.com']);
    assert.equal(world.notifier.sent[0].subject, `Inbox Ingest Workflow Summary - ${STAMP}`);

    assert.equal(fs.existsSync(path.join(dir, 'lock', LEASE_FILE_NAME)), false);
  });

  it('adds nothing on a second run over the same state', async () => {
    const world = buildWorld();
    await seedFiles(world.files);
    const deps = { config: config(), connect: async () => world, logger: createCaptureLogger().logger, clock: () => NOW };

    await new RunOrchestrator(deps).run();
    const afterFirst = world.dataset.values('data');
    const { summary } = await new RunOrchestrator(deps).run();

    assert.deepEqual(world.files.uploads, ['m2_grn.xlsx']);
    assert.deepEqual(world.dataset.values('data'), afterFirst);
    assert.equal(summary.attachmentsSaved, 0);
    assert.equal(summary.attachmentsSkipped, 2);
    assert.equal(summary.filesProcessed, 0);
    assert.equal(summary.filesSkipped, 2);
  });

  it('records an authentication failure without touching the stores', async () => {
    const { logger, lines } = createCaptureLogger();
    let leaseRequests = 0;

    const { summary, errors } = await new RunOrchestrator({
      config: config(),
      connect: () => Promise.reject(new AuthenticationError('No saved token')),
      logger,
      clock: () => NOW,
      acquireLease: async () => {
        leaseRequests++;
        return { acquired: false, holder: null };
      }
    }).run();

    assert.equal(summary.status, 'Failed - Authentication Error');
    assert.deepEqual(errors, [
      { scope: 'workflow', item: 'authentication', errorMessage: 'No saved token', timestamp: STAMP }
    ]);
    assert.equal(leaseRequests, 0);
    assert.deepEqual(
      lines.filter(line => line.level === 'ERROR').map(line => line.message),
      [
        'Authentication failed: No saved token',
        'Cannot save workflow summary: no authenticated connection',
        'Cannot send notification: no authenticated connection'
      ]
    );
  });

  it('skips the work when another run holds the lease', async () => {
    const world = buildWorld();
    const { logger, lines } = createCaptureLogger();
    const held: LeaseAttempt = {
      acquired: false,
      holder: { pid: 42, host: 'other-host', startedAt: '2025-01-03T08:55:00.000Z' }
    };

    const { summary } = await new RunOrchestrator({
      config: config(),
      connect: async () => world,
      logger,
      clock: () => NOW,
      acquireLease: async () => held
    }).run();

    assert.equal(summary.status, 'Skipped - Another Run In Progress');
    assert.deepEqual(world.inbox.queries, []);
    assert.equal(world.notifier.sent.length, 1);
    assert.deepEqual(world.dataset.values('workflow_log')[1].slice(2), [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 'Skipped - Another Run In Progress']);
    assert.ok(
      lines.some(
        line =>
          line.level === 'WARNING' &&
          line.message === 'Another run (pid 42 on other-host, started 2025-01-03T08:55:00.000Z) holds the lease; skipping'
      )
    );
  });

  it('still notifies when the summary row cannot be written', async () => {
    const world = buildWorld();
    world.dataset.failWrites.add('workflow_log');
    const { logger, lines } = createCaptureLogger();

    await new RunOrchestrator({ config: config(), connect: async () => world, logger, clock: () => NOW }).run();

    assert.equal(world.notifier.sent.length, 1);
    assert.ok(
      lines.some(line => line.level === 'ERROR' && line.message === 'Failed to save workflow summary: cannot write workflow_log')
    );
  });

  it('keeps going when the inbox search fails', async () => {
    const world = buildWorld();
    world.inbox.failSearch = true;
    await seedFiles(world.files);

    const { summary, errors } = await new RunOrchestrator({
      config: config(),
      connect: async () => world,
      logger: createCaptureLogger().logger,
      clock: () => NOW
    }).run();

    assert.equal(summary.emailsChecked, 0);
    assert.equal(summary.filesProcessed, 1);
    assert.deepEqual(
      errors.map(error => [error.scope, error.item, error.errorMessage]),
      [
        ['workflow', 'inbox search', 'search unavailable'],
        ['file', 'broken.xlsx', 'No rows could be read from file']
      ]
    );
  });

  it('reports a failed notification without changing the status', async () => {
    const world = buildWorld();
    world.notifier.fail = true;
    const { logger, lines } = createCaptureLogger();

    const { summary } = await new RunOrchestrator({ config: config(), connect: async () => world, logger, clock: () => NOW }).run();

    assert.equal(summary.status, 'Completed Successfully');
    assert.ok(lines.some(line => line.message === 'Failed to send email notification: mail rejected'));
  });
});
