/**
 * Run Orchestrator
 *
 * One run: authenticate, take the run lease, Mail to Drive, Drive to Sheet,
 * then record the run (summary row, notification, errors file) and release
 * the lease. Item failures never stop the run; an authentication failure ends
 * the work phase but the run is still recorded.
 */

import { writeErrorsOut } from '../errorsOut.js';
import { AuthenticationError } from '../google/auth.js';
import { ExistingStateIndex } from '../index/existingStateIndex.js';
import { RunLease, type LeaseAttempt } from '../lock/runLease.js';
import { buildNotification, resolveRecipients } from '../notification/notificationContent.js';
import { errorMessage } from '../reconciler/types.js';
import { appendRunSummary } from '../runLog/summaryLog.js';
import type { Collaborators } from '../stores/types.js';
import { computeStatus } from '../summary.js';
import { formatTimestamp } from '../time.js';
import type { ErrorRecord, RunSummary } from '../types.js';
import { silentProgress } from '../ui/progressUI.js';
import { runDatasetWorkflow } from '../workflows/datasetWorkflow.js';
import { runInboxWorkflow } from '../workflows/inboxWorkflow.js';
import { tallyOutcomes } from './tally.js';
import type { OrchestratorDeps, RunContext, RunResult } from './types.js';

export function createRunSummary(startedAt: Date, gmailDaysBack: number, filesDaysBack: number): RunSummary {
  return {
    startedAt,
    endedAt: null,
    gmailDaysBack,
    filesDaysBack,
    emailsChecked: 0,
    attachmentsFound: 0,
    attachmentsSaved: 0,
    attachmentsSkipped: 0,
    attachmentsFailed: 0,
    filesFound: 0,
    filesProcessed: 0,
    filesSkipped: 0,
    filesFailed: 0,
    duplicatesRemoved: 0,
    status: 'Not Started'
  };
}

export class RunOrchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(): Promise<RunResult> {
    const { config, logger } = this.deps;
    const startedAt = this.clock();
    const summary = createRunSummary(startedAt, config.gmail.daysBack, config.sourceFiles.daysBack);
    const errors: ErrorRecord[] = [];
    const recordError = (scope: ErrorRecord['scope'], item: string, err: unknown) => {
      errors.push({ scope, item, errorMessage: errorMessage(err), timestamp: formatTimestamp(this.clock()) });
    };

    summary.status = 'Running';
    logger.step(`Workflow started at ${formatTimestamp(startedAt)}`);

    let collaborators: Collaborators | undefined;
    let lease: RunLease | undefined;
    let index: ExistingStateIndex | undefined;

    try {
      try {
        collaborators = await this.deps.connect();
      } catch (err) {
        const kind = err instanceof AuthenticationError ? 'Authentication failed' : 'Could not connect';
        logger.error(`${kind}: ${errorMessage(err)}`);
        recordError('workflow', 'authentication', err);
        summary.status = 'Failed - Authentication Error';
      }

      if (collaborators) {
        const attempt = await this.acquireLease();
        if (!attempt.acquired) {
          const holder = attempt.holder;
          logger.warn(
            holder
              ? `Another run (pid ${holder.pid} on ${holder.host}, started ${holder.startedAt}) holds the lease; skipping`
              : 'Another run holds the lease; skipping'
          );
          summary.status = 'Skipped - Another Run In Progress';
        } else {
          lease = attempt.lease;
          index = new ExistingStateIndex(collaborators.files, logger);
          const ctx: RunContext = {
            config,
            collaborators,
            index,
            logger,
            progress: this.deps.progress ?? silentProgress,
            now: startedAt,
            recordError
          };

          const inbox = await runInboxWorkflow(ctx);
          const attachments = tallyOutcomes(inbox.outcomes);
          summary.emailsChecked = inbox.emailsChecked;
          summary.attachmentsFound = inbox.attachmentsFound;
          summary.attachmentsSaved = attachments.accepted;
          summary.attachmentsSkipped = attachments.skipped;
          summary.attachmentsFailed = attachments.failed;

          const dataset = await runDatasetWorkflow(ctx);
          const files = tallyOutcomes(dataset.outcomes);
          summary.filesFound = dataset.filesFound;
          summary.filesProcessed = files.accepted;
          summary.filesSkipped = files.skipped;
          summary.filesFailed = files.failed;
          summary.duplicatesRemoved = dataset.duplicatesRemoved;

          summary.status = computeStatus(summary);
        }
      }
    } catch (err) {
      logger.error(`Workflow failed: ${errorMessage(err)}`);
      recordError('workflow', 'run', err);
      summary.status = `Failed - ${errorMessage(err)}`;
    }

    summary.endedAt = this.clock();
    logger.info(`Workflow finished with status: ${summary.status}`);

    await this.saveSummary(collaborators, summary);
    await this.notify(collaborators, summary);
    await this.writeErrors(errors);

    if (lease) {
      try {
        await lease.release();
      } catch (err) {
        logger.warn(`Could not release run lease: ${errorMessage(err)}`);
      }
    }

    const cacheStats = index?.getStats().folderCache;
    if (cacheStats) {
      logger.info(
        `Folder listings: ${cacheStats.misses} fetched (${cacheStats.pagesFetched} pages), ` +
          `${cacheStats.hits} cache hits, ${cacheStats.invalidations} invalidations`
      );
    }
    return { summary, errors, cacheStats };
  }

  private acquireLease(): Promise<LeaseAttempt> {
    if (this.deps.acquireLease) return this.deps.acquireLease();
    const { dir, ttlMinutes } = this.deps.config.lease;
    return RunLease.acquire(dir, ttlMinutes, this.clock());
  }

  private async saveSummary(collaborators: Collaborators | undefined, summary: RunSummary): Promise<void> {
    const { config, logger } = this.deps;
    if (!collaborators) {
      logger.error('Cannot save workflow summary: no authenticated connection');
      return;
    }
    try {
      await appendRunSummary(collaborators.dataset, config.summarySheetName, summary, logger);
    } catch (err) {
      logger.error(`Failed to save workflow summary: ${errorMessage(err)}`);
    }
  }

  private async notify(collaborators: Collaborators | undefined, summary: RunSummary): Promise<void> {
    const { config, logger } = this.deps;
    if (!collaborators) {
      logger.error('Cannot send notification: no authenticated connection');
      return;
    }
    try {
      const own = config.notification.notifySelf ? await collaborators.inbox.ownAddress() : undefined;
      const recipients = resolveRecipients(config.notification.recipients, own);
      if (recipients.length === 0) {
        logger.warn('No recipients configured for email notification');
        return;
      }
      await collaborators.notifier.send(
        buildNotification(summary, recipients, config.notification.subjectPrefix, this.clock())
      );
      logger.info(`Email notification sent to ${recipients.join(', ')}`);
    } catch (err) {
      logger.error(`Failed to send email notification: ${errorMessage(err)}`);
    }
  }

  private async writeErrors(errors: ErrorRecord[]): Promise<void> {
    const { config, logger } = this.deps;
    if (!config.errorsOutPath || errors.length === 0) return;
    try {
      await writeErrorsOut(config.errorsOutPath, errors);
      logger.info(`Wrote ${errors.length} error records to ${config.errorsOutPath}`);
    } catch (err) {
      logger.error(`Failed to write errors file: ${errorMessage(err)}`);
    }
  }
}
