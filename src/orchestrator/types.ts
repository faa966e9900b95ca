/**
 * Run Orchestrator types
 */

import type { IngestConfig } from '../config/types.js';
import type { ExistingStateIndex } from '../index/existingStateIndex.js';
import type { FolderListingCacheStats } from '../cache/folderListingCache.js';
import type { LeaseAttempt } from '../lock/runLease.js';
import type { Logger } from '../logger.js';
import type { Collaborators } from '../stores/types.js';
import type { ProgressReporter } from '../ui/progressUI.js';
import type { ErrorRecord, RunSummary } from '../types.js';

/**
 * Everything a workflow needs for one run.
 */
export interface RunContext {
  config: IngestConfig;
  collaborators: Collaborators;
  index: ExistingStateIndex;
  logger: Logger;
  progress: ProgressReporter;
  /** Start of the run; look-back windows are measured from here. */
  now: Date;
  recordError(scope: ErrorRecord['scope'], item: string, err: unknown): void;
}

export interface OrchestratorDeps {
  config: IngestConfig;
  /** Authenticate and build the store clients. */
  connect: () => Promise<Collaborators>;
  logger: Logger;
  progress?: ProgressReporter;
  clock?: () => Date;
  acquireLease?: () => Promise<LeaseAttempt>;
}

export interface RunResult {
  summary: RunSummary;
  errors: ErrorRecord[];
  cacheStats?: FolderListingCacheStats;
}
