/**
 * Fixed-interval scheduler: one run now, then one per interval. A tick that
 * arrives while a run is still going is dropped, and stopping waits for the
 * run in progress.
 */

import type { Logger } from '../logger.js';

export interface SchedulerOptions {
  intervalHours: number;
  task: () => Promise<unknown>;
  logger: Logger;
}

export class Scheduler {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private resolveStopped: (() => void) | null = null;
  private current: Promise<boolean> = Promise.resolve(false);

  constructor(private readonly options: SchedulerOptions) {}

  get intervalMs(): number {
    return Math.round(this.options.intervalHours * 60 * 60 * 1000);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run the task unless a run is already in progress. Resolves to whether it ran.
   */
  tick(): Promise<boolean> {
    if (this.running) {
      this.options.logger.warn('Previous run still in progress; skipping this tick');
      return Promise.resolve(false);
    }
    this.current = this.runTask();
    return this.current;
  }

  private async runTask(): Promise<boolean> {
    this.running = true;
    try {
      await this.options.task();
    } catch (err) {
      this.options.logger.error(`Scheduled run failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.running = false;
    }
    return true;
  }

  /**
   * Start ticking. The returned promise settles once `stop()` has let the
   * current run finish.
   */
  start(): Promise<void> {
    if (this.timer) throw new Error('Scheduler already started');
    const stopped = new Promise<void>(resolve => {
      this.resolveStopped = resolve;
    });

    this.options.logger.info(`Scheduler started; running every ${this.options.intervalHours} hour(s)`);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
    return stopped;
  }

  /**
   * Stop ticking, then wait for a run in progress before settling `start()`.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.options.logger.info('Scheduler stopping; waiting for the current run to finish');
    }
    await this.current;
    this.options.logger.info('Scheduler stopped');
    this.resolveStopped?.();
    this.resolveStopped = null;
  }
}
