/**
 * Progress bars for the per-email and per-file loops.
 * Interactive terminals only; silent in CI, quiet mode or when NO_COLOR is set.
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';

export interface ProgressReporter {
  startPhase(label: string, total: number): void;
  increment(detail?: string): void;
  finish(): void;
}

export class ProgressUI implements ProgressReporter {
  private bar: cliProgress.SingleBar | null = null;
  private isInteractive: boolean;

  constructor(private quiet: boolean = false) {
    this.isInteractive = Boolean(process.stdout.isTTY) && !quiet && !process.env.NO_COLOR && !process.env.CI;
  }

  startPhase(label: string, total: number): void {
    this.finish();
    if (!this.isInteractive || total === 0) return;

    this.bar = new cliProgress.SingleBar(
      {
        format: '{label} |{bar}| {value}/{total} {detail}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
        clearOnComplete: false,
        stopOnComplete: true
      },
      cliProgress.Presets.shades_classic
    );
    this.bar.start(total, 0, { label: chalk.bold.cyan(label), detail: '' });
  }

  increment(detail?: string): void {
    this.bar?.increment(1, { detail: detail ? chalk.gray(detail) : '' });
  }

  finish(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
    }
  }
}

/** Reporter that shows nothing; used by tests and non-interactive callers. */
export const silentProgress: ProgressReporter = {
  startPhase: () => undefined,
  increment: () => undefined,
  finish: () => undefined
};
