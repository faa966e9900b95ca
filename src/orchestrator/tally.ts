import type { ItemOutcome } from '../reconciler/types.js';

export interface OutcomeTally {
  accepted: number;
  skipped: number;
  failed: number;
}

export function tallyOutcomes(outcomes: readonly ItemOutcome[]): OutcomeTally {
  const tally: OutcomeTally = { accepted: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    tally[outcome.kind]++;
  }
  return tally;
}
