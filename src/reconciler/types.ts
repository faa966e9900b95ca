/**
 * Per-item reconciliation results. Run counters are tallied from these tags
 * rather than incremented at each call site.
 */

export type SkipReason = 'already-stored' | 'already-ingested' | 'all-rows-duplicate';

export type ItemOutcome =
  | { kind: 'accepted'; item: string; rowsAppended?: number; duplicateRows?: number }
  | { kind: 'skipped'; item: string; reason: SkipReason }
  | { kind: 'failed'; item: string; error: string };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
