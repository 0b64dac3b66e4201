/**
 * Run lifecycle helpers: track collection runs in the database
 *
 * One run = one end-to-end collection for a single provider and query.
 * These helpers ensure every run is finalized (success or failure).
 */

import type {
  RunAccumulator,
  RunCounters,
  RunStatus,
  SearchOffersQuery,
} from "@/types";
import { createRun, finishRun as repoFinishRun } from "@/db";

/**
 * Start a new ingestion run for a provider
 *
 * @returns The run ID
 */
export function startRun(provider: string, query?: SearchOffersQuery): number {
  return createRun({ provider, query: query ? { ...query } : null });
}

/**
 * Finish an ingestion run with status and the counters gathered so far
 */
export function finishRun(
  runId: number,
  status: RunStatus,
  counters: RunCounters = {},
  notes?: string,
): void {
  repoFinishRun(runId, {
    ...counters,
    finished_at: new Date().toISOString(),
    status,
    ...(notes !== undefined && { notes }),
  });
}

/**
 * Create a fresh run accumulator with zeroed counters
 */
export function createRunAccumulator(): RunAccumulator {
  return {
    counters: {
      offers_fetched: 0,
      postings_inserted: 0,
      postings_duplicates: 0,
      postings_filtered: 0,
      postings_invalid: 0,
      postings_closed: 0,
      errors_count: 0,
    },
  };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On success: status = "success"
 * On error: status = "failure", errors_count incremented, error message
 * stored in notes, then the error is rethrown
 *
 * The `fn` callback receives a mutable `RunAccumulator`; its counters are
 * persisted in the `finally` block, so they are saved even if `fn` throws.
 * `postings_invalid` counts skipped records; `errors_count` counts fatal
 * errors only.
 */
export async function withRun<T>(
  provider: string,
  query: SearchOffersQuery | undefined,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(provider, query);
  const acc = createRunAccumulator();
  let succeeded = false;
  let failureNote: string | undefined;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } catch (err) {
    acc.counters.errors_count = (acc.counters.errors_count ?? 0) + 1;
    failureNote = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    throw err;
  } finally {
    finishRun(runId, succeeded ? "success" : "failure", acc.counters, failureNote);
  }
}
