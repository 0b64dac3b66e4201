/**
 * Collection run: fetch, process, persist, aggregate
 *
 * Wraps one end-to-end collection in withRun so the run row is always
 * finalized with its counters.
 */

import type { RunCollectionInput, RunCollectionResult } from "@/types";
import { DEFAULT_GRANULARITY } from "@/constants";
import {
  getDb,
  insertPostings,
  insertRunErrors,
  closeMissingPostings,
  listPostings,
  listSkills,
  saveSkills,
  saveAggregateStats,
  storedPostingIds,
} from "@/db";
import { aggregate, SkillRegistry } from "@/signal/aggregation";
import { Deduplicator } from "./deduplicator";
import { processPostingBatch } from "./processPostingBatch";
import { withRun } from "./runLifecycle";
import * as logger from "@/logger";

/**
 * Run one collection for a query
 *
 * Steps:
 * 1. Load the already-seen ids (StateLoadError aborts the run)
 * 2. Fetch offers and process them as one batch
 * 3. Insert accepted postings and the error report in one transaction
 * 4. Update and save the skill counters
 * 5. Close stored postings missing from a complete, unfiltered fetch
 * 6. Aggregate all stored postings and save the period stats
 */
export async function runCollection<TRecord>(
  input: RunCollectionInput<TRecord>,
): Promise<RunCollectionResult> {
  const { client, taxonomy, query } = input;
  const granularity = input.granularity ?? DEFAULT_GRANULARITY;
  const log = logger.withContext({
    provider: client.provider,
    romeCode: query.romeCode,
  });

  return withRun(client.provider, query, async (runId, acc) => {
    const now = input.now ?? new Date();
    const deduplicator = Deduplicator.load(storedPostingIds);
    log.debug("Known postings loaded", {
      runId,
      known: deduplicator.knownCount,
    });

    const { offers, truncated } = await client.searchOffers(query);
    acc.counters.offers_fetched = offers.length;

    const batch = processPostingBatch({
      records: offers,
      mapRecord: (record) => client.mapOffer(record),
      taxonomy,
      deduplicator,
      options: { dropWithoutSkills: input.dropWithoutSkills ?? false },
    });
    acc.counters.postings_duplicates = batch.duplicates;
    acc.counters.postings_filtered = batch.filtered;
    acc.counters.postings_invalid = batch.errors.length;

    const persist = getDb().transaction(() => {
      const count = insertPostings(client.provider, batch.accepted, now);
      insertRunErrors(runId, batch.errors);
      return count;
    });
    const inserted = persist();
    acc.counters.postings_inserted = inserted;

    const registry = SkillRegistry.fromTaxonomy(taxonomy, listSkills());
    const touched = registry.recordDetections(batch.accepted, now);
    saveSkills(registry.list());

    let closed = 0;
    if (truncated) {
      log.info("Fetch truncated, skipping closure of missing postings", {
        runId,
      });
    } else if (query.departement || query.commune) {
      log.debug("Filtered query, skipping closure of missing postings", {
        runId,
      });
    } else if (offers.length === 0) {
      log.warn("Source returned no offers, skipping closure", { runId });
    } else {
      closed = closeMissingPostings(
        client.provider,
        query.romeCode,
        batch.seenIds,
        now,
      );
    }
    acc.counters.postings_closed = closed;

    const stats = aggregate(listPostings(), taxonomy, {
      granularity,
      analyzedAt: now,
    });
    saveAggregateStats(stats);

    log.info("Collection completed", {
      runId,
      fetched: offers.length,
      inserted,
      duplicates: batch.duplicates,
      filtered: batch.filtered,
      invalid: batch.errors.length,
      closed,
      skillsTouched: touched.length,
      totalPostings: stats.totalPostings,
    });

    return {
      runId,
      fetched: offers.length,
      inserted,
      duplicates: batch.duplicates,
      filtered: batch.filtered,
      closed,
      errors: batch.errors,
      stats,
    };
  });
}
