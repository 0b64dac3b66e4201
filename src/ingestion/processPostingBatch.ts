/**
 * Posting batch processing: map, validate, deduplicate, match
 *
 * Pure with respect to storage: returns the accepted postings and a
 * report, persistence is the caller's job. Per-record failures are
 * collected and skipped; configuration and state errors propagate.
 */

import type {
  Posting,
  PostingErrorReport,
  ProcessBatchInput,
  ProcessBatchResult,
} from "@/types";
import { matchPosting, skillNames } from "@/signal/matcher";
import {
  ConfigurationError,
  StateLoadError,
  ValidationError,
  errorMessage,
} from "@/utils/errors";
import { validatePosting } from "@/utils/postingValidation";
import * as logger from "@/logger";

/**
 * Turns a per-record failure into a report entry.
 *
 * @throws ConfigurationError and StateLoadError unchanged; they end the run
 */
function toErrorReport(
  err: unknown,
  externalId: string | null,
): PostingErrorReport {
  if (err instanceof ConfigurationError || err instanceof StateLoadError) {
    throw err;
  }
  if (err instanceof ValidationError) {
    logger.debug("Posting skipped (invalid)", {
      externalId: err.externalId,
      field: err.field,
    });
    return { externalId: err.externalId, reason: err.message };
  }
  logger.warn("Posting skipped (processing failed)", {
    externalId,
    error: errorMessage(err),
  });
  return { externalId, reason: errorMessage(err) };
}

/**
 * Process a batch of raw source records
 *
 * For each record, in order:
 * - map to a candidate and validate (any failure → error report, skip)
 * - claim its id (already seen → duplicate, skip)
 * - match title + description against the taxonomy
 * - with dropWithoutSkills, postings without skills are counted as filtered
 *
 * Filtered postings are claimed for this batch only and are not stored, so
 * a later run fetches and matches them again (and filters them again).
 *
 * @returns Accepted postings (processed = true) and per-record outcome counts
 */
export function processPostingBatch<TRecord>(
  input: ProcessBatchInput<TRecord>,
): ProcessBatchResult {
  const { records, mapRecord, taxonomy, deduplicator, options } = input;
  const dropWithoutSkills = options?.dropWithoutSkills ?? false;

  const accepted: Posting[] = [];
  const errors: PostingErrorReport[] = [];
  const seenIds: string[] = [];
  let duplicates = 0;
  let filtered = 0;

  for (const record of records) {
    let posting: Posting;
    try {
      const validated = validatePosting(mapRecord(record));
      posting = { ...validated, skills: [], processed: false };
    } catch (err) {
      errors.push(toErrorReport(err, null));
      continue;
    }

    seenIds.push(posting.externalId);

    if (!deduplicator.claim(posting.externalId)) {
      duplicates++;
      continue;
    }

    try {
      posting.skills = skillNames(matchPosting(posting, taxonomy));
    } catch (err) {
      errors.push(toErrorReport(err, posting.externalId));
      continue;
    }
    posting.processed = true;

    if (dropWithoutSkills && posting.skills.length === 0) {
      filtered++;
      continue;
    }

    accepted.push(posting);
  }

  return { accepted, seenIds, duplicates, filtered, errors };
}
