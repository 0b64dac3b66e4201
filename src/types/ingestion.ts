/**
 * Ingestion type definitions
 *
 * Types for batch processing and run orchestration.
 */

import type { Posting } from "./posting";
import type { TaxonomyRuntime } from "./taxonomy";
import type { AggregateStats, TimeGranularity } from "./stats";
import type { SearchOffersQuery } from "./clients/franceTravail";

/**
 * Persistent source of already-seen posting identifiers
 */
export interface KnownIdsSource {
  loadKnownIds(): Iterable<string>;
}

/**
 * Contract of the deduplicator consumed by the batch processor
 */
export interface PostingDeduplicator {
  isNew(externalId: string): boolean;
  markSeen(externalId: string): void;
  claim(externalId: string): boolean;
}

/**
 * One rejected record of a batch (skip-and-report)
 */
export type PostingErrorReport = {
  /** External id when the record carried one */
  externalId: string | null;
  reason: string;
};

export type ProcessBatchOptions = {
  /** Drop postings with no detected skill (counted as filtered) */
  dropWithoutSkills?: boolean;
};

/**
 * Input for batch processing
 *
 * `records` are raw source payloads; `mapRecord` turns one into an
 * untrusted candidate before validation.
 */
export type ProcessBatchInput<TRecord> = {
  records: TRecord[];
  mapRecord: (record: TRecord) => unknown;
  taxonomy: TaxonomyRuntime;
  deduplicator: PostingDeduplicator;
  options?: ProcessBatchOptions;
};

export type ProcessBatchResult = {
  accepted: Posting[];
  /** Ids of every valid record, duplicates and filtered ones included */
  seenIds: string[];
  duplicates: number;
  filtered: number;
  errors: PostingErrorReport[];
};

/**
 * Source of raw offers for a collection run
 */
export interface PostingSourceClient<TRecord> {
  readonly provider: string;
  searchOffers(query: SearchOffersQuery): Promise<{
    offers: TRecord[];
    truncated: boolean;
  }>;
  mapOffer(record: TRecord): unknown;
}

export type RunCollectionInput<TRecord> = {
  client: PostingSourceClient<TRecord>;
  taxonomy: TaxonomyRuntime;
  query: SearchOffersQuery;
  granularity?: TimeGranularity;
  dropWithoutSkills?: boolean;
  /** Analysis clock (tests); defaults to now */
  now?: Date;
};

export type RunCollectionResult = {
  runId: number;
  fetched: number;
  inserted: number;
  duplicates: number;
  filtered: number;
  closed: number;
  errors: PostingErrorReport[];
  stats: AggregateStats;
};
