/**
 * Database type definitions
 *
 * Row shapes of the SQLite tables (see migrations/0001_init.sql).
 * JSON columns are stored as TEXT and decoded by the repos.
 */

/**
 * Row of the postings table
 */
export type PostingRow = {
  id: number;
  external_id: string;
  provider: string;
  title: string;
  description: string;
  created_at: string;
  updated_at: string | null;
  company_name: string | null;
  location_json: string;
  contract_json: string;
  rome_code: string | null;
  url: string | null;
  skills_json: string;
  processed: number;
  collected_at: string;
  closed_at: string | null;
};

/**
 * Row of the skills table
 */
export type SkillRow = {
  name: string;
  key: string;
  category_id: string;
  synonyms_json: string;
  detection_count: number;
  last_detected_at: string | null;
  updated_at: string;
};

/**
 * Row of the aggregate_stats table
 */
export type AggregateStatsRow = {
  id: number;
  period_id: string;
  granularity: string;
  analyzed_at: string;
  total_postings: number;
  payload_json: string;
};

/**
 * Ingestion run entity (stored in ingestion_runs table)
 */
export type IngestionRun = {
  id: number;
  provider: string;
  query_json: string | null;
  started_at: string;
  finished_at: string | null;
  status: string | null;
  offers_fetched: number | null;
  postings_inserted: number | null;
  postings_duplicates: number | null;
  postings_filtered: number | null;
  postings_invalid: number | null;
  postings_closed: number | null;
  errors_count: number | null;
  notes: string | null;
};

/**
 * Ingestion run create input
 */
export type IngestionRunInput = {
  provider: string;
  query?: Record<string, unknown> | null;
};

/**
 * Run status for lifecycle helpers
 */
export type RunStatus = "success" | "failure";

/**
 * Run counters tracked during execution
 */
export type RunCounters = {
  offers_fetched?: number | null;
  postings_inserted?: number | null;
  postings_duplicates?: number | null;
  postings_filtered?: number | null;
  postings_invalid?: number | null;
  postings_closed?: number | null;
  errors_count?: number | null;
};

/**
 * Ingestion run finish/update input
 */
export type IngestionRunUpdate = RunCounters & {
  finished_at?: string;
  status?: RunStatus | null;
  notes?: string | null;
};

/**
 * Mutable accumulator for tracking counters during run execution
 * Passed to withRun() callback so counters persist even on failure
 */
export type RunAccumulator = {
  counters: RunCounters;
};

/**
 * Row of the run_errors table
 */
export type RunErrorRow = {
  id: number;
  run_id: number;
  external_id: string | null;
  reason: string;
  created_at: string;
};
