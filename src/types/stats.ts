/**
 * Aggregate statistics type definitions
 *
 * AggregateStats is derived entirely from postings + taxonomy and is
 * recomputed on each run, never patched incrementally.
 */

/**
 * Time bucket size for the timeline breakdown
 */
export type TimeGranularity = "day" | "month" | "quarter";

/**
 * Location field used for the geographic breakdown
 */
export type LocationField = "region" | "department";

/**
 * Frequency of one skill
 */
export type SkillStat = {
  skill: string;
  categoryId: string;
  /** Number of distinct postings mentioning the skill */
  count: number;
  /** count / totalPostings × 100, one decimal */
  percentage: number;
};

/**
 * Per-category view
 */
export type CategoryStat = {
  categoryId: string;
  /** Postings with at least one skill of this category */
  postingCount: number;
  percentage: number;
  /** Skills of the category detected at least once */
  skillsDetected: number;
  /** Skills of the category in the taxonomy */
  skillsAvailable: number;
  skills: SkillStat[];
};

/**
 * One bucket of a breakdown (region, department or time bucket)
 */
export type BreakdownEntry = {
  key: string;
  count: number;
};

export type AggregateStats = {
  periodId: string;
  /** ISO timestamp of the analysis */
  analyzedAt: string;
  granularity: TimeGranularity;
  locationField: LocationField;
  /** Postings considered: distinct ids with at least one skill */
  totalPostings: number;
  /** Skills ranked by count desc, then name asc */
  ranking: SkillStat[];
  categories: CategoryStat[];
  geography: BreakdownEntry[];
  timeline: BreakdownEntry[];
};

export type AggregateOptions = {
  granularity?: TimeGranularity;
  locationField?: LocationField;
  /** Defaults to the "YYYY-MM" of analyzedAt */
  periodId?: string;
  /** Defaults to now */
  analyzedAt?: Date;
};

/**
 * Skill record with its running detection counter
 */
export type Skill = {
  name: string;
  key: string;
  categoryId: string;
  synonyms: string[];
  detectionCount: number;
  lastDetectedAt: string | null;
};
