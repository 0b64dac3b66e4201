/**
 * Runner/orchestration constants
 *
 * Environment variable names and their defaults.
 */

import type { RunMode } from "@/types";

export const RUN_MODE_ENV = "RUN_MODE";

export const DEFAULT_RUN_MODE: RunMode = "once";

/**
 * Sleep between collection cycles in forever mode (milliseconds)
 * Default: 6 hours
 */
export const CYCLE_SLEEP_ENV = "CYCLE_SLEEP_MS";
export const DEFAULT_CYCLE_SLEEP_MS = 21_600_000;

export const STATS_GRANULARITY_ENV = "STATS_GRANULARITY";

/**
 * Keep only postings with at least one detected skill
 */
export const DROP_WITHOUT_SKILLS_ENV = "DROP_WITHOUT_SKILLS";

export const DB_PATH_ENV = "DB_PATH";

/**
 * Default database file, relative to the working directory
 */
export const DEFAULT_DB_PATH = "data/app.db";
