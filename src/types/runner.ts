/**
 * Runner/orchestration type definitions
 */

import type { TimeGranularity } from "./stats";

/**
 * Execution mode of the entrypoint
 *
 * - once: one collection run, then exit
 * - forever: collection runs separated by CYCLE_SLEEP_MS until killed
 */
export type RunMode = "once" | "forever";

/**
 * Settings resolved from the environment for one run
 */
export type RunnerSettings = {
  romeCode: string;
  departement?: string;
  maxOffers: number;
  granularity: TimeGranularity;
  taxonomyPath: string;
  dropWithoutSkills: boolean;
};

/**
 * Outcome of runOnce()
 */
export type RunOnceResult = {
  ok: boolean;
  runId: number | null;
  inserted: number;
  invalid: number;
  error?: string;
};
