/**
 * Runner entrypoint: collects postings and refreshes skill statistics
 *
 * Supports two modes:
 * - once: one collection cycle, then exits
 * - forever: cycles every CYCLE_SLEEP_MS until the process is terminated
 *
 * Usage:
 *   npm start                      # RUN_MODE=once (default)
 *   RUN_MODE=forever npm start
 *
 * Environment variables:
 *   - FRANCE_TRAVAIL_CLIENT_ID / FRANCE_TRAVAIL_CLIENT_SECRET: API credentials (required)
 *   - FRANCE_TRAVAIL_ROME_CODE: ROME job code (defaults to M1805)
 *   - FRANCE_TRAVAIL_DEPARTEMENT: department filter (optional)
 *   - FRANCE_TRAVAIL_MAX_OFFERS: cap per run (defaults to 1000)
 *   - RUN_MODE: once|forever
 *   - LOG_LEVEL: debug, info, warn, error
 *   - DB_PATH: SQLite database file (defaults to data/app.db)
 *   - TAXONOMY_PATH: taxonomy JSON (defaults to data/taxonomy.json)
 *   - STATS_GRANULARITY: day|month|quarter (defaults to month)
 *   - CYCLE_SLEEP_MS: sleep between cycles in forever mode
 */

import "dotenv/config";
import { runOnce, runForever } from "./orchestration/runner";
import { closeDb } from "./db";
import { DEFAULT_RUN_MODE, RUN_MODE_ENV } from "./constants";
import * as logger from "./logger";

async function main(): Promise<number> {
  const runMode = (process.env[RUN_MODE_ENV] || DEFAULT_RUN_MODE).toLowerCase();

  if (runMode === "forever") {
    await runForever();
    return 0;
  }

  if (runMode === "once") {
    logger.info("Starting runner (single pass mode)");
    const result = await runOnce();
    logger.info("Runner finished", { ...result });
    return result.ok ? 0 : 1;
  }

  logger.error("Invalid RUN_MODE", {
    runMode,
    validModes: ["once", "forever"],
  });
  return 1;
}

main()
  .then((code) => {
    closeDb();
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    closeDb();
    process.exit(1);
  });
