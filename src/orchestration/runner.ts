/**
 * Runner core: one collection cycle, or cycles forever
 *
 * Resolves settings from the environment, opens and migrates the
 * database, loads the taxonomy, and runs one collection through
 * runCollection(). Configuration errors are fatal; any other failure ends
 * the cycle with ok = false and the run row marked as failed.
 */

import type {
  PostingSourceClient,
  RunnerSettings,
  RunOnceResult,
} from "@/types";
import { applyMigrations, openDb } from "@/db";
import { loadTaxonomy } from "@/taxonomy";
import { runCollection } from "@/ingestion";
import { FranceTravailClient } from "@/clients/franceTravail";
import {
  CYCLE_SLEEP_ENV,
  DEFAULT_CYCLE_SLEEP_MS,
  DEFAULT_GRANULARITY,
  DEFAULT_MAX_OFFERS,
  DEFAULT_ROME_CODE,
  DEFAULT_TAXONOMY_PATH,
  DROP_WITHOUT_SKILLS_ENV,
  FRANCE_TRAVAIL_ENV,
  STATS_GRANULARITY_ENV,
  TAXONOMY_PATH_ENV,
} from "@/constants";
import { ConfigurationError, errorMessage } from "@/utils/errors";
import { isTimeGranularity } from "@/utils/time/periods";
import * as logger from "@/logger";

type Env = Record<string, string | undefined>;

function parsePositiveInt(
  value: string | undefined,
  name: string,
  fallback: number,
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${value}"`,
    );
  }
  return parsed;
}

/**
 * Settings of a collection run, from environment variables
 *
 * @throws {ConfigurationError} On a malformed value
 */
export function resolveRunnerSettings(env: Env = process.env): RunnerSettings {
  const granularity = env[STATS_GRANULARITY_ENV] || DEFAULT_GRANULARITY;
  if (!isTimeGranularity(granularity)) {
    throw new ConfigurationError(
      `${STATS_GRANULARITY_ENV} must be day, month or quarter, got "${granularity}"`,
    );
  }

  const departement = env[FRANCE_TRAVAIL_ENV.departement]?.trim();

  return {
    romeCode: env[FRANCE_TRAVAIL_ENV.romeCode]?.trim() || DEFAULT_ROME_CODE,
    ...(departement ? { departement } : {}),
    maxOffers: parsePositiveInt(
      env[FRANCE_TRAVAIL_ENV.maxOffers],
      FRANCE_TRAVAIL_ENV.maxOffers,
      DEFAULT_MAX_OFFERS,
    ),
    granularity,
    taxonomyPath: env[TAXONOMY_PATH_ENV] || DEFAULT_TAXONOMY_PATH,
    dropWithoutSkills: env[DROP_WITHOUT_SKILLS_ENV] === "true",
  };
}

/**
 * Milliseconds between cycles in forever mode
 */
export function resolveCycleSleepMs(env: Env = process.env): number {
  return parsePositiveInt(
    env[CYCLE_SLEEP_ENV],
    CYCLE_SLEEP_ENV,
    DEFAULT_CYCLE_SLEEP_MS,
  );
}

export type RunOnceOptions<TRecord> = {
  settings?: RunnerSettings;
  /** Source client; defaults to a FranceTravailClient from env credentials */
  client?: PostingSourceClient<TRecord>;
};

/**
 * Run one collection cycle
 *
 * @throws {ConfigurationError} On invalid settings, taxonomy or credentials
 */
export async function runOnce<TRecord>(
  options: RunOnceOptions<TRecord> = {},
): Promise<RunOnceResult> {
  const settings = options.settings ?? resolveRunnerSettings();

  const db = openDb();
  const applied = applyMigrations(db);
  if (applied.length > 0) {
    logger.info("Migrations applied", { applied });
  }

  const taxonomy = loadTaxonomy(settings.taxonomyPath);
  const query = {
    romeCode: settings.romeCode,
    ...(settings.departement ? { departement: settings.departement } : {}),
    maxOffers: settings.maxOffers,
  };
  const common = {
    taxonomy,
    query,
    granularity: settings.granularity,
    dropWithoutSkills: settings.dropWithoutSkills,
  };

  try {
    const result = options.client
      ? await runCollection({ client: options.client, ...common })
      : await runCollection({ client: new FranceTravailClient(), ...common });
    return {
      ok: true,
      runId: result.runId,
      inserted: result.inserted,
      invalid: result.errors.length,
    };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw err;
    }
    logger.error("Collection run failed", {
      error: errorMessage(err),
      name: err instanceof Error ? err.name : undefined,
    });
    return {
      ok: false,
      runId: null,
      inserted: 0,
      invalid: 0,
      error: errorMessage(err),
    };
  }
}

/**
 * Run collection cycles until SIGINT/SIGTERM
 *
 * A failed cycle is logged and the loop continues; a ConfigurationError
 * stops it.
 */
export async function runForever(): Promise<void> {
  const sleepMs = resolveCycleSleepMs();
  logger.info("Starting continuous runner (forever mode)", { sleepMs });

  let shutdownRequested = false;
  let wake: (() => void) | null = null;

  const handleShutdown = (signal: string) => {
    if (shutdownRequested) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, will stop after current cycle", {
      signal,
    });
    shutdownRequested = true;
    wake?.();
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));

  let cycleCount = 0;
  while (!shutdownRequested) {
    cycleCount++;
    logger.info("Starting runner cycle", { cycleCount });

    const result = await runOnce();
    logger.info("Runner cycle completed", { cycleCount, ...result });

    if (shutdownRequested) {
      break;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, sleepMs);
      wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
    wake = null;
  }

  logger.info("Continuous runner stopped", { cycles: cycleCount });
}
