/**
 * Aggregate stats repository
 *
 * Data access layer for aggregate_stats table. One row per
 * (period_id, granularity); saving a period again replaces it.
 */

import type {
  AggregateStats,
  AggregateStatsRow,
  TimeGranularity,
} from "@/types";
import { getDb } from "../connection";
import { isRecord } from "@/utils/guards";
import { isTimeGranularity } from "@/utils/time/periods";
import * as logger from "@/logger";

function isAggregateStats(value: unknown): value is AggregateStats {
  return (
    isRecord(value) &&
    typeof value.periodId === "string" &&
    typeof value.analyzedAt === "string" &&
    isTimeGranularity(value.granularity) &&
    (value.locationField === "region" ||
      value.locationField === "department") &&
    typeof value.totalPostings === "number" &&
    Array.isArray(value.ranking) &&
    Array.isArray(value.categories) &&
    Array.isArray(value.geography) &&
    Array.isArray(value.timeline)
  );
}

function rowToStats(row: AggregateStatsRow): AggregateStats | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload_json);
  } catch {
    payload = null;
  }
  if (!isAggregateStats(payload)) {
    logger.warn("Stored aggregate stats are malformed, ignoring", {
      periodId: row.period_id,
      granularity: row.granularity,
    });
    return undefined;
  }
  return payload;
}

/**
 * Upsert the stats of a period
 *
 * @returns Row id
 */
export function saveAggregateStats(stats: AggregateStats): number {
  const db = getDb();

  db.prepare(
    `
    INSERT INTO aggregate_stats (
      period_id, granularity, analyzed_at, total_postings, payload_json
    )
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(period_id, granularity) DO UPDATE SET
      analyzed_at = excluded.analyzed_at,
      total_postings = excluded.total_postings,
      payload_json = excluded.payload_json
  `,
  ).run(
    stats.periodId,
    stats.granularity,
    stats.analyzedAt,
    stats.totalPostings,
    JSON.stringify(stats),
  );

  const row = db
    .prepare(
      "SELECT id FROM aggregate_stats WHERE period_id = ? AND granularity = ?",
    )
    .get(stats.periodId, stats.granularity) as { id: number };
  return row.id;
}

export function getAggregateStats(
  periodId: string,
  granularity: TimeGranularity,
): AggregateStats | undefined {
  const db = getDb();
  const row = db
    .prepare(
      "SELECT * FROM aggregate_stats WHERE period_id = ? AND granularity = ?",
    )
    .get(periodId, granularity) as AggregateStatsRow | undefined;
  return row ? rowToStats(row) : undefined;
}

/**
 * Most recently analyzed stats, any period
 */
export function getLatestAggregateStats(): AggregateStats | undefined {
  const db = getDb();
  const row = db
    .prepare(
      "SELECT * FROM aggregate_stats ORDER BY analyzed_at DESC, id DESC LIMIT 1",
    )
    .get() as AggregateStatsRow | undefined;
  return row ? rowToStats(row) : undefined;
}
