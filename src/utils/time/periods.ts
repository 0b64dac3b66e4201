/**
 * Time bucket helpers for the aggregation timeline
 *
 * All buckets are computed in UTC so the same timestamp lands in the same
 * bucket whatever the host timezone.
 */

import type { TimeGranularity } from "@/types";
import { TIME_GRANULARITIES } from "@/constants";

/** ISO date-time with no offset, e.g. "2025-03-31T23:30:00" */
const LOCAL_DATE_TIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function isTimeGranularity(value: unknown): value is TimeGranularity {
  return TIME_GRANULARITIES.some((granularity) => granularity === value);
}

/**
 * Bucket key of a date: "2025-03-14" (day), "2025-03" (month), "2025-Q1" (quarter)
 */
export function bucketKey(date: Date, granularity: TimeGranularity): string {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;

  switch (granularity) {
    case "day":
      return `${year}-${pad2(month)}-${pad2(date.getUTCDate())}`;
    case "month":
      return `${year}-${pad2(month)}`;
    case "quarter":
      return `${year}-Q${Math.ceil(month / 3)}`;
  }
}

/**
 * Bucket key of an ISO timestamp, or null when it does not parse.
 * A date-time without offset is read as UTC, not host time.
 */
export function bucketKeyOf(
  timestamp: string,
  granularity: TimeGranularity,
): string | null {
  const iso = LOCAL_DATE_TIME_PATTERN.test(timestamp)
    ? `${timestamp.replace(" ", "T")}Z`
    : timestamp;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : bucketKey(new Date(ms), granularity);
}

/**
 * Default period id of an analysis: its UTC month ("2025-03")
 */
export function defaultPeriodId(analyzedAt: Date): string {
  return bucketKey(analyzedAt, "month");
}
