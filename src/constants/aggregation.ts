/**
 * Aggregation constants
 */

import type { LocationField, TimeGranularity } from "@/types";

/**
 * Bucket key for postings whose location or date is missing
 */
export const UNKNOWN_BUCKET = "unknown";

export const DEFAULT_GRANULARITY: TimeGranularity = "month";

export const DEFAULT_LOCATION_FIELD: LocationField = "region";

export const TIME_GRANULARITIES: readonly TimeGranularity[] = [
  "day",
  "month",
  "quarter",
];

/**
 * Decimal places kept in percentages (33.3)
 */
export const PERCENTAGE_DECIMALS = 1;
