/**
 * HTTP client defaults
 */

import type { RetryPolicy } from "@/types";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * 3 attempts, ~1s then ~2s apart (with jitter)
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
};

/**
 * 408 Request Timeout, 429 Too Many Requests, 5xx gateway/server errors
 */
export const TRANSIENT_STATUS_CODES: readonly number[] = [
  408, 429, 500, 502, 503, 504,
];

/**
 * Statuses whose Retry-After header is honoured
 */
export const RETRY_AFTER_STATUS_CODES: readonly number[] = [429, 503];

export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";
