/**
 * HttpError: non-2xx response of the shared HTTP client
 */

import type { HttpErrorDetails } from "@/types";
import {
  RETRY_AFTER_STATUS_CODES,
  TRANSIENT_STATUS_CODES,
} from "@/constants/clients/http";

function describe(details: HttpErrorDetails): string {
  const parts = [`HTTP ${details.status} ${details.statusText}`, details.url];
  if (details.bodySnippet) {
    parts.push(details.bodySnippet);
  }
  return parts.join(" - ");
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(describe(details));
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /**
   * 401/403: credentials rejected, retrying will not help
   */
  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }

  get isTransient(): boolean {
    return TRANSIENT_STATUS_CODES.includes(this.status);
  }

  /**
   * Delay requested by Retry-After (seconds or HTTP date), 429/503 only
   *
   * @returns Milliseconds, or null when absent, unparsable or already past
   */
  retryAfterMs(now: number = Date.now()): number | null {
    if (!RETRY_AFTER_STATUS_CODES.includes(this.status)) {
      return null;
    }
    const header = this.headers?.get("retry-after")?.trim();
    if (!header) {
      return null;
    }

    const seconds = Number(header);
    if (Number.isFinite(seconds)) {
      return seconds > 0 ? seconds * 1000 : null;
    }

    const at = Date.parse(header);
    return Number.isNaN(at) || at <= now ? null : at - now;
  }
}
