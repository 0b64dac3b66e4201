/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST";

/**
 * Retry behaviour of GET requests
 */
export type RetryPolicy = {
  /** Attempts including the first one */
  maxAttempts: number;
  /** First backoff delay; doubled on each retry */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Cap on a server-provided Retry-After */
  maxRetryAfterMs: number;
};

export type HttpQuery = Record<
  string,
  string | number | boolean | Array<string | number>
>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: HttpQuery;
  /** application/x-www-form-urlencoded body */
  form?: Record<string, string>;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
}

/**
 * Decoded response
 *
 * `data` is the parsed JSON body, the raw text of a non-JSON body, or
 * undefined for an empty one (204). Callers validate its shape.
 */
export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpResponse>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}
