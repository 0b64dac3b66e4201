/**
 * HTTP client: native fetch with timeout, retries and HttpError
 *
 * Bodies are form-encoded (OAuth2 token endpoint) or absent. Only GET is
 * retried: on network errors, timeouts and transient statuses, honouring
 * Retry-After on 429/503 and backing off exponentially otherwise.
 */

import type {
  HttpMethod,
  HttpQuery,
  HttpRequest,
  HttpResponse,
  RetryPolicy,
} from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  FORM_CONTENT_TYPE,
} from "@/constants/clients/http";
import { errorMessage } from "@/utils/errors";
import * as logger from "@/logger";

const JSON_CONTENT_TYPE_PATTERN = /[/+]json\b/i;

/**
 * Append query parameters to a URL; array values repeat the parameter
 */
export function buildUrl(baseUrl: string, query?: HttpQuery): string {
  const entries = query ? Object.entries(query) : [];
  if (entries.length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of entries) {
    for (const item of Array.isArray(value) ? value : [value]) {
      url.searchParams.append(key, String(item));
    }
  }
  return url.toString();
}

function buildHeaders(req: HttpRequest): Record<string, string> {
  return {
    Accept: "application/json",
    ...(req.form ? { "Content-Type": FORM_CONTENT_TYPE } : {}),
    ...req.headers,
  };
}

async function toHttpError(response: Response, url: string): Promise<HttpError> {
  let bodySnippet: string | undefined;
  try {
    const text = await response.text();
    if (text) {
      bodySnippet =
        text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
          ? `${text.slice(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
          : text;
    }
  } catch (err) {
    logger.debug("Error response body unreadable", {
      url,
      error: errorMessage(err),
    });
  }

  return new HttpError({
    status: response.status,
    statusText: response.statusText,
    url,
    bodySnippet,
    headers: response.headers,
  });
}

/**
 * Parsed JSON, raw text for other content types, undefined when empty
 */
async function readBody(
  response: Response,
  method: HttpMethod,
  url: string,
): Promise<unknown> {
  const text = response.status === 204 ? "" : await response.text();
  if (text.length === 0) {
    return undefined;
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!JSON_CONTENT_TYPE_PATTERN.test(contentType)) {
    logger.warn("Non-JSON response received", {
      method,
      url,
      status: response.status,
      contentType: contentType || "none",
    });
    return text;
  }

  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (err) {
    logger.warn("JSON parse failed", {
      method,
      url,
      status: response.status,
      error: errorMessage(err),
    });
    return undefined;
  }
}

/**
 * One attempt, aborted after timeoutMs
 */
async function send(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<HttpResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: buildHeaders(req),
      body: req.form ? new URLSearchParams(req.form).toString() : undefined,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw await toHttpError(response, url);
    }

    return {
      status: response.status,
      data: await readBody(response, req.method, url),
    };
  } finally {
    clearTimeout(timer);
  }
}

function shouldRetry(error: unknown, method: HttpMethod): boolean {
  if (method !== "GET") {
    return false;
  }
  if (error instanceof HttpError) {
    return error.isTransient;
  }
  // AbortError: timeout; TypeError: network failure
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TypeError")
  );
}

/**
 * Retry-After when the server sent one, else
 * min(maxDelay, baseDelay * 2^(attempt-1)) with 50-100% jitter
 */
function retryDelayMs(
  error: unknown,
  attempt: number,
  policy: RetryPolicy,
): number {
  const requested = error instanceof HttpError ? error.retryAfterMs() : null;
  if (requested !== null) {
    return Math.min(requested, policy.maxRetryAfterMs);
  }

  const capped = Math.min(
    policy.baseDelayMs * 2 ** (attempt - 1),
    policy.maxDelayMs,
  );
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform an HTTP request
 *
 * @throws {HttpError} On a non-2xx status, once retries are exhausted
 * @throws {Error} On network failure or timeout, once retries are exhausted
 */
export async function httpRequest(req: HttpRequest): Promise<HttpResponse> {
  const url = buildUrl(req.url, req.query);
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...req.retry };

  for (let attempt = 1; ; attempt++) {
    try {
      return await send(req, url, timeoutMs);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error, req.method)) {
        throw error;
      }

      const delayMs = retryDelayMs(error, attempt, policy);
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError ? `status ${error.status}` : errorMessage(error),
      });
      await sleep(delayMs);
    }
  }
}
