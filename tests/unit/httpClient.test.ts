/**
 * Unit tests for the shared HTTP client
 *
 * fetch is stubbed; no network.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { buildUrl, httpRequest, HttpError } from "@/clients/http";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const fastRetry = { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 };

describe("buildUrl", () => {
  it("should append query parameters", () => {
    expect(
      buildUrl("https://api.example.test/offres/search", {
        codeROME: "M1805",
        range: "0-149",
      }),
    ).toBe("https://api.example.test/offres/search?codeROME=M1805&range=0-149");
  });

  it("should repeat array parameters", () => {
    expect(buildUrl("https://api.example.test/a", { code: ["a", "b"] })).toBe(
      "https://api.example.test/a?code=a&code=b",
    );
  });

  it("should leave the URL alone without a query", () => {
    expect(buildUrl("https://api.example.test/a", {})).toBe("https://api.example.test/a");
  });
});

describe("httpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send a form body with form headers", async () => {
    const fetchMock = stubFetch(jsonResponse({ access_token: "test-token" }));

    const response = await httpRequest({
      method: "POST",
      url: "https://auth.example.test/token",
      form: { grant_type: "client_credentials", scope: "a b" },
    });

    expect(response).toEqual({ status: 200, data: { access_token: "test-token" } });
    const [, init] = fetchMock.mock.calls[0];
    expect(init?.body).toBe("grant_type=client_credentials&scope=a+b");
    expect(init?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
      Accept: "application/json",
    });
  });

  it("should return undefined data for 204", async () => {
    stubFetch(new Response(null, { status: 204 }));

    const response = await httpRequest({ method: "GET", url: "https://api.example.test/a" });

    expect(response).toEqual({ status: 204, data: undefined });
  });

  it("should return the text of a non-JSON body", async () => {
    stubFetch(new Response("plain", { status: 200, headers: { "content-type": "text/plain" } }));

    const response = await httpRequest({ method: "GET", url: "https://api.example.test/a" });

    expect(response.data).toBe("plain");
  });

  it("should retry a GET on 503", async () => {
    const fetchMock = stubFetch(
      new Response("busy", { status: 503 }),
      jsonResponse({ resultats: [] }),
    );

    const response = await httpRequest({
      method: "GET",
      url: "https://api.example.test/a",
      retry: fastRetry,
    });

    expect(response.data).toEqual({ resultats: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry a POST", async () => {
    const fetchMock = stubFetch(new Response("oops", { status: 500 }));

    const failure = httpRequest({
      method: "POST",
      url: "https://api.example.test/a",
      form: { grant_type: "client_credentials" },
      retry: fastRetry,
    });

    await expect(failure).rejects.toBeInstanceOf(HttpError);
    await expect(failure).rejects.toMatchObject({ status: 500, bodySnippet: "oops" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should not retry a 401", async () => {
    const fetchMock = stubFetch(new Response("", { status: 401 }));

    const failure = httpRequest({
      method: "GET",
      url: "https://api.example.test/a",
      retry: fastRetry,
    });

    await expect(failure).rejects.toMatchObject({ status: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("HttpError", () => {
  function errorWith(status: number, retryAfter?: string): HttpError {
    return new HttpError({
      status,
      statusText: "Test",
      url: "https://api.example.test/a",
      headers: new Headers(retryAfter ? { "retry-after": retryAfter } : {}),
    });
  }

  it("should describe status and url", () => {
    expect(errorWith(404).message).toBe("HTTP 404 Test - https://api.example.test/a");
  });

  it("should flag transient and auth statuses", () => {
    expect(errorWith(503).isTransient).toBe(true);
    expect(errorWith(404).isTransient).toBe(false);
    expect(errorWith(403).isAuthError).toBe(true);
  });

  it("should read Retry-After in seconds or as a date", () => {
    const now = Date.parse("2025-03-01T00:00:00Z");
    expect(errorWith(429, "3").retryAfterMs(now)).toBe(3000);
    expect(errorWith(503, "Sat, 01 Mar 2025 00:00:10 GMT").retryAfterMs(now)).toBe(10_000);
  });

  it("should ignore Retry-After on other statuses or in the past", () => {
    const now = Date.parse("2025-03-01T00:00:00Z");
    expect(errorWith(500, "3").retryAfterMs(now)).toBeNull();
    expect(errorWith(429, "Fri, 28 Feb 2025 00:00:00 GMT").retryAfterMs(now)).toBeNull();
    expect(errorWith(429).retryAfterMs(now)).toBeNull();
  });
});
