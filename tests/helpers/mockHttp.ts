/**
 * In-process HTTP stand-in for offline tests
 *
 * Routes are matched on method + URL without its query string. Unmatched
 * requests throw, so a test can never reach the network. Non-2xx replies
 * are raised as HttpError, like the real client does.
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", SEARCH_URL, { resultats: [] });
 *   const client = new FranceTravailClient({ httpRequest: mock.request });
 */

import type { HttpRequest, HttpResponse } from "@/types";
import { HttpError } from "@/clients/http";
import { readFileSync } from "fs";
import { join } from "path";

export type MockHttpReply = {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
};

type RouteHandler = (req: HttpRequest) => MockHttpReply | Promise<MockHttpReply>;

export interface MockHttp {
  /** 200 reply with a JSON body */
  on(method: string, url: string, body: unknown): void;
  /** Fixed reply with explicit status */
  onResponse(method: string, url: string, reply: MockHttpReply): void;
  /** Reply computed from the request */
  onCustom(method: string, url: string, handler: RouteHandler): void;
  /** Injectable HttpRequestFn */
  request: (req: HttpRequest) => Promise<HttpResponse>;
  getRecordedRequests(): HttpRequest[];
  reset(): void;
}

/**
 * Fixture file under tests/fixtures, as text
 */
export function loadFixtureText(relativePath: string): string {
  return readFileSync(join(process.cwd(), "tests", "fixtures", relativePath), "utf-8");
}

export function loadFixtureJson(relativePath: string): unknown {
  return JSON.parse(loadFixtureText(relativePath));
}

function routeKey(method: string, url: string): string {
  const queryStart = url.indexOf("?");
  return `${method.toUpperCase()} ${queryStart === -1 ? url : url.slice(0, queryStart)}`;
}

function toResponse(req: HttpRequest, reply: MockHttpReply): HttpResponse {
  if (reply.status >= 200 && reply.status < 300) {
    return { status: reply.status, data: reply.status === 204 ? undefined : reply.body };
  }
  throw new HttpError({
    status: reply.status,
    statusText: "Mock Response",
    url: req.url,
    bodySnippet: typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body),
    headers: reply.headers ? new Headers(reply.headers) : undefined,
  });
}

export function createMockHttp(): MockHttp {
  const routes = new Map<string, RouteHandler>();
  const recorded: HttpRequest[] = [];

  return {
    on: (method, url, body) => {
      routes.set(routeKey(method, url), () => ({ status: 200, body }));
    },
    onResponse: (method, url, reply) => {
      routes.set(routeKey(method, url), () => reply);
    },
    onCustom: (method, url, handler) => {
      routes.set(routeKey(method, url), handler);
    },
    request: async (req) => {
      recorded.push({ ...req });
      const key = routeKey(req.method, req.url);
      const handler = routes.get(key);
      if (!handler) {
        const known = [...routes.keys()].join(", ") || "(none)";
        throw new Error(`[MockHttp] Unmocked request: ${key}. Known routes: ${known}`);
      }
      return toResponse(req, await handler(req));
    },
    getRecordedRequests: () => [...recorded],
    reset: () => {
      routes.clear();
      recorded.length = 0;
    },
  };
}
