/**
 * FranceTravailClient: API client for the "Offres d'emploi v2" API
 *
 * OAuth2 client-credentials authentication with a cached token, and
 * offer search paged through the `range` parameter.
 */

import type {
  FranceTravailOffer,
  HttpRequestFn,
  PostingCandidate,
  PostingSourceClient,
  SearchOffersQuery,
} from "@/types";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import {
  DEFAULT_MAX_OFFERS,
  DEFAULT_TOKEN_TTL_SECONDS,
  FRANCE_TRAVAIL_API_BASE_URL,
  FRANCE_TRAVAIL_ENV,
  FRANCE_TRAVAIL_MAX_RANGE_START,
  FRANCE_TRAVAIL_PAGE_SIZE,
  FRANCE_TRAVAIL_PROVIDER,
  FRANCE_TRAVAIL_SCOPE,
  FRANCE_TRAVAIL_SEARCH_PATH,
  FRANCE_TRAVAIL_TOKEN_URL,
  TOKEN_REFRESH_MARGIN_MS,
} from "@/constants";
import { ConfigurationError } from "@/utils/errors";
import { isNonEmptyString, isRecord } from "@/utils/guards";
import { loadRegionIndex, type RegionIndex } from "@/utils/geo/departments";
import { decodeOffer, mapFranceTravailOffer } from "./mappers";
import * as logger from "@/logger";

export interface FranceTravailClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  /**
   * Optional credentials (for testing)
   * Defaults to FRANCE_TRAVAIL_CLIENT_ID / FRANCE_TRAVAIL_CLIENT_SECRET
   */
  credentials?: {
    clientId: string;
    clientSecret: string;
  };

  /** Department → region table; loaded from data/regions.json when absent */
  regions?: RegionIndex;

  /** Clock used for token expiry (milliseconds) */
  now?: () => number;
}

type CachedToken = {
  value: string;
  expiresAt: number;
};

export type SearchOffersResult = {
  offers: FranceTravailOffer[];
  /** More offers may exist beyond the cap or the range limit */
  truncated: boolean;
};

export class FranceTravailClient
  implements PostingSourceClient<FranceTravailOffer>
{
  readonly provider = FRANCE_TRAVAIL_PROVIDER;

  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => number;
  private regions: RegionIndex | null;
  private token: CachedToken | null = null;

  constructor(config?: FranceTravailClientConfig) {
    this.clientId =
      config?.credentials?.clientId ??
      process.env[FRANCE_TRAVAIL_ENV.clientId] ??
      "";
    this.clientSecret =
      config?.credentials?.clientSecret ??
      process.env[FRANCE_TRAVAIL_ENV.clientSecret] ??
      "";

    if (!this.clientId || !this.clientSecret) {
      const missing: string[] = [];
      if (!this.clientId) missing.push(FRANCE_TRAVAIL_ENV.clientId);
      if (!this.clientSecret) missing.push(FRANCE_TRAVAIL_ENV.clientSecret);
      throw new ConfigurationError(
        `France Travail credentials missing: ${missing.join(", ")}`,
      );
    }

    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.now = config?.now ?? Date.now;
    this.regions = config?.regions ?? null;

    logger.debug("FranceTravailClient initialized");
  }

  /**
   * Bearer token, fetched again when missing or within the refresh margin
   */
  async getAccessToken(): Promise<string> {
    if (
      this.token &&
      this.now() < this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS
    ) {
      return this.token.value;
    }

    const response = await this.httpRequest({
      method: "POST",
      url: FRANCE_TRAVAIL_TOKEN_URL,
      form: {
        grant_type: "client_credentials",
        client_id: this.clientId,
        client_secret: this.clientSecret,
        scope: FRANCE_TRAVAIL_SCOPE,
      },
    });

    const data = response.data;
    if (!isRecord(data) || !isNonEmptyString(data.access_token)) {
      throw new ConfigurationError(
        "France Travail token response has no access_token",
      );
    }

    const ttlSeconds =
      typeof data.expires_in === "number" && data.expires_in > 0
        ? data.expires_in
        : DEFAULT_TOKEN_TTL_SECONDS;
    this.token = {
      value: data.access_token,
      expiresAt: this.now() + ttlSeconds * 1000,
    };
    logger.debug("France Travail token acquired", { ttlSeconds });

    return this.token.value;
  }

  /**
   * Fetch one page; a rejected token is refreshed once
   */
  private async fetchPage(
    query: SearchOffersQuery,
    range: string,
  ): Promise<{ status: number; data: unknown }> {
    const request = async () =>
      this.httpRequest({
        method: "GET",
        url: `${FRANCE_TRAVAIL_API_BASE_URL}${FRANCE_TRAVAIL_SEARCH_PATH}`,
        headers: {
          Authorization: `Bearer ${await this.getAccessToken()}`,
          Accept: "application/json",
        },
        query: {
          codeROME: query.romeCode,
          range,
          ...(query.departement ? { departement: query.departement } : {}),
          ...(query.commune ? { commune: query.commune } : {}),
        },
      });

    try {
      return await request();
    } catch (err) {
      if (err instanceof HttpError && err.status === 401 && this.token) {
        logger.warn("France Travail token rejected, refreshing");
        this.token = null;
        return request();
      }
      throw err;
    }
  }

  /**
   * Search offers for a ROME code, following pages until a short page,
   * a 204, the maxOffers cap or the range limit
   */
  async searchOffers(query: SearchOffersQuery): Promise<SearchOffersResult> {
    const cap = Math.max(0, query.maxOffers ?? DEFAULT_MAX_OFFERS);
    const offers: FranceTravailOffer[] = [];
    let start = 0;
    let exhausted = false;
    let pages = 0;

    while (!exhausted && offers.length < cap) {
      if (start > FRANCE_TRAVAIL_MAX_RANGE_START) {
        logger.warn("France Travail range limit reached", {
          romeCode: query.romeCode,
          fetched: offers.length,
        });
        break;
      }

      const size = Math.min(FRANCE_TRAVAIL_PAGE_SIZE, cap - offers.length);
      const range = `${start}-${start + size - 1}`;
      const response = await this.fetchPage(query, range);
      pages++;

      if (response.status === 204) {
        exhausted = true;
        break;
      }

      const items =
        isRecord(response.data) && Array.isArray(response.data.resultats)
          ? response.data.resultats
          : [];
      for (const item of items) {
        const offer = decodeOffer(item);
        if (offer) {
          offers.push(offer);
        } else {
          logger.warn("France Travail result is not an object, skipped", {
            range,
          });
        }
      }

      if (items.length < size) {
        exhausted = true;
      }
      start += size;
    }

    logger.info("France Travail search completed", {
      romeCode: query.romeCode,
      pages,
      offers: offers.length,
      truncated: !exhausted,
    });

    return { offers, truncated: !exhausted };
  }

  mapOffer(record: FranceTravailOffer): PostingCandidate {
    if (!this.regions) {
      this.regions = loadRegionIndex();
    }
    return mapFranceTravailOffer(record, this.regions);
  }
}
