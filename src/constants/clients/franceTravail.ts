/**
 * France Travail API constants
 */

export const FRANCE_TRAVAIL_PROVIDER = "francetravail";

export const FRANCE_TRAVAIL_TOKEN_URL =
  "https://francetravail.io/connexion/oauth2/access_token?realm=%2Fpartenaire";

export const FRANCE_TRAVAIL_API_BASE_URL =
  "https://api.francetravail.io/partenaire/offresdemploi/v2";

export const FRANCE_TRAVAIL_SEARCH_PATH = "/offres/search";

export const FRANCE_TRAVAIL_SCOPE = "api_offresdemploiv2 o2dsoffre";

/**
 * Maximum page size accepted by the `range` parameter
 */
export const FRANCE_TRAVAIL_PAGE_SIZE = 150;

/**
 * Highest first index accepted by the `range` parameter
 */
export const FRANCE_TRAVAIL_MAX_RANGE_START = 3000;

/**
 * Tokens are refreshed this long before they expire
 */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;

/**
 * Lifetime assumed when the token response has no expires_in
 */
export const DEFAULT_TOKEN_TTL_SECONDS = 1_499;

/** Software development ROME code */
export const DEFAULT_ROME_CODE = "M1805";

export const DEFAULT_MAX_OFFERS = 1_000;

export const FRANCE_TRAVAIL_ENV = {
  clientId: "FRANCE_TRAVAIL_CLIENT_ID",
  clientSecret: "FRANCE_TRAVAIL_CLIENT_SECRET",
  romeCode: "FRANCE_TRAVAIL_ROME_CODE",
  departement: "FRANCE_TRAVAIL_DEPARTEMENT",
  maxOffers: "FRANCE_TRAVAIL_MAX_OFFERS",
} as const;
