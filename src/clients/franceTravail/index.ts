export { FranceTravailClient } from "./franceTravailClient";
export type {
  FranceTravailClientConfig,
  SearchOffersResult,
} from "./franceTravailClient";
export { decodeOffer, mapFranceTravailOffer } from "./mappers";
