/**
 * France Travail "Offres d'emploi v2" payload types
 *
 * Only the fields the mapper reads are declared; every field is optional
 * because the API omits empty ones.
 */

/**
 * Collection query
 */
export type SearchOffersQuery = {
  /** ROME job code (e.g. "M1805" for software development) */
  romeCode: string;
  /** Department code filter */
  departement?: string;
  /** INSEE commune code filter */
  commune?: string;
  /** Cap on the number of offers fetched */
  maxOffers?: number;
};

export type FranceTravailLieuTravail = {
  libelle?: string;
  latitude?: number;
  longitude?: number;
  codePostal?: string;
  commune?: string;
};

export type FranceTravailEntreprise = {
  nom?: string;
  description?: string;
  url?: string;
};

export type FranceTravailOffer = {
  id?: string;
  intitule?: string;
  description?: string;
  dateCreation?: string;
  dateActualisation?: string;
  lieuTravail?: FranceTravailLieuTravail;
  entreprise?: FranceTravailEntreprise;
  typeContrat?: string;
  typeContratLibelle?: string;
  natureContrat?: string;
  experienceLibelle?: string;
  dureeTravailLibelle?: string;
  alternance?: boolean;
  romeCode?: string;
  origineOffre?: {
    origine?: string;
    urlOrigine?: string;
  };
};

export type FranceTravailSearchResponse = {
  resultats?: FranceTravailOffer[];
};

export type FranceTravailTokenResponse = {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
};
