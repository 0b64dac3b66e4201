/**
 * Posting type definitions
 *
 * A posting is one job advertisement ingested from the external source.
 * PostingInput is the validated shape handed to the core; Posting adds the
 * fields the matcher fills in.
 */

/**
 * Work location of a posting
 */
export type PostingLocation = {
  label?: string;
  postalCode?: string;
  commune?: string;
  /** Department code ("54", "2A", "974") */
  departmentCode?: string;
  /** INSEE region code ("44") */
  regionCode?: string;
  regionLabel?: string;
};

/**
 * Contract attributes of a posting
 */
export type PostingContract = {
  /** Contract type code (CDI, CDD, MIS...) */
  type?: string;
  typeLabel?: string;
  nature?: string;
  experienceLabel?: string;
  workingHoursLabel?: string;
  alternance?: boolean;
};

/**
 * Validated posting, before skill extraction.
 *
 * Required: externalId, title, createdAt. Everything else is optional.
 */
export type PostingInput = {
  /** Identifier in the source system, stable across runs */
  externalId: string;
  title: string;
  description: string;
  /** Creation timestamp (ISO 8601) */
  createdAt: string;
  updatedAt?: string;
  companyName?: string;
  location: PostingLocation;
  contract: PostingContract;
  romeCode?: string;
  url?: string;
};

/**
 * Posting with extracted skills attached.
 *
 * `skills` holds canonical skill names, each at most once.
 * `processed` flips false → true once, when the matcher has run.
 */
export type Posting = PostingInput & {
  skills: string[];
  processed: boolean;
};

/**
 * Raw posting candidate as produced by a source mapper.
 *
 * Fields are not trusted yet; validatePosting() turns it into PostingInput.
 */
export type PostingCandidate = {
  externalId?: string | null;
  title?: string | null;
  description?: string | null;
  createdAt?: string | null;
  updatedAt?: string | null;
  companyName?: string | null;
  location?: PostingLocation;
  contract?: PostingContract;
  romeCode?: string | null;
  url?: string | null;
};
