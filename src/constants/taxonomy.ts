/**
 * Taxonomy configuration constants
 */

/**
 * Default path of the taxonomy JSON file, relative to the working directory.
 * Overridden by the TAXONOMY_PATH environment variable.
 */
export const DEFAULT_TAXONOMY_PATH = "data/taxonomy.json";

export const TAXONOMY_PATH_ENV = "TAXONOMY_PATH";

/**
 * Version reported for a bare `{ category: [...] }` document
 */
export const UNVERSIONED_TAXONOMY = "unversioned";

/**
 * A `.` or `-` between two letters or digits. Aliases containing one
 * also register their joined form ("vue.js" → "vuejs",
 * "micro-services" → "microservices").
 */
export const JOINABLE_ALIAS_SEPARATOR_PATTERN =
  /(?<=[\p{L}\p{N}])[.\-](?=[\p{L}\p{N}])/gu;

/**
 * Region lookup table (INSEE region code → label + department codes)
 */
export const REGIONS_PATH = "data/regions.json";
