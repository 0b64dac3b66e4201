/**
 * Taxonomy type definitions
 *
 * The taxonomy is the categorized vocabulary of recognized skills.
 *
 * Two forms exist:
 * - TaxonomyRaw: JSON shape (deserialized from file, after validation)
 * - TaxonomyRuntime: Compiled matcher table used by matcher and aggregator
 */

/**
 * Skill entry as written in the taxonomy JSON.
 *
 * Either a bare canonical name ("Python") or an object carrying
 * synonyms and follow-token exclusions.
 */
export type SkillEntryRaw =
  | string
  | {
      /** Canonical display name, unique across the taxonomy */
      name: string;
      /** Alternative spellings that activate the same skill */
      synonyms?: string[];
      /** Tokens that cancel a match when they directly follow it (e.g. "hub" after "git") */
      notFollowedBy?: string[];
    };

/**
 * Validated taxonomy document.
 *
 * Category order and skill order are preserved from the file;
 * they drive the order of matcher output.
 */
export type TaxonomyRaw = {
  version: string;
  categories: Record<string, SkillEntryRaw[]>;
};

/**
 * Runtime category representation.
 */
export type CategoryRuntime = {
  id: string;
  /** Canonical skill names of this category, in file order */
  skills: string[];
};

/**
 * Runtime skill definition (read-only part of a Skill).
 */
export type SkillDefinition = {
  /** Canonical display name */
  name: string;
  /** Normalized canonical name (lowercase, accent-folded) */
  key: string;
  categoryId: string;
  /** Raw synonyms from the taxonomy (canonical name excluded) */
  synonyms: string[];
  /** Position in taxonomy order, used for stable output ordering */
  order: number;
};

/**
 * One compiled alias of a skill.
 *
 * Multi-word aliases are kept as token sequences
 * (e.g., "amazon web services" → ["amazon", "web", "services"]).
 */
export type CompiledAlias = {
  skill: string;
  categoryId: string;
  tokens: string[];
  /** Normalized tokens that cancel the match when found right after it */
  notFollowedBy: string[];
};

/**
 * Compiled taxonomy.
 *
 * Provides fast lookups:
 * - Categories and skills by id/name (Map, insertion-ordered)
 * - Aliases indexed by their first token
 */
export type TaxonomyRuntime = {
  version: string;
  categories: Map<string, CategoryRuntime>;
  skills: Map<string, SkillDefinition>;
  aliasIndex: Map<string, CompiledAlias[]>;
};
