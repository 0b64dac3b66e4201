/**
 * Taxonomy loading and compilation
 *
 * Loads the taxonomy JSON, validates it, and compiles it into the
 * runtime matcher table shared by the matcher and the aggregator.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CategoryRuntime,
  CompiledAlias,
  SkillDefinition,
  SkillEntryRaw,
  TaxonomyRaw,
  TaxonomyRuntime,
} from "@/types";
import {
  DEFAULT_TAXONOMY_PATH,
  JOINABLE_ALIAS_SEPARATOR_PATTERN,
  TAXONOMY_PATH_ENV,
  UNVERSIONED_TAXONOMY,
} from "@/constants";
import * as logger from "@/logger";
import { ConfigurationError } from "@/utils/errors";
import { entryName, validateTaxonomyRaw } from "@/utils/taxonomyValidation";
import { normalizeText, normalizeToTokens } from "@/utils/text/textNormalization";

type AliasCandidate = {
  raw: string;
  tokens: string[];
};

/**
 * Owner of each normalized alias ("amazon web services" → "AWS")
 */
type AliasOwners = Map<string, string>;

export function emptyTaxonomy(): TaxonomyRuntime {
  return {
    version: UNVERSIONED_TAXONOMY,
    categories: new Map(),
    skills: new Map(),
    aliasIndex: new Map(),
  };
}

function entrySynonyms(entry: SkillEntryRaw): string[] {
  return typeof entry === "string" ? [] : (entry.synonyms ?? []);
}

function compileNotFollowedBy(entry: SkillEntryRaw, skill: string): string[] {
  if (typeof entry === "string" || !entry.notFollowedBy) {
    return [];
  }
  return entry.notFollowedBy.map((raw) => {
    const tokens = normalizeToTokens(raw);
    if (tokens.length !== 1) {
      throw new ConfigurationError(
        `skill "${skill}" has notFollowedBy "${raw}" that is not a single token`,
      );
    }
    return tokens[0];
  });
}

/**
 * Joined single-token form of an alias, or null when it has no
 * `.`/`-` between alphanumerics ("Node.js" → "nodejs")
 */
function joinedVariant(alias: string): string | null {
  const joined = alias.replace(JOINABLE_ALIAS_SEPARATOR_PATTERN, "");
  if (joined === alias) {
    return null;
  }
  const normalized = normalizeText(joined);
  return normalized.length > 0 && !normalized.includes(" ") ? normalized : null;
}

function addAlias(
  index: Map<string, CompiledAlias[]>,
  alias: CompiledAlias,
): void {
  const first = alias.tokens[0];
  const bucket = index.get(first);
  if (bucket) {
    bucket.push(alias);
  } else {
    index.set(first, [alias]);
  }
}

/**
 * Compiles a validated raw taxonomy into runtime form.
 *
 * Compilation steps:
 * 1. Register categories and skills in file order
 * 2. Normalize the canonical name and every synonym into a token sequence
 * 3. Reject aliases with zero tokens and aliases claimed by two skills
 * 4. Add the joined variant of dotted/hyphenated aliases, unless another
 *    skill already owns it
 * 5. Index aliases by first token
 *
 * @throws {ConfigurationError} If an alias is empty after normalization or ambiguous
 */
export function compileTaxonomy(raw: TaxonomyRaw): TaxonomyRuntime {
  const categories = new Map<string, CategoryRuntime>();
  const skills = new Map<string, SkillDefinition>();
  const aliasIndex = new Map<string, CompiledAlias[]>();
  const owners: AliasOwners = new Map();
  const joinedCandidates: CompiledAlias[] = [];

  let order = 0;
  for (const [categoryId, entries] of Object.entries(raw.categories)) {
    const skillNames: string[] = [];

    for (const entry of entries) {
      const name = entryName(entry).trim();
      const synonyms = entrySynonyms(entry).map((s) => s.trim());
      const notFollowedBy = compileNotFollowedBy(entry, name);

      const candidates: AliasCandidate[] = [name, ...synonyms].map(
        (alias) => ({ raw: alias, tokens: normalizeToTokens(alias) }),
      );

      for (const candidate of candidates) {
        if (candidate.tokens.length === 0) {
          throw new ConfigurationError(
            `skill "${name}" has alias "${candidate.raw}" that normalizes to zero tokens`,
          );
        }

        const aliasKey = candidate.tokens.join(" ");
        const owner = owners.get(aliasKey);
        if (owner !== undefined && owner !== name) {
          throw new ConfigurationError(
            `alias "${candidate.raw}" of "${name}" is already an alias of "${owner}"`,
          );
        }
        if (owner === undefined) {
          owners.set(aliasKey, name);
          addAlias(aliasIndex, {
            skill: name,
            categoryId,
            tokens: candidate.tokens,
            notFollowedBy,
          });
        }

        const joined = joinedVariant(candidate.raw);
        if (joined !== null && joined !== aliasKey) {
          joinedCandidates.push({
            skill: name,
            categoryId,
            tokens: [joined],
            notFollowedBy,
          });
        }
      }

      skills.set(name, {
        name,
        key: normalizeText(name),
        categoryId,
        synonyms,
        order: order++,
      });
      skillNames.push(name);
    }

    categories.set(categoryId, { id: categoryId, skills: skillNames });
  }

  // Joined variants go last so an explicit alias always wins
  for (const alias of joinedCandidates) {
    const aliasKey = alias.tokens[0];
    const owner = owners.get(aliasKey);
    if (owner === undefined) {
      owners.set(aliasKey, alias.skill);
      addAlias(aliasIndex, alias);
    } else if (owner !== alias.skill) {
      logger.debug("Joined alias variant skipped, owned by another skill", {
        alias: aliasKey,
        skill: alias.skill,
        owner,
      });
    }
  }

  return { version: raw.version, categories, skills, aliasIndex };
}

/**
 * Resolves the taxonomy path: argument, then TAXONOMY_PATH, then the default
 */
export function resolveTaxonomyPath(taxonomyPath?: string): string {
  return path.resolve(
    process.cwd(),
    taxonomyPath || process.env[TAXONOMY_PATH_ENV] || DEFAULT_TAXONOMY_PATH,
  );
}

/**
 * Loads and compiles the taxonomy.
 *
 * A missing file is not fatal: a warning is logged and the empty taxonomy
 * returned, so the pipeline runs and detects nothing.
 *
 * @throws {ConfigurationError} If the file is unreadable, not JSON, or invalid
 *
 * @example
 * const taxonomy = loadTaxonomy();
 * console.log(`Loaded ${taxonomy.skills.size} skills`);
 */
export function loadTaxonomy(taxonomyPath?: string): TaxonomyRuntime {
  const resolved = resolveTaxonomyPath(taxonomyPath);

  if (!fs.existsSync(resolved)) {
    logger.warn("Taxonomy file not found, using empty taxonomy", {
      path: resolved,
    });
    return emptyTaxonomy();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`cannot parse taxonomy file ${resolved}`, {
      cause: err,
    });
  }

  const taxonomy = compileTaxonomy(validateTaxonomyRaw(raw));

  logger.info("Taxonomy loaded", {
    path: resolved,
    version: taxonomy.version,
    categories: taxonomy.categories.size,
    skills: taxonomy.skills.size,
  });

  return taxonomy;
}
