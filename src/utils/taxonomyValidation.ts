/**
 * Taxonomy validation module
 *
 * Validates the taxonomy JSON structure and enforces its invariants:
 * - Every category holds at least one skill
 * - Entries are non-empty strings or well-formed objects
 * - Canonical skill names are unique across the whole taxonomy,
 *   compared after text normalization
 *
 * Validation is fail-fast: throws ConfigurationError on the first problem.
 */

import type { SkillEntryRaw, TaxonomyRaw } from "@/types";
import { UNVERSIONED_TAXONOMY } from "@/constants";
import { ConfigurationError } from "@/utils/errors";
import { isNonEmptyString, isRecord } from "@/utils/guards";
import { normalizeText } from "@/utils/text/textNormalization";

function fail(message: string): never {
  throw new ConfigurationError(`taxonomy ${message}`);
}

function validateStringList(
  value: unknown,
  fieldPath: string,
): asserts value is string[] | undefined {
  if (value === undefined) {
    return;
  }
  if (!Array.isArray(value)) {
    fail(`${fieldPath} must be an array, got ${typeof value}`);
  }
  value.forEach((item: unknown, index: number) => {
    if (!isNonEmptyString(item)) {
      fail(`${fieldPath}[${index}] must be a non-empty string`);
    }
  });
}

/**
 * Validates one skill entry.
 *
 * @param fieldPath - e.g. "categories.bases_donnees[2]"
 */
function validateEntry(
  entry: unknown,
  fieldPath: string,
): asserts entry is SkillEntryRaw {
  if (typeof entry === "string") {
    if (!isNonEmptyString(entry)) {
      fail(`${fieldPath} cannot be empty or whitespace-only`);
    }
    return;
  }

  if (!isRecord(entry)) {
    fail(`${fieldPath} must be a string or an object`);
  }
  if (!isNonEmptyString(entry.name)) {
    fail(`${fieldPath}.name must be a non-empty string`);
  }
  validateStringList(entry.synonyms, `${fieldPath}.synonyms`);
  validateStringList(entry.notFollowedBy, `${fieldPath}.notFollowedBy`);
}

/**
 * Canonical name of a validated entry
 */
export function entryName(entry: SkillEntryRaw): string {
  return typeof entry === "string" ? entry : entry.name;
}

/**
 * Validates raw taxonomy data from JSON.
 *
 * Accepts the versioned document `{ version, categories }` and the bare
 * `{ categoryId: entries[] }` mapping (reported as "unversioned").
 *
 * @throws {ConfigurationError} On the first structural or uniqueness problem
 *
 * @example
 * const raw = validateTaxonomyRaw(JSON.parse(jsonString));
 */
export function validateTaxonomyRaw(raw: unknown): TaxonomyRaw {
  if (!isRecord(raw)) {
    fail("must be an object");
  }

  const versioned = "categories" in raw;
  let version = UNVERSIONED_TAXONOMY;
  let categoriesValue: unknown = raw;

  if (versioned) {
    if (raw.version !== undefined) {
      if (!isNonEmptyString(raw.version)) {
        fail("version must be a non-empty string");
      }
      version = raw.version;
    }
    categoriesValue = raw.categories;
  }

  if (!isRecord(categoriesValue)) {
    fail("categories must be an object");
  }

  const categories: Record<string, SkillEntryRaw[]> = {};
  const seenNames = new Map<string, string>();

  for (const [categoryId, entries] of Object.entries(categoriesValue)) {
    const prefix = `categories.${categoryId}`;

    if (!Array.isArray(entries)) {
      fail(`${prefix} must be an array`);
    }
    if (entries.length === 0) {
      fail(`${prefix} cannot be empty`);
    }

    const validated: SkillEntryRaw[] = [];
    entries.forEach((entry: unknown, index: number) => {
      validateEntry(entry, `${prefix}[${index}]`);

      const name = entryName(entry);
      const key = normalizeText(name);
      const previous = seenNames.get(key);
      if (previous !== undefined) {
        fail(
          `duplicate skill name "${name}" in ${categoryId} (already defined in ${previous})`,
        );
      }
      seenNames.set(key, categoryId);
      validated.push(entry);
    });

    categories[categoryId] = validated;
  }

  return { version, categories };
}
