/**
 * Skill matcher implementation
 *
 * Detects taxonomy skills in normalized text by consecutive token
 * sequence matching against the precompiled alias index.
 *
 * Word boundaries come from tokenization: each token is atomic, so
 * "java" never matches inside "javascript" and a short synonym such as
 * "r" or "js" only matches a token that is exactly that synonym.
 */

import type { PostingInput, SkillMatch, TaxonomyRuntime } from "@/types";
import { normalizeText } from "@/utils/text/textNormalization";

/**
 * Checks that the alias tokens occur at `start` and the token after them
 * is not one of the alias exclusions.
 */
function aliasMatchesAt(
  tokens: string[],
  start: number,
  aliasTokens: string[],
  notFollowedBy: string[],
): boolean {
  const aliasLength = aliasTokens.length;
  if (start + aliasLength > tokens.length) {
    return false;
  }

  for (let j = 1; j < aliasLength; j++) {
    if (tokens[start + j] !== aliasTokens[j]) {
      return false;
    }
  }

  const next = tokens[start + aliasLength];
  return next === undefined || !notFollowedBy.includes(next);
}

/**
 * Extracts the skills mentioned in an already normalized text.
 *
 * Each skill is reported at most once, however many aliases or
 * occurrences matched, and the result follows taxonomy order. Skills do
 * not suppress each other: "node js" yields both Node.js and JavaScript.
 *
 * @param normalizedText - Output of normalizeText()
 * @returns Detected skills, empty for empty text or an empty taxonomy
 */
export function extractSkills(
  normalizedText: string,
  taxonomy: TaxonomyRuntime,
): SkillMatch[] {
  if (normalizedText.length === 0 || taxonomy.aliasIndex.size === 0) {
    return [];
  }

  const tokens = normalizedText.split(" ");
  const found = new Set<string>();

  for (let tokenIndex = 0; tokenIndex < tokens.length; tokenIndex++) {
    const candidates = taxonomy.aliasIndex.get(tokens[tokenIndex]);
    if (!candidates) {
      continue;
    }

    for (const alias of candidates) {
      if (found.has(alias.skill)) {
        continue;
      }
      if (
        aliasMatchesAt(tokens, tokenIndex, alias.tokens, alias.notFollowedBy)
      ) {
        found.add(alias.skill);
      }
    }
  }

  const matches: SkillMatch[] = [];
  for (const skill of taxonomy.skills.values()) {
    if (found.has(skill.name)) {
      matches.push({ categoryId: skill.categoryId, skill: skill.name });
    }
  }
  return matches;
}

/**
 * Matches a posting's title and description against the taxonomy.
 */
export function matchPosting(
  posting: Pick<PostingInput, "title" | "description">,
  taxonomy: TaxonomyRuntime,
): SkillMatch[] {
  return extractSkills(
    normalizeText(`${posting.title} ${posting.description}`),
    taxonomy,
  );
}

export function skillNames(matches: SkillMatch[]): string[] {
  return matches.map((match) => match.skill);
}
