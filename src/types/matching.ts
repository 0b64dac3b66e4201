/**
 * Matching type definitions
 *
 * Types for skill matching results produced by the matcher.
 */

/**
 * One detected skill.
 *
 * The matcher returns each skill at most once per text, whatever the
 * number of aliases or occurrences that matched.
 */
export type SkillMatch = {
  /** Category the skill belongs to */
  categoryId: string;
  /** Canonical skill name */
  skill: string;
};
