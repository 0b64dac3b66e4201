/**
 * Text normalization constants
 *
 * Patterns used by normalizeText() for taxonomy compilation and
 * posting matching. Both sides go through the same normalizer.
 */

/**
 * HTML tags, e.g. `<p>`, `</li>`, `<br/>`
 */
export const HTML_TAG_PATTERN = /<[^>]*>/g;

/**
 * Named and numeric HTML entities, e.g. `&amp;`, `&eacute;`, `&#233;`, `&#xE9;`
 */
export const HTML_ENTITY_PATTERN =
  /&(?:([a-z][a-z0-9]*)|#(\d+)|#x([0-9a-f]+));/gi;

/**
 * Named accented-letter entities: base letter + accent name (`eacute`, `Ccedil`)
 */
export const ACCENTED_ENTITY_PATTERN =
  /^([a-z])(acute|grave|circ|uml|tilde|cedil|ring)$/i;

/**
 * Combining mark for each accent name of ACCENTED_ENTITY_PATTERN
 */
export const ENTITY_ACCENT_MARKS: Readonly<Record<string, string>> = {
  acute: "\u0301",
  grave: "\u0300",
  circ: "\u0302",
  uml: "\u0308",
  tilde: "\u0303",
  cedil: "\u0327",
  ring: "\u030a",
};

/**
 * Named ligature entities
 */
export const LIGATURE_ENTITIES: Readonly<Record<string, string>> = {
  oelig: "œ",
  OElig: "Œ",
  aelig: "æ",
  AElig: "Æ",
  szlig: "ß",
  oslash: "ø",
  Oslash: "Ø",
};

export const MAX_CODE_POINT = 0x10ffff;

/**
 * Latin letters that may carry diacritics (Latin-1 Supplement,
 * Latin Extended-A/B, Latin Extended Additional)
 */
export const LATIN_ACCENTED_PATTERN = /[\u00c0-\u024f\u1e00-\u1eff]/g;

/**
 * Latin ligatures and letters with no NFD decomposition
 */
export const LATIN_FOLDINGS: Readonly<Record<string, string>> = {
  "œ": "oe",
  "æ": "ae",
  "ß": "ss",
  "ø": "o",
  "đ": "d",
  "ł": "l",
};

/**
 * Characters kept after a letter or digit so that `c++`, `c#` and `f#`
 * survive as single tokens
 */
export const KEPT_SUFFIX_CHARS = new Set(["+", "#"]);

/**
 * Letter, combining mark or digit of any script
 */
export const WORD_CHAR_PATTERN = /[\p{L}\p{M}\p{N}]/u;

export const WHITESPACE_RUN_PATTERN = /\s+/g;
