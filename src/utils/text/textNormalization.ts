/**
 * Text normalization and tokenization utilities
 *
 * Deterministic text processing shared by taxonomy compilation and
 * posting matching. No stopword removal, stemming or language detection.
 */

import {
  ACCENTED_ENTITY_PATTERN,
  ENTITY_ACCENT_MARKS,
  HTML_ENTITY_PATTERN,
  HTML_TAG_PATTERN,
  KEPT_SUFFIX_CHARS,
  LIGATURE_ENTITIES,
  MAX_CODE_POINT,
  WHITESPACE_RUN_PATTERN,
  WORD_CHAR_PATTERN,
} from "@/constants/textNormalization";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

function decodeNamedEntity(name: string): string {
  const ligature = LIGATURE_ENTITIES[name];
  if (ligature !== undefined) {
    return ligature;
  }
  const accented = ACCENTED_ENTITY_PATTERN.exec(name);
  const mark = accented
    ? ENTITY_ACCENT_MARKS[accented[2].toLowerCase()]
    : undefined;
  if (accented && mark !== undefined) {
    return (accented[1] + mark).normalize("NFC");
  }
  return " ";
}

function decodeCodePoint(digits: string, radix: number): string {
  const codePoint = Number.parseInt(digits, radix);
  return codePoint > 0 && codePoint <= MAX_CODE_POINT
    ? String.fromCodePoint(codePoint)
    : " ";
}

/**
 * Decodes numeric entities and accented-letter entities (`&eacute;`,
 * `&oelig;`); any other named entity (`&amp;`, `&nbsp;`) becomes a space.
 */
function decodeEntities(text: string): string {
  return text.replace(
    HTML_ENTITY_PATTERN,
    (
      _match: string,
      name: string | undefined,
      dec: string | undefined,
      hex: string | undefined,
    ) => {
      if (name !== undefined) {
        return decodeNamedEntity(name);
      }
      if (dec !== undefined) {
        return decodeCodePoint(dec, 10);
      }
      return hex !== undefined ? decodeCodePoint(hex, 16) : " ";
    },
  );
}

/**
 * Replaces every character that is not a letter, mark or digit by a space,
 * keeping `+` and `#` right after a letter, a digit or another kept one.
 */
function stripPunctuation(text: string): string {
  let out = "";
  let previousKept = false;

  for (const char of text) {
    if (WORD_CHAR_PATTERN.test(char)) {
      out += char;
      previousKept = true;
    } else if (KEPT_SUFFIX_CHARS.has(char) && previousKept) {
      out += char;
    } else {
      out += " ";
      previousKept = false;
    }
  }

  return out;
}

/**
 * Normalizes free text for matching.
 *
 * Steps, in order:
 * 1. HTML tags become spaces; letter entities are decoded, others become spaces
 * 2. Lowercase
 * 3. Composed to NFC, Latin diacritics folded (é → e, œ → oe)
 * 4. Punctuation becomes spaces (`+`/`#` suffixes kept: c++, c#)
 * 5. Whitespace collapsed and trimmed
 *
 * Never throws; empty or punctuation-only input gives "".
 *
 * @example
 * normalizeText("<p>Développeur C++ / Node.js</p>")
 * // "developpeur c++ node js"
 */
export function normalizeText(text: string): string {
  const withoutHtml = decodeEntities(text.replace(HTML_TAG_PATTERN, " "));

  const folded = removeDiacritics(withoutHtml.toLowerCase());

  return stripPunctuation(folded).replace(WHITESPACE_RUN_PATTERN, " ").trim();
}

/**
 * Normalizes text and splits it into tokens.
 *
 * @example
 * normalizeToTokens("Full-Stack Developer (C#/Python)")
 * // ["full", "stack", "developer", "c#", "python"]
 */
export function normalizeToTokens(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized.length === 0 ? [] : normalized.split(" ");
}
