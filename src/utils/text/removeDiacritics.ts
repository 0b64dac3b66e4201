import {
  LATIN_ACCENTED_PATTERN,
  LATIN_FOLDINGS,
} from "@/constants/textNormalization";

const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

/** Combining marks left on a basic Latin letter with no precomposed form */
const MARKS_AFTER_BASIC_LATIN_PATTERN = /(?<=[a-z])[\u0300-\u036f]+/gi;

/**
 * Folds Latin letters to their base letter.
 *
 * Input is composed to NFC first, so decomposed and precomposed accents
 * fold the same way. Only Latin characters are touched: each one is
 * NFD-decomposed and its combining marks removed; ligatures (œ, æ, ß) are
 * spelled out. Greek, Cyrillic, Devanagari and other scripts keep their
 * marks.
 *
 * @example
 * removeDiacritics("développeur") // "developpeur"
 * removeDiacritics("de\u0301veloppeur") // "developpeur"
 * removeDiacritics("cœur") // "coeur"
 * removeDiacritics("ελληνικά") // "ελληνικά"
 */
export function removeDiacritics(text: string): string {
  return text
    .normalize("NFC")
    .replace(
      LATIN_ACCENTED_PATTERN,
      (char) =>
        LATIN_FOLDINGS[char] ??
        char.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, ""),
    )
    .replace(MARKS_AFTER_BASIC_LATIN_PATTERN, "");
}
