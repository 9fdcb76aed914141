/**
 * @fileoverview Tokenization and marker matching shared by the lexical scorers
 * and the word-token explosion in the classification store.
 */

const WORD_PATTERN = /\b\w+\b/g;

/**
 * A word occurrence with its original casing and position in the unit.
 */
export interface WordOccurrence {
  text: string;
  lower: string;
  position: number;
}

/**
 * Lower-cased word tokens (`\b\w+\b`), in order, duplicates kept.
 *
 * @example
 * tokenize("We're cooked, it's over") // returns ["we", "re", "cooked", "it", "s", "over"]
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Word occurrences with positions, for the word-token table.
 *
 * @example
 * explodeWords("Hello World") // returns [{ text: "Hello", lower: "hello", position: 0 }, ...]
 */
export function explodeWords(text: string): WordOccurrence[] {
  const matches = text.match(WORD_PATTERN) ?? [];
  return matches.map((word, position) => ({
    text: word,
    lower: word.toLowerCase(),
    position,
  }));
}

/**
 * Distinct markers found as substrings of the lower-cased text.
 * Each marker counts once no matter how often it appears.
 *
 * @example
 * findPhraseMarkers("It's over, IT'S OVER", ["it's over", "too late"]) // returns ["it's over"]
 */
export function findPhraseMarkers(text: string, markers: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return markers.filter((marker) => lower.includes(marker.toLowerCase()));
}

/**
 * True when the text has no non-whitespace content.
 */
export function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}
