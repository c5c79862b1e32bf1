/**
 * Title Normalization for Matching
 *
 * Canonicalizes market titles so that the same question phrased with
 * different casing or punctuation compares equal token-for-token.
 *
 * @module matching/normalize
 */

/**
 * Punctuation replaced by a space (not removed, so "yes/no,maybe" style
 * runs do not fuse into a single token).
 */
const SEPARATOR_PUNCTUATION = /[?!,.:;()[\]]/g;

/**
 * Normalize a market title for comparison.
 *
 * Applies, in order:
 * 1. Lowercase
 * 2. Trim leading/trailing whitespace
 * 3. Replace each of `? ! , . : ; ( ) [ ]` with a space
 * 4. Collapse runs of spaces to a single space
 *
 * Stop-words, stemming and Unicode folding are intentionally left out.
 *
 * @example
 * ```typescript
 * normalizeTitle('Will BTC hit $100k (by Dec.)?');
 * // 'will btc hit $100k by dec '
 * ```
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .replace(SEPARATOR_PUNCTUATION, ' ')
    .replace(/ {2,}/g, ' ');
}
