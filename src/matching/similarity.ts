/**
 * Similarity Functions for Cross-Site Market Matching
 *
 * Titles for the same question differ between sites in clause order and
 * filler words ("Will X win the 2024 election?" vs "X wins 2024 election").
 * Token-set matching compares the shared tokens against each side's extras,
 * so reordering and padding cost little while unrelated titles score low.
 *
 * @module matching/similarity
 */

import { normalizeTitle } from './normalize.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Default threshold for placing a market into an existing cluster.
 * Markets scoring >= 0.78 against a cluster's anchor title join it.
 */
export const DEFAULT_MATCH_THRESHOLD = 0.78;

// ============================================================================
// Character-level ratio
// ============================================================================

/**
 * Length of the longest common subsequence of two strings (by code point).
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);

  if (left.length === 0 || right.length === 0) {
    return 0;
  }

  // Two-row DP table over the shorter string
  const [outer, inner] = left.length >= right.length ? [left, right] : [right, left];
  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (const ch of outer) {
    for (let j = 1; j <= inner.length; j++) {
      current[j] =
        ch === inner[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }

  return previous[inner.length];
}

/**
 * Normalized Indel ratio between two strings, on a 0-100 scale.
 *
 * The Indel distance counts insertions and deletions only
 * (`len(a) + len(b) - 2 * LCS(a, b)`); the ratio is
 * `100 - 100 * distance / (len(a) + len(b))`. Two empty strings score 100.
 *
 * @example
 * ```typescript
 * indelRatio('gamma', 'delta'); // 20 (one shared 'a')
 * ```
 */
export function indelRatio(a: string, b: string): number {
  const lengthSum = Array.from(a).length + Array.from(b).length;
  if (lengthSum === 0) {
    return 100;
  }
  const distance = lengthSum - 2 * longestCommonSubsequence(a, b);
  return 100 - (100 * distance) / lengthSum;
}

// ============================================================================
// Token-set ratio
// ============================================================================

/**
 * Split a string into its sorted unique whitespace-delimited tokens.
 */
function uniqueTokens(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((token) => token.length > 0));
}

function sortedJoin(tokens: Iterable<string>): string {
  return Array.from(tokens).sort().join(' ');
}

/**
 * Token-set ratio between two strings, on a 0-100 scale.
 *
 * Builds three strings from the unique tokens:
 * - `t0`: sorted intersection
 * - `t1`: `t0` followed by the sorted tokens only in `a`
 * - `t2`: `t0` followed by the sorted tokens only in `b`
 *
 * and returns the best Indel ratio among `(t0, t1)`, `(t0, t2)` and
 * `(t1, t2)`. When one token set contains the other the score is 100.
 * Empty token sets score 0.
 *
 * @example
 * ```typescript
 * tokenSetRatio('alpha beta', 'beta alpha gamma'); // 100
 * tokenSetRatio('alpha beta gamma', 'alpha beta delta'); // ~76.9
 * ```
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = uniqueTokens(a);
  const tokensB = uniqueTokens(b);

  if (tokensA.size === 0 || tokensB.size === 0) {
    return 0;
  }

  const intersection = [...tokensA].filter((token) => tokensB.has(token));
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token));
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token));

  if (intersection.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 100;
  }

  const t0 = sortedJoin(intersection);
  const t1 = [t0, sortedJoin(onlyA)].filter((part) => part.length > 0).join(' ');
  const t2 = [t0, sortedJoin(onlyB)].filter((part) => part.length > 0).join(' ');

  const pairwise = indelRatio(t1, t2);
  if (t0.length === 0) {
    return pairwise;
  }

  return Math.max(pairwise, indelRatio(t0, t1), indelRatio(t0, t2));
}

// ============================================================================
// Title similarity
// ============================================================================

/**
 * Similarity between two market titles in [0, 1].
 *
 * Both titles are normalized with normalizeTitle() before the token-set ratio
 * is taken. The score is symmetric, and any non-empty title scores 1.0
 * against itself.
 *
 * @example
 * ```typescript
 * titleSimilarity(
 *   'Will Donald Trump win the 2024 US Presidential Election?',
 *   'Trump wins 2024 presidential election'
 * );
 * // ~0.928
 * ```
 */
export function titleSimilarity(a: string, b: string): number {
  return tokenSetRatio(normalizeTitle(a), normalizeTitle(b)) / 100;
}
