/**
 * Matching Module Exports
 *
 * Cross-site market matching:
 * - Title normalization
 * - Token-set similarity
 * - Greedy first-fit clustering into unified products
 * - Pluggable matching strategies
 *
 * @module matching
 */

export { normalizeTitle } from './normalize.js';

export {
  DEFAULT_MATCH_THRESHOLD,
  longestCommonSubsequence,
  indelRatio,
  tokenSetRatio,
  titleSimilarity,
} from './similarity.js';

export {
  formMarketClusters,
  selectRepresentativeTitle,
  buildUnifiedProduct,
  clusterMarkets,
} from './cluster.js';
export type { ClusterMember, MarketCluster, TitleScorer } from './cluster.js';

export { LocalMatchingStrategy, FallbackMatchingStrategy } from './strategy.js';
export type { MatchingStrategy, FallbackOptions } from './strategy.js';
