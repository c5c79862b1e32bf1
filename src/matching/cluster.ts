/**
 * Market Clustering
 *
 * Groups market records from different sites into unified products using a
 * single greedy pass:
 * - Each record is compared with every existing cluster's anchor title
 *   (the title of the cluster's first member) in creation order
 * - The record joins the FIRST cluster scoring >= threshold (first-fit,
 *   not best-fit), otherwise it opens a new cluster
 *
 * Anchors are never recomputed, so similarity is only guaranteed between a
 * member and its anchor, not between two members. Because placement is
 * first-fit, reordering the input can change the grouping; callers that need
 * reproducible output must hand records over in a stable order.
 *
 * @module matching/cluster
 */

import type { MarketRecord, UnifiedProduct } from '../schemas/market.js';
import { DEFAULT_MATCH_THRESHOLD, titleSimilarity } from './similarity.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A record placed in a cluster with its similarity to the cluster anchor.
 */
export interface ClusterMember {
  record: MarketRecord;
  score: number;
}

/**
 * Working cluster used during the clustering pass.
 */
export interface MarketCluster {
  /** Title of the first member; fixed for the cluster's lifetime */
  readonly anchorTitle: string;
  /** Members in arrival order */
  readonly members: ClusterMember[];
}

/**
 * Similarity function used to compare a record title with an anchor title.
 */
export type TitleScorer = (title: string, anchorTitle: string) => number;

// ============================================================================
// Clustering
// ============================================================================

/**
 * Partition records into clusters in one left-to-right pass.
 *
 * The threshold is used as given: a value above 1.0 leaves every record in
 * its own cluster, and a value <= 0 puts every record in the first cluster.
 *
 * @param records - Records in arrival order
 * @param threshold - Minimum anchor similarity to join a cluster
 * @param scorer - Title similarity (defaults to titleSimilarity)
 * @returns Clusters in creation order
 */
export function formMarketClusters(
  records: readonly MarketRecord[],
  threshold: number = DEFAULT_MATCH_THRESHOLD,
  scorer: TitleScorer = titleSimilarity
): MarketCluster[] {
  const clusters: MarketCluster[] = [];

  for (const record of records) {
    let placed = false;

    for (const cluster of clusters) {
      const score = scorer(record.title, cluster.anchorTitle);
      if (score >= threshold) {
        cluster.members.push({ record, score });
        placed = true;
        break;
      }
    }

    if (!placed) {
      clusters.push({ anchorTitle: record.title, members: [{ record, score: 1.0 }] });
    }
  }

  return clusters;
}

// ============================================================================
// Unified Products
// ============================================================================

/**
 * Pick the representative title for a cluster: the longest raw title,
 * keeping the first one on ties.
 */
export function selectRepresentativeTitle(titles: readonly string[]): string {
  let best = '';
  let bestLength = -1;

  for (const title of titles) {
    if (title.length > bestLength) {
      best = title;
      bestLength = title.length;
    }
  }

  return best;
}

/**
 * Build the unified product for one cluster.
 *
 * Members and scores keep cluster order; records are shared, not copied.
 */
export function buildUnifiedProduct(cluster: MarketCluster): UnifiedProduct {
  return {
    unifiedTitle: selectRepresentativeTitle(cluster.members.map((m) => m.record.title)),
    members: cluster.members.map((m) => m.record),
    confidenceScores: cluster.members.map((m) => m.score),
  };
}

/**
 * Cluster records and build one unified product per cluster.
 *
 * @example
 * ```typescript
 * const products = clusterMarkets([
 *   polymarket('Will Donald Trump win the 2024 US Presidential Election?'),
 *   manifold('Trump wins 2024 presidential election'),
 * ]);
 * // products.length === 1, confidenceScores ~ [1.0, 0.928]
 * ```
 */
export function clusterMarkets(
  records: readonly MarketRecord[],
  threshold: number = DEFAULT_MATCH_THRESHOLD
): UnifiedProduct[] {
  return formMarketClusters(records, threshold).map(buildUnifiedProduct);
}
