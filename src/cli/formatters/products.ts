/**
 * Product Formatters
 *
 * Terminal output for search results and index statistics.
 *
 * @module cli/formatters/products
 */

import chalk from 'chalk';
import { averageConfidence } from '../../schemas/market.js';
import { formatPercent } from '../../search/chat.js';
import type { IndexStats, SearchResult } from '../../search/product-index.js';

/**
 * Format ranked search results.
 *
 * @example
 * ```
 * 1. Will Bitcoin reach $100,000 by end of 2024?
 *    Similarity: 0.87 | Confidence: 91.9%
 *    polymarket: 35.0% | predictit: 38.0%
 * ```
 */
export function formatSearchResults(results: readonly SearchResult[]): string {
  const lines: string[] = [];

  results.forEach(({ product, similarity }, i) => {
    if (i > 0) {
      lines.push('');
    }
    lines.push(`${i + 1}. ${chalk.bold(product.unifiedTitle)}`);
    lines.push(
      `   ${chalk.dim('Similarity:')} ${similarity.toFixed(2)} | ${chalk.dim('Confidence:')} ${formatPercent(averageConfidence(product))}`
    );

    const prices = product.members.map(
      (member) =>
        `${member.site}: ${member.price === undefined ? chalk.dim('n/a') : formatPercent(member.price)}`
    );
    lines.push(`   ${prices.join(' | ')}`);
  });

  return lines.join('\n');
}

/**
 * Format index statistics as aligned key/value lines.
 */
export function formatIndexStats(stats: IndexStats): string {
  return [
    `Products:           ${stats.totalProducts}`,
    `Markets:            ${stats.totalMarkets}`,
    `Sites:              ${stats.sitesCovered.length > 0 ? stats.sitesCovered.join(', ') : '-'}`,
    `Average confidence: ${formatPercent(stats.averageConfidence)}`,
  ].join('\n');
}
