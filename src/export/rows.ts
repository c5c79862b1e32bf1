/**
 * Export Rows
 *
 * Flattens unified products into one row per (product, member) pair, in
 * product order and then member order.
 *
 * @module export/rows
 */

import type { UnifiedProduct } from '../schemas/market.js';

/**
 * Column order of the exported CSV.
 */
export const EXPORT_HEADER = ['unified_title', 'site', 'site_product_id', 'price', 'confidence'] as const;

export type ExportColumn = (typeof EXPORT_HEADER)[number];

/**
 * One exported row. All values are already formatted as text.
 */
export type ExportRow = Record<ExportColumn, string>;

/**
 * Serialize products into export rows.
 *
 * Price is empty when absent, otherwise fixed to 4 decimals; confidence is
 * fixed to 3 decimals.
 *
 * @example
 * ```typescript
 * toExportRows([{ unifiedTitle: 'X', members: [m], confidenceScores: [1] }]);
 * // [{ unified_title: 'X', site: 'polymarket', site_product_id: 'm1',
 * //    price: '0.4500', confidence: '1.000' }]
 * ```
 */
export function toExportRows(products: readonly UnifiedProduct[]): ExportRow[] {
  return products.flatMap((product) =>
    product.members.map((member, i) => ({
      unified_title: product.unifiedTitle,
      site: member.site,
      site_product_id: member.id,
      price: member.price === undefined ? '' : member.price.toFixed(4),
      confidence: (product.confidenceScores[i] ?? 0).toFixed(3),
    }))
  );
}
