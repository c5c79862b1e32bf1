/**
 * Market Schemas
 *
 * Zod schemas for market listings collected from prediction-market sites
 * and for the unified products formed by matching them across sites.
 *
 * @module schemas/market
 */

import { z } from 'zod';

// ============================================================================
// Market Record
// ============================================================================

/**
 * Probability/price of a binary market, expressed on a 0..1 scale.
 */
export const PriceSchema = z.number().min(0).max(1);

/**
 * MarketRecord: one listing from one site.
 *
 * `additional` is an opaque bag of source-specific metadata. Matching never
 * reads it; it is carried through to exports and the search index as-is.
 */
export const MarketRecordSchema = z.object({
  site: z.string().min(1),
  id: z.string(),
  title: z.string(),
  price: PriceSchema.optional(),
  url: z.string().optional(),
  additional: z.record(z.unknown()).default({}),
});

export type MarketRecord = z.infer<typeof MarketRecordSchema>;

/**
 * Input shape accepted by createMarketRecord (additional may be omitted).
 */
export type MarketRecordInput = z.input<typeof MarketRecordSchema>;

/**
 * Create a frozen MarketRecord, validating the fields.
 *
 * @throws ZodError when a field is out of range (e.g. price > 1)
 */
export function createMarketRecord(input: MarketRecordInput): MarketRecord {
  return Object.freeze(MarketRecordSchema.parse(input));
}

// ============================================================================
// Unified Product
// ============================================================================

/**
 * UnifiedProduct: a group of records judged to ask the same question.
 *
 * `members` and `confidenceScores` are index-aligned. The first member is the
 * cluster anchor and always scores exactly 1.0.
 */
export const UnifiedProductSchema = z.object({
  unifiedTitle: z.string(),
  members: z.array(MarketRecordSchema),
  confidenceScores: z.array(z.number().min(0).max(1)),
});

export type UnifiedProduct = z.infer<typeof UnifiedProductSchema>;

/**
 * Arithmetic mean of a product's confidence scores (0 when there are none).
 */
export function averageConfidence(product: Pick<UnifiedProduct, 'confidenceScores'>): number {
  const scores = product.confidenceScores;
  if (scores.length === 0) {
    return 0;
  }
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}
