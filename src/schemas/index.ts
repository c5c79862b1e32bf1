/**
 * Zod Schemas
 *
 * Central export point for the market data model.
 *
 * @module schemas
 */

export {
  PriceSchema,
  MarketRecordSchema,
  UnifiedProductSchema,
  createMarketRecord,
  averageConfidence,
  type MarketRecord,
  type MarketRecordInput,
  type UnifiedProduct,
} from './market.js';
