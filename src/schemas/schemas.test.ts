/**
 * Unit Tests for Market Schemas
 *
 * @module schemas/schemas.test
 */

import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import {
  MarketRecordSchema,
  PriceSchema,
  UnifiedProductSchema,
  averageConfidence,
  createMarketRecord,
} from './index.js';

describe('PriceSchema', () => {
  it('should accept the closed 0..1 range', () => {
    expect(PriceSchema.parse(0)).toBe(0);
    expect(PriceSchema.parse(1)).toBe(1);
    expect(PriceSchema.safeParse(1.01).success).toBe(false);
    expect(PriceSchema.safeParse(-0.1).success).toBe(false);
  });
});

describe('MarketRecordSchema', () => {
  it('should default additional metadata to an empty object', () => {
    const record = MarketRecordSchema.parse({ site: 'manifold', id: 'abc', title: 'Test market' });

    expect(record).toEqual({ site: 'manifold', id: 'abc', title: 'Test market', additional: {} });
  });

  it('should keep source-specific metadata as given', () => {
    const record = MarketRecordSchema.parse({
      site: 'polymarket',
      id: '0x1',
      title: 'Test market',
      price: 0.5,
      additional: { volume: 1200, tags: ['crypto'] },
    });

    expect(record.additional).toEqual({ volume: 1200, tags: ['crypto'] });
  });

  it('should reject an empty site', () => {
    expect(MarketRecordSchema.safeParse({ site: '', id: 'x', title: 't' }).success).toBe(false);
  });
});

describe('createMarketRecord', () => {
  it('should return a frozen record', () => {
    const record = createMarketRecord({ site: 'predictit', id: '7', title: 'Test', price: 0.4 });

    expect(Object.isFrozen(record)).toBe(true);
    expect(record.price).toBe(0.4);
  });

  it('should throw on out-of-range prices', () => {
    expect(() => createMarketRecord({ site: 'predictit', id: '7', title: 'Test', price: 4 })).toThrow(
      ZodError
    );
  });
});

describe('UnifiedProductSchema', () => {
  it('should reject confidence scores above 1', () => {
    const result = UnifiedProductSchema.safeParse({
      unifiedTitle: 'Test',
      members: [{ site: 'manifold', id: '1', title: 'Test' }],
      confidenceScores: [1.2],
    });

    expect(result.success).toBe(false);
  });
});

describe('averageConfidence', () => {
  it('should average the scores', () => {
    expect(averageConfidence({ confidenceScores: [1, 0.5] })).toBe(0.75);
  });

  it('should return 0 without scores', () => {
    expect(averageConfidence({ confidenceScores: [] })).toBe(0);
  });
});
