/**
 * Tests for RunMetrics
 *
 * @module metrics/tracker.test
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { RunMetrics } from './tracker.js';
import type { Logger } from '../logging/logger.js';

function createRecordingLogger(): Logger & { errors: string[] } {
  const errors: string[] = [];
  return {
    errors,
    debug: jest.fn<(message: string) => void>(),
    info: jest.fn<(message: string) => void>(),
    warn: jest.fn<(message: string) => void>(),
    error: (message: string) => {
      errors.push(message);
    },
  };
}

describe('RunMetrics', () => {
  let metrics: RunMetrics;
  const fixedNow = () => new Date('2026-01-15T10:00:00.000Z');

  beforeEach(() => {
    metrics = new RunMetrics(undefined, fixedNow);
  });

  describe('constructor', () => {
    it('should start with an empty summary', () => {
      expect(metrics.getSummary()).toEqual({
        totalMarkets: 0,
        sitesScraped: [],
        unifiedProducts: 0,
        errorCount: 0,
        llmTokens: { input: 0, output: 0 },
        processingTimeSeconds: 0,
      });
    });
  });

  describe('recordSiteScraped', () => {
    it('should accumulate market counts across sites', () => {
      metrics.recordSiteScraped('polymarket', 120);
      metrics.recordSiteScraped('manifold', 80);

      const summary = metrics.getSummary();
      expect(summary.totalMarkets).toBe(200);
      expect(summary.sitesScraped).toEqual(['polymarket', 'manifold']);
    });

    it('should list each site once', () => {
      metrics.recordSiteScraped('polymarket', 10);
      metrics.recordSiteScraped('polymarket', 5);

      const summary = metrics.getSummary();
      expect(summary.sitesScraped).toEqual(['polymarket']);
      expect(summary.totalMarkets).toBe(15);
    });
  });

  describe('setters', () => {
    it('should report unified products and processing time in seconds', () => {
      metrics.setUnifiedProducts(42);
      metrics.setProcessingTime(2500);
      metrics.setMarketsCollected(15);

      const summary = metrics.getSummary();
      expect(summary.unifiedProducts).toBe(42);
      expect(summary.processingTimeSeconds).toBe(2.5);
      expect(summary.totalMarkets).toBe(15);
    });
  });

  describe('addTokenUsage', () => {
    it('should accumulate token counts', () => {
      metrics.addTokenUsage(100, 20);
      metrics.addTokenUsage(50, 5);

      expect(metrics.getSummary().llmTokens).toEqual({ input: 150, output: 25 });
    });
  });

  describe('recordError', () => {
    it('should record error details with context and timestamp', () => {
      const error = new TypeError('bad payload');
      metrics.recordError(error, 'manifold_fetch');

      expect(metrics.getErrors()).toEqual([
        {
          timestamp: '2026-01-15T10:00:00.000Z',
          errorType: 'TypeError',
          message: 'bad payload',
          context: 'manifold_fetch',
        },
      ]);
      expect(metrics.getSummary().errorCount).toBe(1);
    });

    it('should accept non-Error values', () => {
      metrics.recordError('plain failure', 'index');

      const [entry] = metrics.getErrors();
      expect(entry.errorType).toBe('string');
      expect(entry.message).toBe('plain failure');
    });

    it('should log each error through the injected logger', () => {
      const logger = createRecordingLogger();
      const logged = new RunMetrics(logger, fixedNow);

      logged.recordError(new Error('HTTP 503'), 'polymarket_fetch');

      expect(logger.errors).toEqual(['Error in polymarket_fetch: HTTP 503']);
    });

    it('should return copies of recorded errors', () => {
      metrics.recordError(new Error('x'), 'ctx');
      const errors = metrics.getErrors();
      errors[0].message = 'changed';

      expect(metrics.getErrors()[0].message).toBe('x');
    });
  });

  it('should keep separate state per instance', () => {
    const other = new RunMetrics();
    metrics.recordSiteScraped('predictit', 3);

    expect(other.getSummary().totalMarkets).toBe(0);
  });
});
