/**
 * Matching Strategies
 *
 * A MatchingStrategy turns a flat list of market records into unified
 * products. The local strategy is the deterministic token-set clustering;
 * the LLM strategy lives in agents/. FallbackMatchingStrategy chains the two
 * so a failed model call degrades to local clustering instead of failing the
 * run.
 *
 * @module matching/strategy
 */

import type { MarketRecord, UnifiedProduct } from '../schemas/market.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ErrorRecorder } from '../metrics/tracker.js';
import { clusterMarkets } from './cluster.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Strategy for grouping records into unified products.
 */
export interface MatchingStrategy {
  /** Short identifier reported in run results (e.g. "local", "llm") */
  readonly name: string;
  match(records: readonly MarketRecord[], threshold: number): Promise<UnifiedProduct[]>;
}

// ============================================================================
// Local
// ============================================================================

/**
 * Deterministic clustering by title similarity.
 */
export class LocalMatchingStrategy implements MatchingStrategy {
  readonly name = 'local';

  async match(records: readonly MarketRecord[], threshold: number): Promise<UnifiedProduct[]> {
    return clusterMarkets(records, threshold);
  }
}

// ============================================================================
// Fallback
// ============================================================================

export interface FallbackOptions {
  logger?: Logger;
  metrics?: ErrorRecorder;
}

/**
 * Runs the primary strategy and falls back to the secondary on any error.
 *
 * `lastUsed` reports which strategy produced the most recent result.
 *
 * @example
 * ```typescript
 * const strategy = new FallbackMatchingStrategy(
 *   new LlmMatchingStrategy(client),
 *   new LocalMatchingStrategy(),
 *   { logger, metrics }
 * );
 * const products = await strategy.match(records, 0.78);
 * ```
 */
export class FallbackMatchingStrategy implements MatchingStrategy {
  readonly name: string;
  private used: string | undefined;
  private readonly logger: Logger;
  private readonly metrics: ErrorRecorder | undefined;

  constructor(
    private readonly primary: MatchingStrategy,
    private readonly fallback: MatchingStrategy,
    options: FallbackOptions = {}
  ) {
    this.name = `${primary.name}+${fallback.name}`;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
  }

  get lastUsed(): string | undefined {
    return this.used;
  }

  async match(records: readonly MarketRecord[], threshold: number): Promise<UnifiedProduct[]> {
    try {
      const products = await this.primary.match(records, threshold);
      this.used = this.primary.name;
      return products;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `${this.primary.name} matching failed (${message}), falling back to ${this.fallback.name}`
      );
      this.metrics?.recordError(error, `${this.primary.name}_matching`);

      const products = await this.fallback.match(records, threshold);
      this.used = this.fallback.name;
      return products;
    }
  }
}
