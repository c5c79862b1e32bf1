/**
 * Market Collector
 *
 * Fetches markets from several sources in parallel with:
 * - Bounded concurrency
 * - Per-source failure isolation (a failed site yields zero records)
 * - Results concatenated in the requested source order, regardless of
 *   which fetch finishes first
 *
 * @module sources/collector
 */

import type { MarketRecord } from '../schemas/market.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { RunMetrics } from '../metrics/tracker.js';
import { ConcurrencyLimiter } from './concurrency.js';
import type { SourceRegistry } from './registry.js';
import type { CollectResult, FetchOptions, SourceOutcome } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default concurrency limit for parallel source fetches */
const DEFAULT_CONCURRENCY = 3;

// ============================================================================
// Collection
// ============================================================================

/**
 * Options for collectMarkets.
 */
export interface CollectOptions extends FetchOptions {
  /** Concurrency limit for parallel fetches (default: 3) */
  concurrency?: number;
  logger?: Logger;
  metrics?: Pick<RunMetrics, 'recordSiteScraped' | 'recordError'>;
  /** Clock for durations (for testing) */
  now?: () => number;
}

/**
 * Collect markets from the given sources.
 *
 * Never rejects because of a source failure; each failure is logged,
 * recorded in metrics and reported as an 'error' outcome.
 *
 * @example
 * ```typescript
 * const { records, outcomes } = await collectMarkets(
 *   createDefaultRegistry(),
 *   ['polymarket', 'manifold'],
 *   { limit: 150, timeoutMs: 30_000, logger, metrics }
 * );
 * ```
 */
export async function collectMarkets(
  registry: SourceRegistry,
  sourceIds: readonly string[],
  options: CollectOptions
): Promise<CollectResult> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);
  const fetchOptions: FetchOptions = {
    limit: options.limit,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    dispatcher: options.dispatcher,
  };

  const collectOne = async (
    sourceId: string
  ): Promise<{ records: MarketRecord[]; outcome: SourceOutcome }> => {
    const startTime = now();
    const source = registry.get(sourceId);

    try {
      if (!source) {
        throw new Error(`Unknown source '${sourceId}'`);
      }

      logger.info(`Fetching markets from ${source.displayName}...`);
      const records = await limiter.run(() => source.fetchMarkets(fetchOptions));
      const durationMs = now() - startTime;

      logger.info(`Collected ${records.length} markets from ${sourceId}`);
      options.metrics?.recordSiteScraped(sourceId, records.length);

      return { records, outcome: { sourceId, status: 'ok', count: records.length, durationMs } };
    } catch (error) {
      const durationMs = now() - startTime;
      const message = error instanceof Error ? error.message : String(error);

      logger.warn(`Failed to fetch ${sourceId}: ${message}`);
      options.metrics?.recordError(error, `${sourceId}_fetch`);

      return {
        records: [],
        outcome: { sourceId, status: 'error', count: 0, durationMs, error: message },
      };
    }
  };

  const results = await Promise.all(sourceIds.map((id) => collectOne(id)));

  return {
    records: results.flatMap((r) => r.records),
    outcomes: results.map((r) => r.outcome),
  };
}
