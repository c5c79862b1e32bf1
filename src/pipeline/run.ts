/**
 * Pipeline Runner
 *
 * One unification run: collect markets, match them into unified products,
 * export the CSV and extend the search index.
 *
 * Source failures and index failures degrade the run; a failed CSV write
 * fails it.
 *
 * @module pipeline/run
 */

import { LlmMatchingStrategy } from '../agents/matcher.js';
import { writeProductsCsv } from '../export/csv.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import {
  FallbackMatchingStrategy,
  LocalMatchingStrategy,
  type MatchingStrategy,
} from '../matching/strategy.js';
import { RunMetrics } from '../metrics/tracker.js';
import type { MarketRecord } from '../schemas/market.js';
import { collectMarkets } from '../sources/collector.js';
import type { SourceOutcome } from '../sources/types.js';
import { getSampleMarkets } from './sample.js';
import type {
  EffectiveMode,
  PipelineDeps,
  PipelineOptions,
  PipelineResult,
  RunMode,
} from './types.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Resolve `auto` and downgrade `agent` when no chat client is available.
 */
export function resolveMode(mode: RunMode, hasChatClient: boolean, logger: Logger): EffectiveMode {
  switch (mode) {
    case 'auto':
      return hasChatClient ? 'agent' : 'local';
    case 'agent':
      if (!hasChatClient) {
        logger.warn('Agent mode requires OPENAI_API_KEY; running local matching instead');
        return 'local';
      }
      return 'agent';
    default:
      return mode;
  }
}

/**
 * Record per-site counts for records that did not come through the collector.
 */
function recordSampleSites(records: readonly MarketRecord[], metrics: RunMetrics): void {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.site, (counts.get(record.site) ?? 0) + 1);
  }
  for (const [site, count] of counts) {
    metrics.recordSiteScraped(site, count);
  }
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run the unification pipeline.
 *
 * @throws When the CSV cannot be written
 *
 * @example
 * ```typescript
 * const result = await runPipeline(
 *   {
 *     mode: 'auto',
 *     limit: 150,
 *     sources: ['polymarket', 'manifold', 'predictit'],
 *     threshold: 0.78,
 *     outputPath: 'data/output/unified_products.csv',
 *     buildIndex: true,
 *   },
 *   { registry: createDefaultRegistry(), logger, metrics }
 * );
 * ```
 */
export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const logger = deps.logger ?? silentLogger;
  const metrics = deps.metrics ?? new RunMetrics(logger);
  const now = deps.now ?? Date.now;
  const startTime = now();

  const mode = resolveMode(options.mode, deps.chatClient !== undefined, logger);
  logger.info(`Starting ${mode} run (threshold ${options.threshold})`);

  // Collect
  let records: MarketRecord[];
  let outcomes: SourceOutcome[] = [];

  if (mode === 'sample') {
    records = getSampleMarkets();
    recordSampleSites(records, metrics);
    logger.info(`Loaded ${records.length} sample markets`);
  } else {
    const collected = await collectMarkets(deps.registry, options.sources, {
      limit: options.limit,
      timeoutMs: options.timeoutMs ?? 30_000,
      concurrency: options.concurrency,
      fetch: deps.fetch,
      dispatcher: deps.dispatcher,
      logger,
      metrics,
      now,
    });
    records = collected.records;
    outcomes = collected.outcomes;
    logger.info(`Collected ${records.length} markets from ${options.sources.length} sources`);
  }

  if (records.length === 0) {
    logger.warn('No markets collected; nothing to export');
    metrics.setProcessingTime(now() - startTime);
    return {
      requestedMode: options.mode,
      mode,
      strategy: null,
      products: [],
      rowsWritten: 0,
      outputPath: null,
      outcomes,
      indexed: 0,
      metrics: metrics.getSummary(),
    };
  }

  // Match
  const fallback =
    mode === 'agent' && deps.chatClient
      ? new FallbackMatchingStrategy(
          new LlmMatchingStrategy(deps.chatClient, {
            model: deps.llmModel,
            logger,
            usage: metrics,
          }),
          new LocalMatchingStrategy(),
          { logger, metrics }
        )
      : undefined;
  const strategy: MatchingStrategy = fallback ?? new LocalMatchingStrategy();

  const products = await strategy.match(records, options.threshold);
  const strategyUsed = fallback ? (fallback.lastUsed ?? fallback.name) : strategy.name;
  metrics.setUnifiedProducts(products.length);
  logger.info(
    `Matched ${records.length} markets into ${products.length} unified products (${strategyUsed})`
  );

  // Export
  const rowsWritten = await writeProductsCsv(products, options.outputPath);
  logger.info(`Exported ${rowsWritten} rows to ${options.outputPath}`);

  // Index
  let indexed = 0;
  if (options.buildIndex && deps.index) {
    try {
      await deps.index.addProducts(products);
      indexed = products.length;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Search indexing failed: ${message}`);
      metrics.recordError(error, 'search_index');
    }
  } else if (options.buildIndex) {
    logger.debug('No search index configured; skipping indexing');
  }

  metrics.setProcessingTime(now() - startTime);

  return {
    requestedMode: options.mode,
    mode,
    strategy: strategyUsed,
    products,
    rowsWritten,
    outputPath: options.outputPath,
    outcomes,
    indexed,
    metrics: metrics.getSummary(),
  };
}
