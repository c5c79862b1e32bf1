/**
 * Prediction Market Unifier
 *
 * Library entry point. The CLI lives in `cli/`.
 *
 * @example
 * ```typescript
 * import { createDefaultRegistry, runPipeline, createLogger, RunMetrics } from 'prediction-market-unifier';
 *
 * const logger = createLogger({ level: 'info' });
 * const result = await runPipeline(
 *   { mode: 'local', limit: 100, sources: ['polymarket', 'manifold'], threshold: 0.78,
 *     outputPath: 'data/output/unified_products.csv', buildIndex: false },
 *   { registry: createDefaultRegistry(), logger, metrics: new RunMetrics(logger) }
 * );
 * ```
 *
 * @module prediction-market-unifier
 */

export * from './schemas/index.js';
export * from './matching/index.js';
export * from './sources/index.js';
export * from './agents/index.js';
export * from './export/index.js';
export * from './search/index.js';
export * from './metrics/index.js';
export * from './logging/index.js';
export * from './storage/index.js';
export * from './pipeline/index.js';
export {
  loadConfig,
  getConfig,
  resetConfig,
  hasApiKey,
  requireApiKey,
  ConfigError,
  type AppConfig,
  type ApiKeyName,
} from './config/index.js';
