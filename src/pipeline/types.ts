/**
 * Pipeline Type Definitions
 *
 * Options, injected collaborators and the result of one unification run.
 *
 * @module pipeline/types
 */

import type { Dispatcher } from 'undici';
import type { ChatClient } from '../agents/client.js';
import type { Logger } from '../logging/logger.js';
import type { MetricsSummary, RunMetrics } from '../metrics/tracker.js';
import type { UnifiedProduct } from '../schemas/market.js';
import type { ProductIndex } from '../search/product-index.js';
import type { SourceRegistry } from '../sources/registry.js';
import type { FetchFn, SourceOutcome } from '../sources/types.js';

// ============================================================================
// Modes
// ============================================================================

/**
 * Run modes:
 * - `local`: collect from sources, cluster by title similarity
 * - `agent`: collect from sources, match with the chat model (local fallback)
 * - `auto`: `agent` when a chat client is available, otherwise `local`
 * - `sample`: built-in sample markets, local clustering, no network
 */
export const RUN_MODES = ['auto', 'local', 'agent', 'sample'] as const;

export type RunMode = (typeof RUN_MODES)[number];

/** Mode after `auto` and missing credentials are resolved */
export type EffectiveMode = Exclude<RunMode, 'auto'>;

export function isRunMode(value: string): value is RunMode {
  return (RUN_MODES as readonly string[]).includes(value);
}

// ============================================================================
// Options
// ============================================================================

export interface PipelineOptions {
  mode: RunMode;
  /** Markets requested per source */
  limit: number;
  /** Source ids to collect from, in output order */
  sources: readonly string[];
  /** Similarity threshold passed to the matching strategy */
  threshold: number;
  /** CSV destination */
  outputPath: string;
  /** Embed the products into the search index after export */
  buildIndex: boolean;
  /** Per-request timeout for source fetches */
  timeoutMs?: number;
  /** Parallel source fetches */
  concurrency?: number;
}

/**
 * Collaborators for a run. Everything with side effects is injected.
 */
export interface PipelineDeps {
  registry: SourceRegistry;
  /** Present only when an OpenAI key is configured; enables agent mode */
  chatClient?: ChatClient;
  /** Model name passed to the chat client */
  llmModel?: string;
  /** Search index to extend; indexing is skipped when absent */
  index?: ProductIndex;
  logger?: Logger;
  metrics?: RunMetrics;
  fetch?: FetchFn;
  /** Proxy dispatcher for source fetches */
  dispatcher?: Dispatcher;
  /** Clock for processing time (for testing) */
  now?: () => number;
}

// ============================================================================
// Result
// ============================================================================

export interface PipelineResult {
  requestedMode: RunMode;
  mode: EffectiveMode;
  /** Strategy that produced the products (null when nothing was collected) */
  strategy: string | null;
  products: UnifiedProduct[];
  rowsWritten: number;
  /** CSV path, or null when nothing was written */
  outputPath: string | null;
  /** Per-source outcomes (empty in sample mode) */
  outcomes: SourceOutcome[];
  /** Products added to the search index */
  indexed: number;
  metrics: MetricsSummary;
}
