/**
 * Sources Module Exports
 *
 * Site adapters and parallel collection.
 *
 * @module sources
 */

export type {
  FetchFn,
  FetchInit,
  FetchOptions,
  MarketSource,
  SourceFactory,
  SourceOutcome,
  CollectResult,
} from './types.js';

export { SourceApiError, createProxyDispatcher, fetchJson, isRecord, firstText, toNumber, toPrice } from './http.js';
export type { FetchJsonOptions } from './http.js';

export { PolymarketSource, parsePolymarketMarkets, POLYMARKET_API_URL } from './polymarket.js';
export { ManifoldSource, parseManifoldMarkets, MANIFOLD_API_URL } from './manifold.js';
export { PredictItSource, parsePredictItMarkets, PREDICTIT_API_URL } from './predictit.js';

export { SourceRegistry, createDefaultRegistry, DEFAULT_SOURCE_IDS } from './registry.js';
export type { DefaultSourceId } from './registry.js';

export { ConcurrencyLimiter } from './concurrency.js';
export type { ConcurrencyStats } from './concurrency.js';

export { collectMarkets } from './collector.js';
export type { CollectOptions } from './collector.js';
