/**
 * Source Framework Types
 *
 * Core interfaces for the site adapters that collect market listings.
 * Each source is a pluggable adapter (Polymarket, Manifold, PredictIt)
 * that fetches one site's public API and returns MarketRecords.
 *
 * @module sources/types
 */

import type { Dispatcher } from 'undici';
import type { MarketRecord } from '../schemas/market.js';

// ============================================================================
// Fetch Options
// ============================================================================

/**
 * Request options accepted by Node's fetch, including undici's dispatcher.
 */
export type FetchInit = RequestInit & { dispatcher?: Dispatcher };

/**
 * fetch-compatible function (injectable for tests).
 */
export type FetchFn = (input: string, init?: FetchInit) => Promise<Response>;

/**
 * Options passed to every source fetch.
 */
export interface FetchOptions {
  /** Maximum markets to return from the source */
  limit: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** fetch implementation (defaults to global fetch) */
  fetch?: FetchFn;
  /** Proxy dispatcher for every request */
  dispatcher?: Dispatcher;
}

// ============================================================================
// Source Interface
// ============================================================================

/**
 * A prediction-market site adapter.
 */
export interface MarketSource {
  /** Site identifier stored on every record (e.g. "polymarket") */
  readonly id: string;
  /** Human-readable site name */
  readonly displayName: string;
  /**
   * Fetch up to `options.limit` markets.
   *
   * @throws SourceApiError on HTTP errors, timeouts or malformed bodies
   */
  fetchMarkets(options: FetchOptions): Promise<MarketRecord[]>;
}

/**
 * Factory for lazy source construction.
 */
export type SourceFactory = () => MarketSource;

// ============================================================================
// Collection Results
// ============================================================================

/**
 * Outcome of one source during a collection run.
 */
export interface SourceOutcome {
  sourceId: string;
  status: 'ok' | 'error';
  /** Markets returned (0 on error) */
  count: number;
  durationMs: number;
  /** Error message when status is 'error' */
  error?: string;
}

/**
 * Result of collecting from several sources.
 */
export interface CollectResult {
  /** Records concatenated in requested source order */
  records: MarketRecord[];
  /** One outcome per requested source, in requested order */
  outcomes: SourceOutcome[];
}
