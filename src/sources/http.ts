/**
 * HTTP Helpers for Site Adapters
 *
 * JSON GET with an AbortController timeout, plus the narrowing helpers the
 * adapters use to read untyped API payloads.
 *
 * @module sources/http
 */

import { ProxyAgent } from 'undici';
import type { Dispatcher } from 'undici';
import type { FetchFn, FetchInit } from './types.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Site API error with HTTP context.
 */
export class SourceApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'SourceApiError';
  }
}

// ============================================================================
// Fetch
// ============================================================================

export interface FetchJsonOptions {
  timeoutMs: number;
  fetchImpl?: FetchFn;
  /** undici dispatcher, e.g. a proxy agent */
  dispatcher?: Dispatcher;
}

/**
 * Build a proxy dispatcher for the site fetches, or undefined when no proxy
 * is configured.
 */
export function createProxyDispatcher(proxyUrl: string | undefined): Dispatcher | undefined {
  return proxyUrl ? new ProxyAgent(proxyUrl) : undefined;
}

/**
 * GET a URL and parse the JSON body.
 *
 * @returns Parsed body (unvalidated)
 * @throws SourceApiError on non-2xx status (retryable for 429 and 5xx),
 *   timeout (408) or a body that is not JSON
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const fetchImpl: FetchFn = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  const init: FetchInit = {
    headers: { Accept: 'application/json' },
    signal: controller.signal,
  };
  if (options.dispatcher) {
    init.dispatcher = options.dispatcher;
  }

  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new SourceApiError(`Request timed out after ${options.timeoutMs}ms`, 408, true);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => 'Unknown error');
    const isRetryable = response.status === 429 || response.status >= 500;
    throw new SourceApiError(`HTTP ${response.status} from ${url}: ${text}`, response.status, isRetryable);
  }

  try {
    return await response.json();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceApiError(`Invalid JSON from ${url}: ${message}`, response.status, false);
  }
}

// ============================================================================
// Payload Helpers
// ============================================================================

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First non-empty string (or finite number, stringified) among the keys.
 */
export function firstText(item: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return '';
}

/**
 * Read a numeric value, accepting numeric strings.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Keep a price only when it is a probability in [0, 1].
 */
export function toPrice(value: unknown): number | undefined {
  const price = toNumber(value);
  return price !== undefined && price >= 0 && price <= 1 ? price : undefined;
}
