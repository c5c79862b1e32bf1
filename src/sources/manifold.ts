/**
 * Manifold Source
 *
 * Reads markets from the public Manifold Markets API.
 *
 * @module sources/manifold
 */

import { createMarketRecord } from '../schemas/market.js';
import type { MarketRecord } from '../schemas/market.js';
import { SourceApiError, fetchJson, firstText, isRecord, toPrice } from './http.js';
import type { FetchOptions, MarketSource } from './types.js';

export const MANIFOLD_API_URL = 'https://manifold.markets/api/v0/markets';

/**
 * Convert a Manifold response body (an array of markets) into records.
 *
 * @throws SourceApiError when the body is not an array
 */
export function parseManifoldMarkets(body: unknown, limit: number): MarketRecord[] {
  if (!Array.isArray(body)) {
    throw new SourceApiError('Unexpected Manifold response shape', 502, false);
  }

  const records: MarketRecord[] = [];
  for (const item of body) {
    if (records.length >= limit) break;
    if (!isRecord(item)) continue;

    const title = firstText(item, ['question', 'slug']);
    if (!title) continue;

    const slug = firstText(item, ['slug']);
    const creator = firstText(item, ['creatorUsername']);
    // Manifold only exposes a probability for binary markets
    const price = typeof item.probability === 'number' ? toPrice(item.probability) : undefined;

    records.push(
      createMarketRecord({
        site: 'manifold',
        id: firstText(item, ['id']) || title,
        title,
        price,
        url: slug ? `https://manifold.markets/${creator}/${slug}` : undefined,
        additional: { raw: item },
      })
    );
  }
  return records;
}

export class ManifoldSource implements MarketSource {
  readonly id = 'manifold';
  readonly displayName = 'Manifold Markets';

  async fetchMarkets(options: FetchOptions): Promise<MarketRecord[]> {
    const params = new URLSearchParams({ limit: String(options.limit) });
    const body = await fetchJson(`${MANIFOLD_API_URL}?${params.toString()}`, {
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetch,
      dispatcher: options.dispatcher,
    });
    return parseManifoldMarkets(body, options.limit);
  }
}
