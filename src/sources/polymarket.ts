/**
 * Polymarket Source
 *
 * Reads markets from the public Polymarket CLOB API.
 *
 * @module sources/polymarket
 */

import { createMarketRecord } from '../schemas/market.js';
import type { MarketRecord } from '../schemas/market.js';
import { SourceApiError, fetchJson, firstText, isRecord, toNumber, toPrice } from './http.js';
import type { FetchOptions, MarketSource } from './types.js';

export const POLYMARKET_API_URL = 'https://clob.polymarket.com/markets';

const ID_KEYS = ['id', 'market_id', 'question_id', 'condition_id'] as const;
const TITLE_KEYS = ['question', 'title', 'name'] as const;

/**
 * Pick the market price: `last_price` when present, otherwise the implied
 * probability.
 */
function extractPrice(item: Record<string, unknown>): number | undefined {
  const lastPrice = toNumber(item.last_price);
  if (lastPrice !== undefined) {
    return toPrice(lastPrice);
  }
  return toPrice(item.impliedProbability ?? item.implied_probability);
}

/**
 * Convert a Polymarket response body into records.
 *
 * The body is either an array of markets or `{ data: [...] }`.
 *
 * @throws SourceApiError when the body has neither shape
 */
export function parsePolymarketMarkets(body: unknown, limit: number): MarketRecord[] {
  const items = Array.isArray(body) ? body : isRecord(body) && Array.isArray(body.data) ? body.data : undefined;
  if (!items) {
    throw new SourceApiError('Unexpected Polymarket response shape', 502, false);
  }

  const records: MarketRecord[] = [];
  for (const item of items) {
    if (records.length >= limit) break;
    if (!isRecord(item)) continue;

    const title = firstText(item, TITLE_KEYS);
    if (!title) continue;

    const marketId = firstText(item, ID_KEYS);
    const url = typeof item.url === 'string' && item.url.length > 0 ? item.url : undefined;

    records.push(
      createMarketRecord({
        site: 'polymarket',
        id: marketId || title,
        title,
        price: extractPrice(item),
        url: url ?? (marketId ? `https://polymarket.com/market/${marketId}` : undefined),
        additional: { raw: item },
      })
    );
  }
  return records;
}

export class PolymarketSource implements MarketSource {
  readonly id = 'polymarket';
  readonly displayName = 'Polymarket';

  async fetchMarkets(options: FetchOptions): Promise<MarketRecord[]> {
    const params = new URLSearchParams({ limit: String(options.limit) });
    const body = await fetchJson(`${POLYMARKET_API_URL}?${params.toString()}`, {
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetch,
      dispatcher: options.dispatcher,
    });
    return parsePolymarketMarkets(body, options.limit);
  }
}
