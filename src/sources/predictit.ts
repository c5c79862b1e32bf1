/**
 * PredictIt Source
 *
 * Reads markets from the PredictIt market data feed. The feed has no limit
 * parameter, so the first `limit` markets are kept.
 *
 * @module sources/predictit
 */

import { createMarketRecord } from '../schemas/market.js';
import type { MarketRecord } from '../schemas/market.js';
import { SourceApiError, fetchJson, firstText, isRecord, toPrice } from './http.js';
import type { FetchOptions, MarketSource } from './types.js';

export const PREDICTIT_API_URL = 'https://www.predictit.org/api/marketdata/all';

/**
 * Highest numeric `lastTradePrice` across a market's contracts.
 */
function bestContractPrice(contracts: unknown): number | undefined {
  if (!Array.isArray(contracts)) {
    return undefined;
  }

  let best: number | undefined;
  for (const contract of contracts) {
    if (!isRecord(contract)) continue;
    const last = contract.lastTradePrice;
    if (typeof last === 'number' && Number.isFinite(last)) {
      best = best === undefined ? last : Math.max(best, last);
    }
  }
  return best;
}

/**
 * Convert a PredictIt response body (`{ markets: [...] }`) into records.
 *
 * @throws SourceApiError when `markets` is missing
 */
export function parsePredictItMarkets(body: unknown, limit: number): MarketRecord[] {
  if (!isRecord(body) || !Array.isArray(body.markets)) {
    throw new SourceApiError('Unexpected PredictIt response shape', 502, false);
  }

  const records: MarketRecord[] = [];
  for (const item of body.markets.slice(0, limit)) {
    if (!isRecord(item)) continue;

    const title = firstText(item, ['name']);
    if (!title) continue;

    const marketId = firstText(item, ['id']) || title;
    const url = firstText(item, ['url']);

    records.push(
      createMarketRecord({
        site: 'predictit',
        id: marketId,
        title,
        price: toPrice(bestContractPrice(item.contracts)),
        url: url || `https://www.predictit.org/markets/detail/${marketId}`,
        additional: { raw: item },
      })
    );
  }
  return records;
}

export class PredictItSource implements MarketSource {
  readonly id = 'predictit';
  readonly displayName = 'PredictIt';

  async fetchMarkets(options: FetchOptions): Promise<MarketRecord[]> {
    const body = await fetchJson(PREDICTIT_API_URL, {
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetch,
      dispatcher: options.dispatcher,
    });
    return parsePredictItMarkets(body, options.limit);
  }
}
