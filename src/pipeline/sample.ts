/**
 * Sample Markets
 *
 * A fixed set of markets across three sites used by `--mode sample` to
 * exercise matching, export and indexing without network access.
 *
 * @module pipeline/sample
 */

import { createMarketRecord, type MarketRecord } from '../schemas/market.js';

const SAMPLE_MARKETS = [
  // Elections
  {
    site: 'polymarket',
    id: 'trump-2024',
    title: 'Will Donald Trump win the 2024 US Presidential Election?',
    price: 0.45,
    url: 'https://polymarket.com/event/trump-2024',
  },
  {
    site: 'manifold',
    id: 'trump-election',
    title: 'Trump wins 2024 presidential election',
    price: 0.42,
    url: 'https://manifold.markets/trump-2024',
  },
  {
    site: 'predictit',
    id: 'president-2024',
    title: 'Who will win the 2024 US Presidential Election?',
    price: 0.48,
    url: 'https://predictit.org/markets/2024-president',
  },

  // Crypto
  {
    site: 'polymarket',
    id: 'btc-100k',
    title: 'Will Bitcoin reach $100,000 by end of 2024?',
    price: 0.35,
    url: 'https://polymarket.com/event/btc-100k',
  },
  {
    site: 'manifold',
    id: 'bitcoin-100k',
    title: 'Bitcoin reaches $100k by December 31, 2024',
    price: 0.32,
    url: 'https://manifold.markets/bitcoin-100k',
  },
  {
    site: 'predictit',
    id: 'crypto-bull',
    title: 'Will Bitcoin exceed $100,000 in 2024?',
    price: 0.38,
    url: 'https://predictit.org/markets/bitcoin-100k',
  },

  // Sports
  {
    site: 'polymarket',
    id: 'super-bowl-2025',
    title: 'Who will win Super Bowl LIX in 2025?',
    price: 0.25,
    url: 'https://polymarket.com/event/super-bowl-2025',
  },
  {
    site: 'manifold',
    id: 'superbowl-winner',
    title: 'Kansas City Chiefs win Super Bowl LIX',
    price: 0.28,
    url: 'https://manifold.markets/superbowl-2025',
  },

  // Technology
  {
    site: 'polymarket',
    id: 'ai-breakthrough',
    title: 'Will OpenAI release GPT-5 in 2024?',
    price: 0.65,
    url: 'https://polymarket.com/event/gpt5-2024',
  },
  {
    site: 'manifold',
    id: 'gpt5-release',
    title: 'OpenAI releases GPT-5 to the public in 2024',
    price: 0.62,
    url: 'https://manifold.markets/gpt5-2024',
  },
  {
    site: 'predictit',
    id: 'ai-advancement',
    title: 'Will GPT-5 be publicly released in 2024?',
    price: 0.68,
    url: 'https://predictit.org/markets/gpt5-release',
  },

  // World events
  {
    site: 'polymarket',
    id: 'ukraine-peace',
    title: 'Will Russia and Ukraine sign a peace treaty in 2024?',
    price: 0.15,
    url: 'https://polymarket.com/event/ukraine-peace',
  },
  {
    site: 'manifold',
    id: 'russia-ukraine',
    title: 'Russia and Ukraine sign peace agreement in 2024',
    price: 0.12,
    url: 'https://manifold.markets/ukraine-peace',
  },

  // Entertainment
  {
    site: 'polymarket',
    id: 'oscars-2025',
    title: 'Who will win Best Picture at the 2025 Oscars?',
    price: 0.18,
    url: 'https://polymarket.com/event/oscars-2025',
  },
  {
    site: 'manifold',
    id: 'best-picture',
    title: 'Oppenheimer wins Best Picture at 2025 Oscars',
    price: 0.22,
    url: 'https://manifold.markets/oscars-2025',
  },
];

/**
 * Build the sample market records (fresh objects on every call).
 */
export function getSampleMarkets(): MarketRecord[] {
  return SAMPLE_MARKETS.map((market) => createMarketRecord(market));
}
