/**
 * Tests for the LLM Matching Strategy
 *
 * Uses a scripted ChatClient; no requests leave the process.
 */

import { describe, it, expect } from '@jest/globals';
import {
  LlmMatchingStrategy,
  extractJson,
  parseMatchResponse,
  productsFromResponse,
} from './matcher.js';
import type { ChatClient, ChatMessage, ChatOptions, ChatResponse } from './client.js';
import { OpenAIApiError, isRetryableError, toOpenAIApiError } from './client.js';
import { LlmMatchingError } from './types.js';
import { buildMatchingPrompt } from './prompts.js';
import { createMarketRecord } from '../schemas/market.js';
import type { MarketRecord } from '../schemas/market.js';
import { RunMetrics } from '../metrics/tracker.js';

// ============================================================================
// Helpers
// ============================================================================

const RECORDS: MarketRecord[] = [
  createMarketRecord({ site: 'polymarket', id: 'p1', title: 'Will Bitcoin reach $100,000 by end of 2024?', price: 0.35 }),
  createMarketRecord({ site: 'manifold', id: 'm1', title: 'Bitcoin reaches $100k by December 31, 2024', price: 0.32 }),
  createMarketRecord({ site: 'predictit', id: 'x1', title: 'Who will win Super Bowl LIX in 2025?' }),
];

type Reply = string | Error;

class ScriptedClient implements ChatClient {
  readonly calls: Array<{ messages: ChatMessage[]; options?: ChatOptions }> = [];

  constructor(private readonly replies: Reply[]) {}

  async complete(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages, options });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      content: reply,
      usage: { inputTokens: 120, outputTokens: 30 },
      model: 'test-model',
      finishReason: 'stop',
    };
  }
}

function groupingJson(products: Array<{ title?: string; members: Array<[number, number]> }>): string {
  return JSON.stringify({
    products: products.map((p) => ({
      title: p.title,
      members: p.members.map(([index, confidence]) => ({ index, confidence })),
    })),
  });
}

// ============================================================================
// Parsing
// ============================================================================

describe('extractJson', () => {
  it('should unwrap fenced code blocks', () => {
    expect(extractJson('Here you go:\n```json\n{"products": []}\n```')).toBe('{"products": []}');
  });

  it('should find a bare object inside prose', () => {
    expect(extractJson('Result: {"products": []} done')).toBe('{"products": []}');
  });
});

describe('parseMatchResponse', () => {
  it('should accept a valid grouping', () => {
    const parsed = parseMatchResponse(groupingJson([{ title: 'BTC', members: [[0, 1], [1, 0.9]] }]));

    expect(parsed.products[0].members).toEqual([
      { index: 0, confidence: 1 },
      { index: 1, confidence: 0.9 },
    ]);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseMatchResponse('{not json')).toThrow(LlmMatchingError);
  });

  it('should reject a response with the wrong shape', () => {
    expect(() => parseMatchResponse('{"groups": []}')).toThrow(/failed validation/);
  });
});

describe('productsFromResponse', () => {
  it('should build products, force the anchor to 1.0 and clamp confidences', () => {
    const products = productsFromResponse(RECORDS, {
      products: [{ members: [{ index: 1, confidence: 0.4 }, { index: 0, confidence: 1.7 }] }],
    });

    expect(products[0]).toEqual({
      unifiedTitle: 'Will Bitcoin reach $100,000 by end of 2024?',
      members: [RECORDS[1], RECORDS[0]],
      confidenceScores: [1.0, 1.0],
    });
  });

  it('should drop unknown and duplicate indices and skip empty groups', () => {
    const products = productsFromResponse(RECORDS, {
      products: [
        { members: [{ index: 0, confidence: 1 }, { index: 0, confidence: 0.9 }, { index: 9, confidence: 0.9 }] },
        { members: [{ index: -1, confidence: 1 }] },
        { members: [{ index: 0, confidence: 1 }, { index: 1, confidence: -0.2 }] },
      ],
    });

    expect(products.map((p) => p.members.map((m) => m.id))).toEqual([['p1'], ['m1'], ['x1']]);
    expect(products[1].confidenceScores).toEqual([1.0]);
  });

  it('should append omitted records as singletons in input order', () => {
    const products = productsFromResponse(RECORDS, {
      products: [{ members: [{ index: 2, confidence: 1 }] }],
    });

    expect(products.map((p) => p.members[0].id)).toEqual(['x1', 'p1', 'm1']);
    expect(products.flatMap((p) => p.members)).toHaveLength(RECORDS.length);
  });
});

describe('buildMatchingPrompt', () => {
  it('should number records and include prices and the threshold', () => {
    const prompt = buildMatchingPrompt(RECORDS, 0.78);

    expect(prompt).toContain('[0] (polymarket) Will Bitcoin reach $100,000 by end of 2024? | price: 0.35');
    expect(prompt).toContain('[2] (predictit) Who will win Super Bowl LIX in 2025? | price: n/a');
    expect(prompt).toContain('is at least 0.78');
  });
});

// ============================================================================
// Strategy
// ============================================================================

describe('LlmMatchingStrategy', () => {
  it('should return products from the model grouping', async () => {
    const client = new ScriptedClient([groupingJson([{ members: [[0, 1], [1, 0.88]] }])]);
    const metrics = new RunMetrics();
    const strategy = new LlmMatchingStrategy(client, { usage: metrics, model: 'gpt-4o-mini' });

    const products = await strategy.match(RECORDS, 0.78);

    expect(products.map((p) => p.confidenceScores)).toEqual([[1.0, 0.88], [1.0]]);
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].options).toEqual({ model: 'gpt-4o-mini', timeoutMs: 60_000, json: true });
    expect(client.calls[0].messages[0].role).toBe('system');
    expect(metrics.getSummary().llmTokens).toEqual({ input: 120, output: 30 });
  });

  it('should not call the model for no records', async () => {
    const client = new ScriptedClient([]);
    const strategy = new LlmMatchingStrategy(client);

    await expect(strategy.match([], 0.78)).resolves.toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  it('should retry after a malformed answer', async () => {
    const client = new ScriptedClient(['garbage', groupingJson([{ members: [[2, 1]] }])]);
    const strategy = new LlmMatchingStrategy(client, { baseDelayMs: 0 });

    const products = await strategy.match(RECORDS, 0.78);

    expect(client.calls).toHaveLength(2);
    expect(products).toHaveLength(3);
  });

  it('should retry retryable API errors and then give up', async () => {
    const client = new ScriptedClient([
      new OpenAIApiError('rate limited', 429, true),
      new OpenAIApiError('rate limited', 429, true),
    ]);
    const strategy = new LlmMatchingStrategy(client, { maxRetries: 1, baseDelayMs: 0 });

    await expect(strategy.match(RECORDS, 0.78)).rejects.toThrow('LLM matching failed: rate limited');
    expect(client.calls).toHaveLength(2);
  });

  it('should not retry non-retryable errors', async () => {
    const client = new ScriptedClient([new OpenAIApiError('invalid api key', 401, false)]);
    const strategy = new LlmMatchingStrategy(client, { baseDelayMs: 0 });

    await expect(strategy.match(RECORDS, 0.78)).rejects.toBeInstanceOf(LlmMatchingError);
    expect(client.calls).toHaveLength(1);
  });

  it('should surface the last validation error after exhausting retries', async () => {
    const client = new ScriptedClient(['{"products": 3}', '{"products": 3}']);
    const strategy = new LlmMatchingStrategy(client, { maxRetries: 1, baseDelayMs: 0 });

    await expect(strategy.match(RECORDS, 0.78)).rejects.toThrow(/failed validation/);
  });
});

// ============================================================================
// Client Helpers
// ============================================================================

describe('client error helpers', () => {
  it('should map abort errors to a retryable timeout', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    const mapped = toOpenAIApiError(abort, 5000);

    expect(mapped.statusCode).toBe(408);
    expect(mapped.message).toBe('Request timed out after 5000ms');
    expect(mapped.isRetryable).toBe(true);
  });

  it('should pass OpenAIApiError through unchanged', () => {
    const original = new OpenAIApiError('bad', 400, false);
    expect(toOpenAIApiError(original, 1000)).toBe(original);
  });

  it('should classify retryable errors', () => {
    expect(isRetryableError(new OpenAIApiError('x', 503, true))).toBe(true);
    expect(isRetryableError(new Error('socket ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('invalid request'))).toBe(false);
    expect(isRetryableError('string')).toBe(false);
  });
});
