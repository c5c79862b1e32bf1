/**
 * LLM Matching Strategy
 *
 * Asks a chat model to group market records and converts the validated
 * answer into unified products that satisfy the same invariants as local
 * clustering:
 * - Every record appears in exactly one product
 * - Confidence scores are in [0, 1] and the first member scores 1.0
 * - The unified title is the longest member title
 *
 * @module agents/matcher
 */

import type { MarketRecord, UnifiedProduct } from '../schemas/market.js';
import type { MatchingStrategy } from '../matching/strategy.js';
import { selectRepresentativeTitle } from '../matching/cluster.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ChatClient, ChatMessage } from './client.js';
import { isRetryableError } from './client.js';
import { MATCHER_SYSTEM_PROMPT, buildMatchingPrompt } from './prompts.js';
import {
  BASE_DELAY_MS,
  LLM_MATCH_TIMEOUT_MS,
  LlmMatchingError,
  MAX_RETRIES,
  MatchResponseSchema,
} from './types.js';
import type { MatchResponse } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Receives token usage for each successful request.
 */
export interface TokenUsageRecorder {
  addTokenUsage(input: number, output: number): void;
}

export interface LlmMatchingOptions {
  /** Model override passed to the client */
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base backoff delay (doubles on each retry) */
  baseDelayMs?: number;
  logger?: Logger;
  usage?: TokenUsageRecorder;
}

// ============================================================================
// Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract JSON from a response that might contain markdown code blocks.
 */
export function extractJson(content: string): string {
  const codeBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlockMatch) {
    return codeBlockMatch[1].trim();
  }

  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (jsonMatch) {
    return jsonMatch[0];
  }

  return content;
}

/**
 * Parse and validate a model answer.
 *
 * @throws LlmMatchingError on invalid JSON or schema mismatch
 */
export function parseMatchResponse(content: string): MatchResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(content));
  } catch (error) {
    throw new LlmMatchingError('Model returned invalid JSON', error);
  }

  const result = MatchResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new LlmMatchingError(`Model response failed validation: ${result.error.message}`, result.error);
  }
  return result.data;
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Turn a validated grouping into unified products.
 *
 * Unknown and repeated indices are dropped, empty groups are skipped, and
 * records the model left out are appended as singletons in input order.
 */
export function productsFromResponse(
  records: readonly MarketRecord[],
  response: MatchResponse
): UnifiedProduct[] {
  const used = new Set<number>();
  const products: UnifiedProduct[] = [];

  for (const group of response.products) {
    const members: MarketRecord[] = [];
    const scores: number[] = [];

    for (const member of group.members) {
      if (member.index < 0 || member.index >= records.length || used.has(member.index)) {
        continue;
      }
      used.add(member.index);
      members.push(records[member.index]);
      scores.push(members.length === 1 ? 1.0 : clampConfidence(member.confidence));
    }

    if (members.length > 0) {
      products.push({
        unifiedTitle: selectRepresentativeTitle(members.map((m) => m.title)),
        members,
        confidenceScores: scores,
      });
    }
  }

  records.forEach((record, index) => {
    if (!used.has(index)) {
      products.push({ unifiedTitle: record.title, members: [record], confidenceScores: [1.0] });
    }
  });

  return products;
}

// ============================================================================
// Strategy
// ============================================================================

/**
 * Matching strategy backed by a chat model.
 *
 * @example
 * ```typescript
 * const strategy = new LlmMatchingStrategy(new OpenAIChatClient({ apiKey, model }), {
 *   logger,
 *   usage: metrics,
 * });
 * const products = await strategy.match(records, 0.78);
 * ```
 */
export class LlmMatchingStrategy implements MatchingStrategy {
  readonly name = 'llm';
  private readonly logger: Logger;

  constructor(
    private readonly client: ChatClient,
    private readonly options: LlmMatchingOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws LlmMatchingError when every attempt fails
   */
  async match(records: readonly MarketRecord[], threshold: number): Promise<UnifiedProduct[]> {
    if (records.length === 0) {
      return [];
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: MATCHER_SYSTEM_PROMPT },
      { role: 'user', content: buildMatchingPrompt(records, threshold) },
    ];
    const maxRetries = this.options.maxRetries ?? MAX_RETRIES;
    const baseDelayMs = this.options.baseDelayMs ?? BASE_DELAY_MS;

    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.client.complete(messages, {
          model: this.options.model,
          timeoutMs: this.options.timeoutMs ?? LLM_MATCH_TIMEOUT_MS,
          json: true,
        });

        this.options.usage?.addTokenUsage(response.usage.inputTokens, response.usage.outputTokens);

        const products = productsFromResponse(records, parseMatchResponse(response.content));
        this.logger.debug(
          `LLM grouped ${records.length} markets into ${products.length} products (${response.model})`
        );
        return products;
      } catch (error) {
        lastError = error;
        const retryable = error instanceof LlmMatchingError || isRetryableError(error);

        if (!retryable || attempt >= maxRetries) {
          break;
        }

        const delay = baseDelayMs * Math.pow(2, attempt);
        this.logger.debug(`LLM matching attempt ${attempt + 1} failed, retrying in ${delay}ms`);
        await sleep(delay);
      }
    }

    if (lastError instanceof LlmMatchingError) {
      throw lastError;
    }
    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new LlmMatchingError(`LLM matching failed: ${message}`, lastError);
  }
}
