/**
 * Embedding Service
 *
 * Generates vector embeddings with OpenAI's embeddings API, retrying
 * transient failures with exponential backoff and jitter.
 *
 * The index depends on the Embedder interface only, so tests can plug in a
 * deterministic embedder.
 *
 * @module search/embeddings
 */

import OpenAI from 'openai';

// ============================================================================
// Types
// ============================================================================

/**
 * Turns texts into vectors, one per input, in input order.
 */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Retry configuration for OpenAI API calls
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Random jitter range in milliseconds */
  jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 16000,
  jitterMs: 1000,
};

/**
 * Approximate characters per token (conservative estimate)
 */
const CHARS_PER_TOKEN = 4;

/**
 * Input token limit of the text-embedding-3 models
 */
const MAX_INPUT_TOKENS = 8191;

/** Inputs per embeddings request */
const DEFAULT_BATCH_SIZE = 100;

// ============================================================================
// Retry
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate retry delay with exponential backoff and jitter
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt) + random(-jitter, +jitter)
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = Math.min(config.maxDelayMs, config.baseDelayMs * Math.pow(2, attempt));
  const jitter = (Math.random() * 2 - 1) * config.jitterMs;
  return Math.max(0, exponentialDelay + jitter);
}

/**
 * Type guard for API-like errors carrying an HTTP status.
 */
function hasStatusProperty(error: unknown): error is { status: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

/**
 * Check if an error is retryable (429, 5xx or a network failure).
 */
export function isRetryableEmbeddingError(error: unknown): boolean {
  if (hasStatusProperty(error)) {
    if (error.status === 429) return true;
    if (error.status >= 500) return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Run an API call, retrying transient failures.
 *
 * @throws Error after all retries are exhausted or on a permanent failure
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= retryConfig.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableEmbeddingError(error) || attempt >= retryConfig.maxRetries) {
        break;
      }

      await sleep(calculateRetryDelay(attempt, retryConfig));
    }
  }

  if (hasStatusProperty(lastError)) {
    if (lastError.status === 401) {
      throw new Error('Invalid OpenAI API key. Please check your OPENAI_API_KEY.');
    }
    if (lastError.status === 429) {
      throw new Error('OpenAI rate limit exceeded after retries. Please try again later.');
    }
    throw new Error(`OpenAI API error: ${lastError.message}`);
  }

  throw lastError instanceof Error ? lastError : new Error('Unknown error during embedding generation');
}

/**
 * Validate and prepare input text for embedding.
 *
 * @throws Error if input is empty
 */
export function prepareInput(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new Error('Input text cannot be empty');
  }
  return trimmed.slice(0, MAX_INPUT_TOKENS * CHARS_PER_TOKEN);
}

// ============================================================================
// Vector Math
// ============================================================================

/**
 * Cosine similarity of two vectors.
 *
 * Returns 0 when the lengths differ or either vector has zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ============================================================================
// OpenAI Embedder
// ============================================================================

export interface OpenAIEmbedderOptions {
  apiKey: string;
  /** Embedding model (e.g. text-embedding-3-small) */
  model: string;
  batchSize?: number;
  retryConfig?: Partial<RetryConfig>;
}

/**
 * Embedder backed by the OpenAI embeddings API.
 *
 * @example
 * ```typescript
 * const embedder = new OpenAIEmbedder({ apiKey, model: 'text-embedding-3-small' });
 * const [vector] = await embedder.embed(['Bitcoin above $100k in 2024']);
 * ```
 */
export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly retryConfig: RetryConfig;
  private readonly batchSize: number;

  constructor(private readonly options: OpenAIEmbedderOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const prepared = texts.map(prepareInput);
    const vectors: number[][] = [];

    for (let start = 0; start < prepared.length; start += this.batchSize) {
      const batch = prepared.slice(start, start + this.batchSize);
      const response = await withRetry(
        () => this.client.embeddings.create({ model: this.options.model, input: batch }),
        this.retryConfig
      );

      // The API may return items out of order; index restores input order
      const ordered = [...response.data].sort((x, y) => x.index - y.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }

    return vectors;
  }
}
