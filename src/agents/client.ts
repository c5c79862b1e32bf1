/**
 * OpenAI Chat Client
 *
 * Chat completions client used by the LLM matching strategy.
 * Handles authentication, timeouts, and response parsing.
 *
 * Callers depend on the ChatClient interface; OpenAIChatClient is the only
 * implementation that reaches the network.
 *
 * @module agents/client
 */

import OpenAI from 'openai';

// ============================================================================
// Types
// ============================================================================

/**
 * Message in the chat conversation.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for chat completion requests.
 */
export interface ChatOptions {
  /** Model to use (overrides the client default) */
  model?: string;
  /** Temperature for response randomness */
  temperature?: number;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Ask the model for a JSON object */
  json?: boolean;
}

/**
 * Response from the chat completion API.
 */
export interface ChatResponse {
  /** Generated text content */
  content: string;
  /** Token usage statistics */
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Model that was used */
  model: string;
  /** Finish reason */
  finishReason: string;
}

/**
 * Anything that can answer a chat completion request.
 */
export interface ChatClient {
  complete(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

/**
 * OpenAI API error with additional context.
 */
export class OpenAIApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'OpenAIApiError';
  }
}

/** Default request timeout */
export const DEFAULT_CHAT_TIMEOUT_MS = 60_000;

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

// ============================================================================
// Client Implementation
// ============================================================================

export interface OpenAIChatClientOptions {
  apiKey: string;
  /** Default model (e.g. gpt-4o-mini) */
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * ChatClient backed by the OpenAI chat completions API.
 *
 * @example
 * ```typescript
 * const client = new OpenAIChatClient({ apiKey, model: 'gpt-4o-mini' });
 * const response = await client.complete(
 *   [{ role: 'user', content: 'Reply with {"ok": true}' }],
 *   { json: true }
 * );
 * ```
 */
export class OpenAIChatClient implements ChatClient {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIChatClientOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
  }

  /**
   * Send a chat completion request.
   *
   * @throws OpenAIApiError on API errors or timeout
   */
  async complete(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const model = options.model ?? this.options.model;
    const timeoutMs = options.timeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages: messages.map((m) => ({
            role: m.role,
            content: m.content,
          })),
          temperature: options.temperature ?? this.options.temperature ?? 0,
          max_tokens: options.maxTokens ?? this.options.maxTokens,
          ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
        },
        {
          signal: controller.signal,
        }
      );

      const choice = response.choices[0];
      if (!choice?.message?.content) {
        throw new OpenAIApiError('Empty response from OpenAI', 500, true);
      }

      return {
        content: choice.message.content,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
        model: response.model,
        finishReason: choice.finish_reason ?? 'unknown',
      };
    } catch (error) {
      throw toOpenAIApiError(error, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Map any error thrown by the OpenAI SDK onto OpenAIApiError.
 */
export function toOpenAIApiError(error: unknown, timeoutMs: number): OpenAIApiError {
  if (error instanceof OpenAIApiError) {
    return error;
  }

  if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === 'AbortError')) {
    return new OpenAIApiError(`Request timed out after ${timeoutMs}ms`, 408, true);
  }

  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === 'number' ? error.status : 500;
    return new OpenAIApiError(error.message, status, RETRYABLE_STATUS.has(status));
  }

  return new OpenAIApiError(error instanceof Error ? error.message : 'Unknown error', 500, true);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is an OpenAI API error.
 */
export function isOpenAIApiError(error: unknown): error is OpenAIApiError {
  return error instanceof OpenAIApiError;
}

/**
 * Check if an error is retryable.
 *
 * @returns true if the error is transient and worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof OpenAIApiError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }

  return false;
}
