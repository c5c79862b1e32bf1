/**
 * Agents Module Exports
 *
 * Model-driven market matching.
 *
 * @module agents
 */

export {
  OpenAIChatClient,
  OpenAIApiError,
  DEFAULT_CHAT_TIMEOUT_MS,
  isOpenAIApiError,
  isRetryableError,
  toOpenAIApiError,
} from './client.js';
export type {
  ChatClient,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  OpenAIChatClientOptions,
} from './client.js';

export { MATCHER_SYSTEM_PROMPT, buildMatchingPrompt } from './prompts.js';

export {
  LLM_MATCH_TIMEOUT_MS,
  MAX_RETRIES,
  BASE_DELAY_MS,
  MatchMemberSchema,
  MatchGroupSchema,
  MatchResponseSchema,
  LlmMatchingError,
} from './types.js';
export type { MatchMember, MatchGroup, MatchResponse } from './types.js';

export {
  LlmMatchingStrategy,
  extractJson,
  parseMatchResponse,
  productsFromResponse,
} from './matcher.js';
export type { LlmMatchingOptions, TokenUsageRecorder } from './matcher.js';
