/**
 * Search Module Exports
 *
 * Semantic search and chat over unified products.
 *
 * @module search
 */

export {
  OpenAIEmbedder,
  DEFAULT_RETRY_CONFIG,
  calculateRetryDelay,
  cosineSimilarity,
  isRetryableEmbeddingError,
  prepareInput,
  withRetry,
} from './embeddings.js';
export type { Embedder, OpenAIEmbedderOptions, RetryConfig } from './embeddings.js';

export {
  ProductIndex,
  IndexEntrySchema,
  IndexCacheSchema,
  DEFAULT_TOP_K,
  productText,
} from './product-index.js';
export type {
  IndexEntry,
  IndexCache,
  IndexStats,
  ProductIndexOptions,
  SearchResult,
} from './product-index.js';

export {
  ChatSession,
  answerQuery,
  formatPercent,
  CHAT_TOP_K,
  HELP_TEXT,
  NO_RESULTS_MESSAGE,
  NO_RESULTS_TIP,
} from './chat.js';
export type { ChatExchange, ChatReply, ChatReplyKind, ChatSessionOptions } from './chat.js';
