/**
 * CLI Services
 *
 * Builds the collaborators commands share: configuration, the chat client,
 * the embedder and the persisted search index.
 *
 * @module cli/services
 */

import { OpenAIChatClient, type ChatClient } from '../agents/client.js';
import { ConfigError, getConfig, type AppConfig } from '../config/index.js';
import type { Logger } from '../logging/logger.js';
import { OpenAIEmbedder, type Embedder } from '../search/embeddings.js';
import { ProductIndex } from '../search/product-index.js';
import { getEmbeddingsCachePath } from '../storage/paths.js';
import { EXIT_CODES, type BaseCommand } from './base-command.js';

/**
 * Embedder used when no OpenAI key is configured. Reading the cached index
 * still works; anything that needs a new embedding fails.
 */
export class MissingKeyEmbedder implements Embedder {
  async embed(): Promise<number[][]> {
    throw new Error('OPENAI_API_KEY is required to embed text');
  }
}

/**
 * Load the process configuration, exiting with a usage error when the
 * environment is invalid.
 */
export function loadCliConfig(base: BaseCommand): AppConfig {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      base.error(error.message, EXIT_CODES.USAGE_ERROR);
    }
    throw error;
  }
}

/**
 * Chat client for agent mode, or undefined when no key is configured.
 */
export function createChatClient(config: AppConfig): ChatClient | undefined {
  const apiKey = config.apiKeys.openai;
  if (!apiKey) {
    return undefined;
  }
  return new OpenAIChatClient({ apiKey, model: config.models.llm });
}

export function createEmbedder(config: AppConfig): Embedder {
  const apiKey = config.apiKeys.openai;
  if (!apiKey) {
    return new MissingKeyEmbedder();
  }
  return new OpenAIEmbedder({ apiKey, model: config.models.embedding });
}

/**
 * Open the search index stored in the data directory.
 */
export async function openProductIndex(
  dataDir: string,
  embedder: Embedder,
  logger: Logger
): Promise<ProductIndex> {
  const index = new ProductIndex({
    embedder,
    cachePath: getEmbeddingsCachePath(dataDir),
    logger,
  });
  await index.load();
  return index;
}
