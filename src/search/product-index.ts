/**
 * Product Index
 *
 * In-memory semantic index over unified products, persisted to a JSON cache
 * file so the chat and search commands can reuse the last run's products.
 *
 * @module search/product-index
 */

import { z } from 'zod';
import { UnifiedProductSchema, averageConfidence } from '../schemas/market.js';
import type { UnifiedProduct } from '../schemas/market.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { atomicWriteJson, fileExists, readValidatedJson } from '../storage/atomic.js';
import { cosineSimilarity } from './embeddings.js';
import type { Embedder } from './embeddings.js';

// ============================================================================
// Schemas
// ============================================================================

export const IndexEntrySchema = z.object({
  product: UnifiedProductSchema,
  text: z.string(),
  embedding: z.array(z.number()),
});

export type IndexEntry = z.infer<typeof IndexEntrySchema>;

/**
 * On-disk cache format.
 */
export const IndexCacheSchema = z.object({
  entries: z.array(IndexEntrySchema),
  savedAt: z.string(),
});

export type IndexCache = z.infer<typeof IndexCacheSchema>;

// ============================================================================
// Types
// ============================================================================

export interface SearchResult {
  product: UnifiedProduct;
  text: string;
  /** Cosine similarity between the query and the product text */
  similarity: number;
}

export interface IndexStats {
  totalProducts: number;
  totalMarkets: number;
  /** Site ids in first-seen order */
  sitesCovered: string[];
  /** Mean of per-product average confidences (0 when empty) */
  averageConfidence: number;
}

export interface ProductIndexOptions {
  embedder: Embedder;
  /** JSON cache file; the index stays in memory only when omitted */
  cachePath?: string;
  logger?: Logger;
  now?: () => Date;
}

/** Default number of search results */
export const DEFAULT_TOP_K = 5;

// ============================================================================
// Product Text
// ============================================================================

/**
 * Text used to embed a product.
 *
 * @example
 * ```typescript
 * productText(product);
 * // 'Product: BTC 100k | Available on polymarket: BTC 100k | Price: 0.3500 | Confidence: 1.000'
 * ```
 */
export function productText(product: UnifiedProduct): string {
  const parts = [`Product: ${product.unifiedTitle}`];

  product.members.forEach((member, i) => {
    parts.push(`Available on ${member.site}: ${member.title}`);
    if (member.price !== undefined) {
      parts.push(`Price: ${member.price.toFixed(4)}`);
    }
    parts.push(`Confidence: ${(product.confidenceScores[i] ?? 0).toFixed(3)}`);
  });

  return parts.join(' | ');
}

// ============================================================================
// ProductIndex Class
// ============================================================================

/**
 * Semantic product index.
 *
 * @example
 * ```typescript
 * const index = new ProductIndex({ embedder, cachePath: 'data/embeddings_cache.json' });
 * await index.load();
 * await index.addProducts(products);
 * const results = await index.search('crypto prices', 3);
 * ```
 */
export class ProductIndex {
  private entries: IndexEntry[] = [];
  private readonly embedder: Embedder;
  private readonly cachePath: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ProductIndexOptions) {
    this.embedder = options.embedder;
    this.cachePath = options.cachePath;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Load entries from the cache file, replacing the in-memory entries.
   *
   * A missing file leaves the index empty. A corrupt file is logged and
   * ignored.
   *
   * @returns Number of entries loaded
   */
  async load(): Promise<number> {
    if (!this.cachePath || !(await fileExists(this.cachePath))) {
      return 0;
    }

    try {
      const cache = await readValidatedJson(this.cachePath, IndexCacheSchema);
      this.entries = cache.entries;
      this.logger.info(`Loaded ${this.entries.length} cached product embeddings`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to load embeddings cache: ${message}`);
      this.entries = [];
    }
    return this.entries.length;
  }

  /**
   * Embed products, append them and save the cache.
   */
  async addProducts(products: readonly UnifiedProduct[]): Promise<void> {
    if (products.length === 0) {
      return;
    }

    this.logger.info(`Adding ${products.length} unified products to the search index`);
    const texts = products.map(productText);
    const embeddings = await this.embedder.embed(texts);

    if (embeddings.length !== products.length) {
      throw new Error(`Embedder returned ${embeddings.length} vectors for ${products.length} texts`);
    }

    products.forEach((product, i) => {
      this.entries.push({ product, text: texts[i], embedding: embeddings[i] });
    });

    await this.save();
    this.logger.info(`Search index now contains ${this.entries.length} products`);
  }

  /**
   * Remove all entries and save the (empty) cache.
   */
  async clear(): Promise<void> {
    this.entries = [];
    await this.save();
  }

  /**
   * Rank products by similarity to the query, best first.
   *
   * Ties keep insertion order.
   */
  async search(query: string, topK: number = DEFAULT_TOP_K): Promise<SearchResult[]> {
    if (this.entries.length === 0 || topK <= 0) {
      return [];
    }

    const embeddings = await this.embedder.embed([query]);
    if (embeddings.length !== 1) {
      throw new Error(`Embedder returned ${embeddings.length} vectors for 1 query`);
    }
    const queryEmbedding = embeddings[0];
    const results = this.entries
      .map((entry) => ({
        product: entry.product,
        text: entry.text,
        similarity: cosineSimilarity(queryEmbedding, entry.embedding),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);

    this.logger.debug(`Search for '${query}' returned ${results.length} results`);
    return results;
  }

  getStats(): IndexStats {
    const sites: string[] = [];
    let totalMarkets = 0;

    for (const { product } of this.entries) {
      totalMarkets += product.members.length;
      for (const member of product.members) {
        if (!sites.includes(member.site)) {
          sites.push(member.site);
        }
      }
    }

    const averages = this.entries.map((entry) => averageConfidence(entry.product));
    const mean = averages.length === 0 ? 0 : averages.reduce((sum, v) => sum + v, 0) / averages.length;

    return {
      totalProducts: this.entries.length,
      totalMarkets,
      sitesCovered: sites,
      averageConfidence: mean,
    };
  }

  private async save(): Promise<void> {
    if (!this.cachePath) {
      return;
    }
    const cache: IndexCache = { entries: this.entries, savedAt: this.now().toISOString() };
    await atomicWriteJson(this.cachePath, cache);
  }
}
