/**
 * Tests for the pipeline runner
 *
 * @module pipeline/pipeline.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { OpenAIApiError, type ChatClient, type ChatResponse } from '../agents/client.js';
import type { Logger } from '../logging/logger.js';
import { RunMetrics } from '../metrics/tracker.js';
import { createMarketRecord, type MarketRecord } from '../schemas/market.js';
import type { Embedder } from '../search/embeddings.js';
import { ProductIndex } from '../search/product-index.js';
import { SourceRegistry } from '../sources/registry.js';
import type { MarketSource } from '../sources/types.js';
import { resolveMode, runPipeline } from './run.js';
import { getSampleMarkets } from './sample.js';
import { isRunMode, type PipelineOptions } from './types.js';

// ============================================================================
// Fakes
// ============================================================================

class CapturingLogger implements Logger {
  readonly lines: string[] = [];
  debug(message: string): void {
    this.lines.push(`debug: ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
  get warnings(): string[] {
    return this.lines.filter((l) => l.startsWith('warn: ')).map((l) => l.slice(6));
  }
}

function staticSource(id: string, records: MarketRecord[]): MarketSource {
  return {
    id,
    displayName: id,
    fetchMarkets: async () => records,
  };
}

function failingSource(id: string, message: string): MarketSource {
  return {
    id,
    displayName: id,
    fetchMarkets: async () => {
      throw new Error(message);
    },
  };
}

class FixedClient implements ChatClient {
  calls = 0;
  constructor(private readonly reply: string | Error) {}

  async complete(): Promise<ChatResponse> {
    this.calls++;
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return {
      content: this.reply,
      usage: { inputTokens: 200, outputTokens: 40 },
      model: 'test-model',
      finishReason: 'stop',
    };
  }
}

class ConstantEmbedder implements Embedder {
  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(() => [1, 0]);
  }
}

class BrokenEmbedder implements Embedder {
  async embed(): Promise<number[][]> {
    throw new Error('embedding service unavailable');
  }
}

const BTC_POLY = createMarketRecord({
  site: 'polymarket',
  id: 'btc-100k',
  title: 'Will Bitcoin reach $100,000 by end of 2024?',
  price: 0.35,
});
const BTC_MANIFOLD = createMarketRecord({
  site: 'manifold',
  id: 'bitcoin-100k',
  title: 'Bitcoin reaches $100k by December 31, 2024',
  price: 0.32,
});

function tick(): () => number {
  let t = 0;
  return () => {
    t += 250;
    return t;
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('pipeline', () => {
  let tempDir: string;
  let outputPath: string;
  let logger: CapturingLogger;
  let metrics: RunMetrics;

  const options = (overrides: Partial<PipelineOptions> = {}): PipelineOptions => ({
    mode: 'local',
    limit: 50,
    sources: ['polymarket', 'manifold'],
    threshold: 0.78,
    outputPath,
    buildIndex: false,
    ...overrides,
  });

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pmu-pipeline-'));
    outputPath = join(tempDir, 'output', 'unified_products.csv');
    logger = new CapturingLogger();
    metrics = new RunMetrics(logger, () => new Date('2024-06-01T12:00:00Z'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('isRunMode', () => {
    it('should accept known modes only', () => {
      expect(isRunMode('sample')).toBe(true);
      expect(isRunMode('auto')).toBe(true);
      expect(isRunMode('remote')).toBe(false);
    });
  });

  describe('resolveMode', () => {
    it('should pick agent for auto only with a chat client', () => {
      expect(resolveMode('auto', true, logger)).toBe('agent');
      expect(resolveMode('auto', false, logger)).toBe('local');
      expect(logger.warnings).toEqual([]);
    });

    it('should downgrade agent without a chat client', () => {
      expect(resolveMode('agent', false, logger)).toBe('local');
      expect(logger.warnings).toEqual([
        'Agent mode requires OPENAI_API_KEY; running local matching instead',
      ]);
    });

    it('should keep local and sample', () => {
      expect(resolveMode('local', true, logger)).toBe('local');
      expect(resolveMode('sample', true, logger)).toBe('sample');
    });
  });

  describe('sample mode', () => {
    it('should cluster the sample markets and export every record', async () => {
      const result = await runPipeline(options({ mode: 'sample' }), {
        registry: new SourceRegistry(),
        logger,
        metrics,
        now: tick(),
      });

      expect(result.mode).toBe('sample');
      expect(result.strategy).toBe('local');
      expect(result.outcomes).toEqual([]);
      expect(result.products).toHaveLength(9);
      expect(result.rowsWritten).toBe(15);
      expect(result.outputPath).toBe(outputPath);

      expect(result.products[0].unifiedTitle).toBe(
        'Will Donald Trump win the 2024 US Presidential Election?'
      );
      expect(result.products[0].members.map((m) => m.site)).toEqual([
        'polymarket',
        'manifold',
        'predictit',
      ]);
      expect(result.products.map((p) => p.members.length)).toEqual([3, 2, 1, 1, 1, 2, 1, 2, 2]);

      const lines = (await readFile(outputPath, 'utf-8')).split('\n');
      expect(lines[0]).toBe('unified_title,site,site_product_id,price,confidence');
      expect(lines).toHaveLength(17);
    });

    it('should record sites and counts in the metrics', async () => {
      const result = await runPipeline(options({ mode: 'sample' }), {
        registry: new SourceRegistry(),
        logger,
        metrics,
        now: tick(),
      });

      expect(result.metrics).toEqual({
        totalMarkets: 15,
        sitesScraped: ['polymarket', 'manifold', 'predictit'],
        unifiedProducts: 9,
        errorCount: 0,
        llmTokens: { input: 0, output: 0 },
        processingTimeSeconds: 0.25,
      });
    });

    it('should return fresh sample records', () => {
      const first = getSampleMarkets();
      expect(first).toHaveLength(15);
      expect(getSampleMarkets()[0]).not.toBe(first[0]);
      expect(Object.isFrozen(first[0])).toBe(true);
    });
  });

  describe('local mode', () => {
    it('should continue with partial results when a source fails', async () => {
      const registry = new SourceRegistry();
      registry.register(staticSource('polymarket', [BTC_POLY]));
      registry.register(failingSource('manifold', 'HTTP 503'));

      const result = await runPipeline(options(), { registry, logger, metrics });

      expect(result.outcomes.map((o) => [o.sourceId, o.status, o.count])).toEqual([
        ['polymarket', 'ok', 1],
        ['manifold', 'error', 0],
      ]);
      expect(result.products).toHaveLength(1);
      expect(result.rowsWritten).toBe(1);
      expect(result.metrics.errorCount).toBe(1);
      expect(metrics.getErrors()[0].context).toBe('manifold_fetch');
    });

    it('should keep dissimilar titles apart', async () => {
      const registry = new SourceRegistry();
      registry.register(staticSource('polymarket', [BTC_POLY]));
      registry.register(staticSource('manifold', [BTC_MANIFOLD]));

      const result = await runPipeline(options(), { registry, logger, metrics });

      expect(result.products.map((p) => p.members.length)).toEqual([1, 1]);
    });

    it('should return without writing when nothing is collected', async () => {
      const registry = new SourceRegistry();
      registry.register(staticSource('polymarket', []));
      registry.register(failingSource('manifold', 'timeout'));

      const result = await runPipeline(options(), { registry, logger, metrics });

      expect(result.products).toEqual([]);
      expect(result.rowsWritten).toBe(0);
      expect(result.outputPath).toBeNull();
      expect(result.strategy).toBeNull();
      expect(existsSync(outputPath)).toBe(false);
      expect(logger.warnings).toContain('No markets collected; nothing to export');
    });
  });

  describe('agent mode', () => {
    const grouping = JSON.stringify({
      products: [
        {
          members: [
            { index: 0, confidence: 1 },
            { index: 1, confidence: 0.9 },
          ],
        },
      ],
    });

    const registryWithBitcoin = (): SourceRegistry => {
      const registry = new SourceRegistry();
      registry.register(staticSource('polymarket', [BTC_POLY]));
      registry.register(staticSource('manifold', [BTC_MANIFOLD]));
      return registry;
    };

    it('should group records with the chat model', async () => {
      const client = new FixedClient(grouping);

      const result = await runPipeline(options({ mode: 'agent' }), {
        registry: registryWithBitcoin(),
        chatClient: client,
        logger,
        metrics,
      });

      expect(client.calls).toBe(1);
      expect(result.mode).toBe('agent');
      expect(result.strategy).toBe('llm');
      expect(result.products).toHaveLength(1);
      expect(result.metrics.llmTokens).toEqual({ input: 200, output: 40 });

      expect((await readFile(outputPath, 'utf-8')).split('\n')).toEqual([
        'unified_title,site,site_product_id,price,confidence',
        '"Will Bitcoin reach $100,000 by end of 2024?",polymarket,btc-100k,0.3500,1.000',
        '"Will Bitcoin reach $100,000 by end of 2024?",manifold,bitcoin-100k,0.3200,0.900',
        '',
      ]);
    });

    it('should fall back to local clustering when the model call fails', async () => {
      const client = new FixedClient(new OpenAIApiError('Invalid API key', 401, false));

      const result = await runPipeline(options({ mode: 'agent' }), {
        registry: registryWithBitcoin(),
        chatClient: client,
        logger,
        metrics,
      });

      expect(result.mode).toBe('agent');
      expect(result.strategy).toBe('local');
      expect(result.products).toHaveLength(2);
      expect(logger.warnings).toContain(
        'llm matching failed (LLM matching failed: Invalid API key), falling back to local'
      );
      expect(metrics.getErrors().map((e) => e.context)).toEqual(['llm_matching']);
    });

    it('should run locally when auto mode has no chat client', async () => {
      const result = await runPipeline(options({ mode: 'auto' }), {
        registry: registryWithBitcoin(),
        logger,
        metrics,
      });

      expect(result.requestedMode).toBe('auto');
      expect(result.mode).toBe('local');
      expect(result.strategy).toBe('local');
    });
  });

  describe('indexing', () => {
    it('should add products to the search index', async () => {
      const index = new ProductIndex({
        embedder: new ConstantEmbedder(),
        cachePath: join(tempDir, 'embeddings_cache.json'),
      });

      const result = await runPipeline(options({ mode: 'sample', buildIndex: true }), {
        registry: new SourceRegistry(),
        index,
        logger,
        metrics,
      });

      expect(result.indexed).toBe(9);
      expect(index.size).toBe(9);
      expect(existsSync(join(tempDir, 'embeddings_cache.json'))).toBe(true);
    });

    it('should skip indexing when disabled', async () => {
      const index = new ProductIndex({ embedder: new ConstantEmbedder() });

      const result = await runPipeline(options({ mode: 'sample', buildIndex: false }), {
        registry: new SourceRegistry(),
        index,
        logger,
        metrics,
      });

      expect(result.indexed).toBe(0);
      expect(index.size).toBe(0);
    });

    it('should not fail the run when indexing fails', async () => {
      const index = new ProductIndex({ embedder: new BrokenEmbedder() });

      const result = await runPipeline(options({ mode: 'sample', buildIndex: true }), {
        registry: new SourceRegistry(),
        index,
        logger,
        metrics,
      });

      expect(result.rowsWritten).toBe(15);
      expect(result.indexed).toBe(0);
      expect(logger.warnings).toContain('Search indexing failed: embedding service unavailable');
      expect(metrics.getErrors()[0].context).toBe('search_index');
    });
  });
});
