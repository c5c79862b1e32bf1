/**
 * Run Metrics
 *
 * Records counters and errors for a single pipeline run:
 * - Markets collected and sites scraped
 * - Unified products formed
 * - LLM token usage
 * - Errors with the context they happened in
 * - Total processing time
 *
 * One instance is created per run and passed to the collaborators that
 * report into it; nothing here is shared between runs.
 *
 * @module metrics/tracker
 */

import type { Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * An error recorded during a run.
 */
export interface RecordedError {
  /** ISO8601 time the error was recorded */
  timestamp: string;
  /** Error class name (e.g. "SourceApiError") */
  errorType: string;
  /** Error message */
  message: string;
  /** Where the error happened (e.g. "polymarket_fetch") */
  context: string;
}

/**
 * Summary returned at the end of a run.
 */
export interface MetricsSummary {
  totalMarkets: number;
  sitesScraped: string[];
  unifiedProducts: number;
  errorCount: number;
  llmTokens: { input: number; output: number };
  processingTimeSeconds: number;
}

/**
 * Minimal recorder interface for collaborators that only report errors.
 */
export interface ErrorRecorder {
  recordError(error: unknown, context: string): void;
}

// ============================================================================
// RunMetrics Class
// ============================================================================

/**
 * RunMetrics collects per-run counters.
 *
 * @example
 * ```typescript
 * const metrics = new RunMetrics();
 * metrics.recordSiteScraped('polymarket', 150);
 * metrics.recordError(new Error('HTTP 503'), 'manifold_fetch');
 * metrics.setUnifiedProducts(98);
 * console.log(metrics.getSummary());
 * ```
 */
export class RunMetrics implements ErrorRecorder {
  private marketsCollected = 0;
  private readonly sitesScraped: string[] = [];
  private unifiedProducts = 0;
  private processingTimeMs = 0;
  private readonly tokens = { input: 0, output: 0 };
  private readonly errors: RecordedError[] = [];

  /**
   * @param logger - Receives an error line for every recorded error
   * @param now - Clock for error timestamps (for testing)
   */
  constructor(
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Record a successful scrape of a site and the markets it returned.
   */
  recordSiteScraped(site: string, marketCount: number): void {
    if (!this.sitesScraped.includes(site)) {
      this.sitesScraped.push(site);
    }
    this.marketsCollected += marketCount;
  }

  /**
   * Override the collected-market count (e.g. for sample data).
   */
  setMarketsCollected(count: number): void {
    this.marketsCollected = count;
  }

  setUnifiedProducts(count: number): void {
    this.unifiedProducts = count;
  }

  setProcessingTime(ms: number): void {
    this.processingTimeMs = ms;
  }

  /**
   * Record LLM token usage.
   */
  addTokenUsage(input: number, output: number): void {
    this.tokens.input += input;
    this.tokens.output += output;
  }

  /**
   * Record an error with its context and log it.
   */
  recordError(error: unknown, context: string): void {
    const entry: RecordedError = {
      timestamp: this.now().toISOString(),
      errorType: error instanceof Error ? error.name : typeof error,
      message: error instanceof Error ? error.message : String(error),
      context,
    };
    this.errors.push(entry);
    this.logger?.error(`Error in ${context}: ${entry.message}`);
  }

  /**
   * Get all recorded errors (copy).
   */
  getErrors(): RecordedError[] {
    return this.errors.map((e) => ({ ...e }));
  }

  getSummary(): MetricsSummary {
    return {
      totalMarkets: this.marketsCollected,
      sitesScraped: [...this.sitesScraped],
      unifiedProducts: this.unifiedProducts,
      errorCount: this.errors.length,
      llmTokens: { ...this.tokens },
      processingTimeSeconds: this.processingTimeMs / 1000,
    };
  }
}
