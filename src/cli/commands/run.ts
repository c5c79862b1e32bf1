/**
 * Run Command
 *
 * Collects markets, matches them into unified products, writes the CSV and
 * extends the search index.
 *
 * @module cli/commands/run
 */

import { Option, type Command } from 'commander';
import type { AppConfig } from '../../config/index.js';
import { LOG_LEVELS, type LogLevel } from '../../logging/logger.js';
import { RunMetrics } from '../../metrics/tracker.js';
import type { ProductIndex } from '../../search/product-index.js';
import { runPipeline } from '../../pipeline/run.js';
import { RUN_MODES, isRunMode, type PipelineResult } from '../../pipeline/types.js';
import { createProxyDispatcher } from '../../sources/http.js';
import { DEFAULT_SOURCE_IDS, createDefaultRegistry } from '../../sources/registry.js';
import { DEFAULT_LOG_FILE, getDefaultOutputPath } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import {
  formatErrorSummary,
  formatQuickSummary,
  formatRunSummary,
} from '../formatters/run-summary.js';
import { parsePositiveInt, parseThreshold } from '../parsers.js';
import { createChatClient, createEmbedder, loadCliConfig, openProductIndex } from '../services.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command.
 */
export interface RunCommandOptions {
  mode: string;
  limit?: number;
  sources?: string[];
  threshold?: number;
  output?: string;
  /** commander inverts --no-index to index: false */
  index: boolean;
  logFile: string;
  logLevel?: LogLevel;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Execute a run with the resolved configuration.
 */
export async function executeRun(
  options: RunCommandOptions,
  base: BaseCommand,
  config: AppConfig
): Promise<PipelineResult> {
  const mode = options.mode;
  if (!isRunMode(mode)) {
    return base.error(`Unknown mode '${mode}'`, EXIT_CODES.USAGE_ERROR);
  }

  const dataDir = base.getDataDir(config);
  const logger = base.createLogger(options.logLevel ?? config.logLevel, options.logFile);
  const metrics = new RunMetrics(logger);
  const chatClient = createChatClient(config);
  const dispatcher = createProxyDispatcher(config.proxyUrl);
  if (dispatcher) {
    base.debug(`Fetching sources through proxy ${config.proxyUrl}`);
  }

  let index: ProductIndex | undefined;
  if (options.index) {
    if (config.apiKeys.openai) {
      index = await openProductIndex(dataDir, createEmbedder(config), logger);
    } else {
      logger.warn('OPENAI_API_KEY not set; skipping search indexing');
    }
  }

  const spinner = createSpinner('Unifying markets...', {
    enabled: !base.isQuiet() && !base.isVerbose(),
  });
  spinner.start();

  try {
    const result = await runPipeline(
      {
        mode,
        limit: options.limit ?? config.fetchLimit,
        sources: options.sources ?? [...DEFAULT_SOURCE_IDS],
        threshold: options.threshold ?? config.matchThreshold,
        outputPath: options.output ?? getDefaultOutputPath(dataDir),
        buildIndex: options.index,
        timeoutMs: config.fetchTimeoutMs,
      },
      {
        registry: createDefaultRegistry(),
        chatClient,
        llmModel: config.models.llm,
        index,
        logger,
        metrics,
        dispatcher,
      }
    );
    if (result.rowsWritten > 0) {
      spinner.succeed(`Unified ${result.metrics.totalMarkets} markets`);
    } else {
      spinner.warn('No markets collected');
    }

    if (base.isQuiet()) {
      console.log(formatQuickSummary(result));
    } else {
      base.blank();
      console.log(formatRunSummary(result));
      if (base.isVerbose() && result.metrics.errorCount > 0) {
        base.blank();
        console.log(formatErrorSummary(metrics.getErrors()));
      }
    }

    return result;
  } catch (error) {
    spinner.fail('Run failed');
    throw error;
  }
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Collect markets, unify them and export the CSV')
    .addOption(
      new Option('-m, --mode <mode>', 'Matching mode').choices(RUN_MODES).default('auto')
    )
    .option('-l, --limit <n>', 'Markets to request per source', parsePositiveInt)
    .option('-s, --sources <ids...>', `Sources to collect from (default: ${DEFAULT_SOURCE_IDS.join(' ')})`)
    .option('-t, --threshold <n>', 'Title similarity threshold', parseThreshold)
    .option('-o, --output <path>', 'CSV output path (default: <data-dir>/output/unified_products.csv)')
    .option('--no-index', 'Skip adding products to the search index')
    .option('--log-file <path>', 'Append all log messages to this file', DEFAULT_LOG_FILE)
    .addOption(new Option('--log-level <level>', 'Console log level').choices(LOG_LEVELS))
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = loadCliConfig(base);

      let allSourcesFailed = false;
      try {
        const result = await executeRun(options, base, config);
        allSourcesFailed =
          result.outcomes.length > 0 && result.outcomes.every((o) => o.status === 'error');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(`Run failed: ${message}`, error);
      }

      if (allSourcesFailed) {
        base.exitWith(EXIT_CODES.API_ERROR);
      }
    });
}
