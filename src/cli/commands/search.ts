/**
 * Search Command
 *
 * Ranks indexed products by semantic similarity to a query.
 *
 * @module cli/commands/search
 */

import type { Command } from 'commander';
import { DEFAULT_TOP_K } from '../../search/product-index.js';
import { EXIT_CODES, getBaseCommand } from '../base-command.js';
import { formatSearchResults } from '../formatters/products.js';
import { parsePositiveInt } from '../parsers.js';
import { createEmbedder, loadCliConfig, openProductIndex } from '../services.js';

export interface SearchCommandOptions {
  top: number;
}

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search unified products by meaning')
    .option('-n, --top <n>', 'Number of results', parsePositiveInt, DEFAULT_TOP_K)
    .action(async (query: string, options: SearchCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = loadCliConfig(base);

      if (!config.apiKeys.openai) {
        base.error('OPENAI_API_KEY is required for search', EXIT_CODES.USAGE_ERROR);
      }

      const logger = base.createLogger('warn');
      try {
        const index = await openProductIndex(base.getDataDir(config), createEmbedder(config), logger);
        if (index.size === 0) {
          base.warn('The search index is empty. Run `pmu run` first.');
          base.exitWith(EXIT_CODES.NOT_FOUND);
        }

        const results = await index.search(query, options.top);
        base.section(`Results for "${query}"`);
        console.log(formatSearchResults(results));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(`Search failed: ${message}`, EXIT_CODES.API_ERROR);
      }
    });
}
