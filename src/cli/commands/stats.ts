/**
 * Stats Command
 *
 * Shows what the search index holds. Reads the cache only, so it works
 * without an API key.
 *
 * @module cli/commands/stats
 */

import type { Command } from 'commander';
import { getBaseCommand } from '../base-command.js';
import { formatIndexStats } from '../formatters/products.js';
import { createEmbedder, loadCliConfig, openProductIndex } from '../services.js';

export interface StatsCommandOptions {
  json?: boolean;
}

/**
 * Register the stats command.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show search index statistics')
    .option('--json', 'Print statistics as JSON')
    .action(async (options: StatsCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = loadCliConfig(base);
      const logger = base.createLogger('warn');

      const index = await openProductIndex(base.getDataDir(config), createEmbedder(config), logger);
      const stats = index.getStats();

      if (options.json) {
        base.json(stats);
        return;
      }

      base.section('Search Index');
      console.log(formatIndexStats(stats));
    });
}
