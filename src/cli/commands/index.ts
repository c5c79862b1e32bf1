/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerSearchCommand } from './search.js';
import { registerChatCommand } from './chat.js';
import { registerStatsCommand } from './stats.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerSearchCommand(program);
  registerChatCommand(program);
  registerStatsCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run', description: 'Collect markets, unify them and export the CSV' },
    { name: 'search <query>', description: 'Search unified products by meaning' },
    { name: 'chat', description: 'Ask questions about the indexed prediction markets' },
    { name: 'stats', description: 'Show search index statistics' },
  ];
}

export { executeRun, registerRunCommand, type RunCommandOptions } from './run.js';
export { registerSearchCommand, type SearchCommandOptions } from './search.js';
export { registerChatCommand, runChatLoop } from './chat.js';
export { registerStatsCommand, type StatsCommandOptions } from './stats.js';
