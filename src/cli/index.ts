#!/usr/bin/env node
/**
 * Prediction Market Unifier CLI
 *
 * Main entry point for the pmu CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   pmu --help
 *   pmu run --mode sample
 *   pmu run --sources polymarket manifold --threshold 0.8
 *   pmu search "bitcoin price" --top 3
 *   pmu chat
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, toGlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('pmu')
    .description('Prediction Market Unifier - match equivalent markets across prediction sites')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override the data directory (default: PM_DATA_DIR or ./data)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = toGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
    }
  });

  // Register all subcommands
  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
