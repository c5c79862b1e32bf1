/**
 * Chat Command
 *
 * Interactive question-and-answer loop over the search index.
 *
 * @module cli/commands/chat
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { Logger } from '../../logging/logger.js';
import { silentLogger } from '../../logging/logger.js';
import { ChatSession } from '../../search/chat.js';
import type { ChatReply } from '../../search/chat.js';
import { EXIT_CODES, getBaseCommand } from '../base-command.js';
import { createEmbedder, loadCliConfig, openProductIndex } from '../services.js';

const PROMPT = 'You: ';

/**
 * Read lines from `input` and answer them until the user quits or the
 * input ends. A failed question is logged and reported; the loop goes on.
 *
 * @returns Number of questions answered
 */
export async function runChatLoop(
  session: ChatSession,
  input: Readable,
  output: Writable,
  logger: Logger = silentLogger
): Promise<number> {
  const rl = createInterface({ input, output, terminal: false });
  let answered = 0;

  rl.setPrompt(PROMPT);
  rl.prompt();

  try {
    for await (const line of rl) {
      let reply: ChatReply;
      try {
        reply = await session.handle(line);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Chat query failed: ${message}`);
        output.write(`\n${chalk.red('Assistant:')} Sorry, I encountered an error: ${message}\n\n`);
        rl.prompt();
        continue;
      }

      if (reply.kind === 'quit') {
        output.write(`${reply.text}\n`);
        break;
      }
      if (reply.kind === 'answer') {
        answered++;
      }
      if (reply.text) {
        output.write(`\n${chalk.green('Assistant:')} ${reply.text}\n\n`);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  return answered;
}

/**
 * Register the chat command.
 */
export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Ask questions about the indexed prediction markets')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const config = loadCliConfig(base);

      if (!config.apiKeys.openai) {
        base.error('OPENAI_API_KEY is required for chat', EXIT_CODES.USAGE_ERROR);
      }

      const logger = base.createLogger('warn');
      const index = await openProductIndex(base.getDataDir(config), createEmbedder(config), logger);
      if (index.size === 0) {
        base.warn('The search index is empty. Run `pmu run` first.');
        base.exitWith(EXIT_CODES.NOT_FOUND);
      }

      base.section('Prediction Market Chat');
      base.info(`${index.size} products indexed. Type 'help' for commands, 'quit' to exit.`);
      base.blank();

      await runChatLoop(new ChatSession(index, { logger }), process.stdin, process.stdout, logger);
    });
}
