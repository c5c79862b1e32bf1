/**
 * Product Chat
 *
 * Canned question answering over the product index, plus a line-oriented
 * session that interprets chat commands. The CLI owns the terminal; this
 * module only turns input lines into reply text.
 *
 * @module search/chat
 */

import { averageConfidence } from '../schemas/market.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ProductIndex } from './product-index.js';

// ============================================================================
// Constants
// ============================================================================

/** Products included in a chat answer */
export const CHAT_TOP_K = 3;

export const NO_RESULTS_MESSAGE =
  "I couldn't find any prediction markets related to your query. " +
  "Try asking about specific topics like 'elections', 'crypto prices', or 'sports outcomes'.";

export const NO_RESULTS_TIP =
  'Tip: Try asking about specific topics like elections, crypto, sports, or current events!';

export const HELP_TEXT = `Available Commands:
  help          Show this help message
  stats         Show index statistics
  history       Show conversation history
  quit/exit/q   Exit the chat

Example Questions:
  "What are the current prices for Trump election markets?"
  "Show me crypto prediction markets"
  "What sports markets are available?"

Markets are matched across Polymarket, Manifold and PredictIt.`;

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q']);

/** Characters of each past answer shown by `history` */
const HISTORY_PREVIEW_LENGTH = 100;

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a 0..1 value as a percentage with one decimal (0.45 -> "45.0%").
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Answer a free-text question with the best matching products.
 *
 * @example
 * ```typescript
 * await answerQuery(index, 'bitcoin');
 * // Here are some relevant prediction markets:
 * //
 * // 1. **Will Bitcoin reach $100,000 by end of 2024?**
 * //    Current prices: polymarket: 35.0%, predictit: 38.0%
 * //    Match confidence: 91.9%
 * // ...
 * ```
 */
export async function answerQuery(index: ProductIndex, message: string): Promise<string> {
  const results = await index.search(message, CHAT_TOP_K);
  if (results.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const lines = ['Here are some relevant prediction markets:'];

  results.forEach(({ product }, i) => {
    lines.push(`\n${i + 1}. **${product.unifiedTitle}**`);

    const prices = product.members
      .filter((member) => member.price !== undefined)
      .map((member) => `${member.site}: ${formatPercent(member.price ?? 0)}`);
    if (prices.length > 0) {
      lines.push(`   Current prices: ${prices.join(', ')}`);
    }

    lines.push(`   Match confidence: ${formatPercent(averageConfidence(product))}`);
  });

  lines.push(`\n\nSimilarity score: ${results[0].similarity.toFixed(2)}`);
  return lines.join('\n');
}

// ============================================================================
// Chat Session
// ============================================================================

export interface ChatExchange {
  user: string;
  assistant: string;
  /** Local time as HH:MM:SS */
  timestamp: string;
}

export type ChatReplyKind = 'empty' | 'quit' | 'help' | 'stats' | 'history' | 'answer';

export interface ChatReply {
  kind: ChatReplyKind;
  text: string;
}

export interface ChatSessionOptions {
  logger?: Logger;
  now?: () => Date;
}

function formatClock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Stateful chat over a product index.
 *
 * Only answered questions go into the history; commands do not.
 */
export class ChatSession {
  private readonly history: ChatExchange[] = [];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly index: ProductIndex,
    options: ChatSessionOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  getHistory(): ChatExchange[] {
    return this.history.map((exchange) => ({ ...exchange }));
  }

  /**
   * Handle one line of user input.
   */
  async handle(input: string): Promise<ChatReply> {
    const trimmed = input.trim();
    const command = trimmed.toLowerCase();

    if (trimmed.length === 0) {
      return { kind: 'empty', text: '' };
    }
    if (QUIT_COMMANDS.has(command)) {
      return { kind: 'quit', text: 'Goodbye! Thanks for chatting about prediction markets!' };
    }
    if (command === 'help') {
      return { kind: 'help', text: HELP_TEXT };
    }
    if (command === 'stats') {
      return { kind: 'stats', text: this.formatStats() };
    }
    if (command === 'history') {
      return { kind: 'history', text: this.formatHistory() };
    }

    this.logger.info(`Chat query: ${trimmed}`);
    let answer = await answerQuery(this.index, trimmed);
    if (answer.toLowerCase().includes("couldn't find")) {
      answer += `\n\n${NO_RESULTS_TIP}`;
    }

    this.history.push({ user: trimmed, assistant: answer, timestamp: formatClock(this.now()) });
    return { kind: 'answer', text: answer };
  }

  private formatStats(): string {
    const stats = this.index.getStats();
    return [
      'Index Statistics:',
      `  Total Products: ${stats.totalProducts}`,
      `  Total Markets: ${stats.totalMarkets}`,
      `  Sites Covered: ${stats.sitesCovered.join(', ')}`,
      `  Average Confidence: ${formatPercent(stats.averageConfidence)}`,
      `  Conversation History: ${this.history.length} exchanges`,
    ].join('\n');
  }

  private formatHistory(): string {
    if (this.history.length === 0) {
      return 'No conversation history yet.';
    }

    const lines = ['Conversation History:'];
    this.history.forEach((exchange, i) => {
      lines.push(`\n${i + 1}. ${exchange.timestamp}`);
      lines.push(`   You: ${exchange.user}`);
      lines.push(`   Assistant: ${exchange.assistant.slice(0, HISTORY_PREVIEW_LENGTH)}...`);
    });
    return lines.join('\n');
  }
}
