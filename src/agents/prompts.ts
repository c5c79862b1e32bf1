/**
 * Matching Prompts
 *
 * Prompt templates asking a chat model to group prediction-market listings
 * from different sites that ask the same real-world question.
 *
 * @module agents/prompts
 */

import type { MarketRecord } from '../schemas/market.js';

// ============================================================================
// System Prompt
// ============================================================================

export const MATCHER_SYSTEM_PROMPT = `You are an expert market analyst who identifies prediction markets on different platforms that resolve on the same real-world question.

Rules:
1. Two markets match only if they would resolve the same way (same event, same deadline, same outcome).
2. Compare meaning, not wording. Reordered clauses and filler words do not matter.
3. Every market index appears in at most one group. Unmatched markets may be left out.
4. Give each member a confidence between 0 and 1 that it matches the first member of its group.

Respond with a JSON object only.`;

// ============================================================================
// User Prompt Template
// ============================================================================

/**
 * Format one record as a numbered prompt line.
 */
function formatRecord(record: MarketRecord, index: number): string {
  const price = record.price === undefined ? 'n/a' : record.price.toFixed(2);
  return `[${index}] (${record.site}) ${record.title} | price: ${price}`;
}

/**
 * Build the user prompt for a matching request.
 *
 * @param records - Records in the order their indices refer to
 * @param threshold - Minimum confidence for including a member
 */
export function buildMatchingPrompt(records: readonly MarketRecord[], threshold: number): string {
  const lines = records.map((record, i) => formatRecord(record, i)).join('\n');

  return `## Markets

${lines}

---

Group the markets above. Only put a market in a group when your confidence that it matches the group's first member is at least ${threshold}.

Return JSON with this structure:
{
  "products": [
    {
      "title": "representative question",
      "members": [
        { "index": 0, "confidence": 1.0 },
        { "index": 7, "confidence": 0.92 }
      ]
    }
  ]
}`;
}
