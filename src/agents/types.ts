/**
 * LLM Matching Types
 *
 * Constants and Zod schemas for the model-driven matching strategy.
 *
 * @module agents/types
 */

import { z } from 'zod';

// ============================================================================
// Constants
// ============================================================================

/**
 * Matching request timeout in milliseconds.
 */
export const LLM_MATCH_TIMEOUT_MS = 60_000;

/**
 * Maximum retries for matching API calls.
 */
export const MAX_RETRIES = 2;

/**
 * Base delay for exponential backoff in milliseconds.
 */
export const BASE_DELAY_MS = 1_000;

// ============================================================================
// Response Schema
// ============================================================================

/**
 * One market placed in a group, referenced by its index in the prompt.
 */
export const MatchMemberSchema = z.object({
  index: z.number().int(),
  confidence: z.number(),
});

export type MatchMember = z.infer<typeof MatchMemberSchema>;

/**
 * A group of markets the model judged to ask the same question.
 */
export const MatchGroupSchema = z.object({
  title: z.string().optional(),
  members: z.array(MatchMemberSchema),
});

export type MatchGroup = z.infer<typeof MatchGroupSchema>;

/**
 * Top-level JSON object returned by the model.
 */
export const MatchResponseSchema = z.object({
  products: z.array(MatchGroupSchema),
});

export type MatchResponse = z.infer<typeof MatchResponseSchema>;

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when the model cannot produce a usable grouping
 * (request failure, timeout, invalid JSON or schema mismatch).
 */
export class LlmMatchingError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LlmMatchingError';
  }
}
