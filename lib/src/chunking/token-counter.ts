/**
 * Token Estimation
 *
 * Character-length heuristic used for every budget check. It does not try to
 * match any particular model tokenizer; all comparisons use the same divisor,
 * so "does X fit" stays consistent.
 */

import type { EmbeddingBudget } from './types.js';

export const DEFAULT_CHARS_PER_TOKEN = 4;

/**
 * Estimate the token count of text: `floor(length / charsPerToken)`
 */
export function estimateTokenCount(
  text: string,
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN
): number {
  return Math.floor(text.length / charsPerToken);
}

/**
 * Characters that fit in the given number of tokens
 */
export function tokensToChars(
  tokenCount: number,
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN
): number {
  return Math.floor(tokenCount * charsPerToken);
}

/**
 * Tokens needed for a character count, rounded up
 */
export function charsToTokens(
  charCount: number,
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN
): number {
  return Math.ceil(charCount / charsPerToken);
}

/**
 * Token budget a wrapped chunk must stay within.
 *
 * Falls back to the full model limit when the buffer would leave nothing.
 */
export function safeTokenBudget(budget: EmbeddingBudget): number {
  const safe = budget.maxEmbeddingTokens - budget.metadataTokenBuffer;
  return safe > 0 ? safe : budget.maxEmbeddingTokens;
}
