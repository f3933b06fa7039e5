/**
 * Overflow Splitting
 *
 * Reduces a block that does not fit the embedding budget into windows of at
 * most `windowChars` characters.
 */

import { chunkTextWithOverlap, sliceWindows } from './text-chunker.js';

export interface OverflowSplitOptions {
  /** Largest window, in characters */
  windowChars: number;
  /** Share of each window repeated at the start of the next (0-1) */
  overlapPercent: number;
}

/**
 * Split an oversized block with overlapping windows.
 *
 * Overlap is `round(windowChars × overlapPercent)`, falling back to a quarter
 * window when that would cover the whole window. When overlapping windows do
 * not produce more than one piece (e.g. the windows that remain are all
 * whitespace), a hard split is used instead.
 */
export function splitLargeChunk(text: string, options: OverflowSplitOptions): string[] {
  const windowChars = Math.floor(options.windowChars);
  if (windowChars <= 0) {
    return [text];
  }

  let overlap = Math.max(0, Math.round(windowChars * options.overlapPercent));
  if (overlap >= windowChars) {
    overlap = Math.floor(windowChars / 4);
  }

  const pieces = chunkTextWithOverlap(text, windowChars, overlap);
  if (pieces.length > 1) {
    return pieces;
  }

  return fallbackSplit(text, windowChars);
}

/**
 * Hard, non-overlapping split into windows of `size` characters.
 *
 * Whitespace-only windows are kept so no input is lost; callers decide
 * whether to emit them.
 */
export function fallbackSplit(text: string, size: number): string[] {
  const windowSize = Math.floor(size);
  if (windowSize <= 0 || text.length === 0) {
    return [text];
  }
  return sliceWindows(text, windowSize, windowSize);
}
