/**
 * Plain-Text Chunking
 *
 * Fixed-size windows over unstructured text. Windows are measured in UTF-16
 * code units (the unit the token heuristic counts) and never end or start
 * inside a surrogate pair.
 */

const DEFAULT_CHUNK_SIZE = 1000;

// =============================================================================
// Window Boundaries
// =============================================================================

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** True when `index` falls between the two halves of a surrogate pair */
function splitsPair(text: string, index: number): boolean {
  return (
    index > 0 &&
    index < text.length &&
    isLowSurrogate(text.charCodeAt(index)) &&
    isHighSurrogate(text.charCodeAt(index - 1))
  );
}

/**
 * Slice text into windows of at most `size` code units, advancing by `step`.
 *
 * A window shorter than one character is widened to hold it, so every window
 * is non-empty and the scan always moves forward. Stops once a window reaches
 * the end of the input.
 */
export function sliceWindows(text: string, size: number, step: number): string[] {
  const windows: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (splitsPair(text, end)) {
      end -= 1;
    }
    if (end <= start) {
      end = Math.min(start + 2, text.length);
    }

    windows.push(text.slice(start, end));
    if (end >= text.length) {
      break;
    }

    let next = start + step;
    if (splitsPair(text, next)) {
      next = next - 1 > start ? next - 1 : next + 1;
    }
    start = Math.min(next, end);
  }

  return windows;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Split text into consecutive fixed-size windows, dropping whitespace-only
 * pieces.
 *
 * @param size - Window size in characters; non-positive values use 1000
 */
export function chunkText(text: string, size: number = DEFAULT_CHUNK_SIZE): string[] {
  const windowSize = size > 0 ? Math.floor(size) : DEFAULT_CHUNK_SIZE;
  return sliceWindows(text, windowSize, windowSize).filter((piece) => piece.trim() !== '');
}

/**
 * Split text into overlapping windows that advance by `size − overlap`.
 *
 * Negative overlap is treated as none; an overlap of `size` or more falls back
 * to a quarter of the window.
 *
 * @example
 * ```typescript
 * chunkTextWithOverlap('abcdefghij', 4, 1);
 * // ['abcd', 'defg', 'ghij']
 * ```
 */
export function chunkTextWithOverlap(text: string, size: number, overlap: number): string[] {
  const windowSize = size > 0 ? Math.floor(size) : DEFAULT_CHUNK_SIZE;
  let overlapSize = overlap > 0 ? Math.floor(overlap) : 0;
  if (overlapSize >= windowSize) {
    overlapSize = Math.floor(windowSize / 4);
  }

  return sliceWindows(text, windowSize, windowSize - overlapSize).filter(
    (piece) => piece.trim() !== ''
  );
}
