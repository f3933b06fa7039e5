/**
 * Structure-Aware Markdown Chunker
 *
 * Scans markdown line by line and emits section-tagged blocks bounded by a
 * soft and a hard character budget. Headings start a new block; fenced code
 * and table regions are never split, whatever their size.
 *
 * @example
 * ```typescript
 * const chunks = chunkMarkdownStructure('# Intro\nHello\n\n## Usage\nRun it');
 * // [{ section: 'Intro', text: '# Intro\nHello' }, { section: 'Usage', text: '## Usage\nRun it' }]
 * ```
 */

import { createChunkOptions, DEFAULT_SECTION, type ChunkOptions, type StructuralChunk } from './types.js';

// =============================================================================
// Line Classification
// =============================================================================

const FENCE_MARKERS = ['```', '~~~'] as const;
type FenceMarker = (typeof FENCE_MARKERS)[number];

const HEADING_PATTERN = /^(#{1,6})(?:\s+|$)/;

function fenceMarkerOf(trimmed: string): FenceMarker | null {
  for (const marker of FENCE_MARKERS) {
    if (trimmed.startsWith(marker)) {
      return marker;
    }
  }
  return null;
}

/**
 * Heading text of an ATX heading line, or null when the line is not one
 */
export function parseHeading(trimmed: string): string | null {
  const match = HEADING_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }
  return trimmed
    .slice(match[0].length)
    .replace(/\s+#+\s*$/, '')
    .trim();
}

function countPipes(line: string): number {
  let count = 0;
  for (const char of line) {
    if (char === '|') {
      count++;
    }
  }
  return count;
}

// =============================================================================
// Buffer
// =============================================================================

interface BufferedLine {
  text: string;
  /** Blank line outside a fence: a paragraph boundary the hard split may use */
  breakable: boolean;
}

/**
 * Lines accumulated for the chunk in progress
 */
class ChunkBuffer {
  lines: BufferedLine[] = [];
  length = 0;
  section = '';
  lastBreak = -1;

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  append(line: BufferedLine, activeSection: string): void {
    if (this.lines.length === 0) {
      this.section = activeSection;
    }
    this.lines.push(line);
    this.length += line.text.length + 1;
    if (line.breakable) {
      this.lastBreak = this.lines.length - 1;
    }
  }

  /** Remove and return lines before `index`, keeping the rest buffered */
  takePrefix(index: number): BufferedLine[] {
    const prefix = this.lines.slice(0, index);
    this.replaceLines(this.lines.slice(index));
    return prefix;
  }

  takeAll(): BufferedLine[] {
    const lines = this.lines;
    this.replaceLines([]);
    this.section = '';
    return lines;
  }

  private replaceLines(lines: BufferedLine[]): void {
    this.lines = lines;
    this.length = 0;
    this.lastBreak = -1;
    lines.forEach((line, index) => {
      this.length += line.text.length + 1;
      if (line.breakable) {
        this.lastBreak = index;
      }
    });
  }
}

// =============================================================================
// Structural Chunking
// =============================================================================

/**
 * Split markdown into section-tagged chunks.
 *
 * - A heading outside a fence flushes the buffer (tagged with the section it
 *   was started under) and opens a new one starting with the heading line.
 * - Once the buffer reaches `maxTokens × charsPerToken` characters it is split
 *   after its last blank line, or at its end when it has none; the remainder
 *   keeps the same section.
 * - Once it reaches `minTokens × charsPerToken` it is flushed at the next
 *   blank line.
 * - Neither trigger fires inside a fenced code block or a table region.
 *
 * Chunks are trimmed and whitespace-only chunks are dropped.
 */
export function chunkMarkdownStructure(
  markdown: string,
  options?: Partial<ChunkOptions>
): StructuralChunk[] {
  const opts = createChunkOptions(options);
  const maxChars = opts.maxTokens * opts.charsPerToken;
  const minChars = opts.minTokens * opts.charsPerToken;

  const chunks: StructuralChunk[] = [];
  const buffer = new ChunkBuffer();
  let activeSection = '';
  let openFence: FenceMarker | null = null;
  let inTable = false;

  const emit = (lines: BufferedLine[], section: string): void => {
    const text = lines
      .map((line) => line.text)
      .join('\n')
      .trim();
    if (text !== '') {
      chunks.push({ section: section || DEFAULT_SECTION, text });
    }
  };

  const flush = (): void => {
    const section = buffer.section;
    emit(buffer.takeAll(), section);
  };

  for (const line of markdown.split('\n')) {
    const trimmed = line.trim();

    const marker = fenceMarkerOf(trimmed);
    if (marker !== null) {
      if (openFence === null) {
        openFence = marker;
      } else if (openFence === marker) {
        openFence = null;
      }
    }

    if (openFence === null) {
      const heading = parseHeading(trimmed);
      if (heading !== null) {
        if (!buffer.isEmpty) {
          flush();
        }
        activeSection = heading;
        inTable = false;
        buffer.append({ text: line, breakable: false }, activeSection);
        continue;
      }

      if (trimmed === '') {
        inTable = false;
      } else if (countPipes(line) >= 2) {
        inTable = true;
      }
    }

    buffer.append({ text: line, breakable: openFence === null && trimmed === '' }, activeSection);

    if (openFence !== null || inTable) {
      continue;
    }

    if (buffer.length >= maxChars) {
      const splitIndex = buffer.lastBreak >= 0 ? buffer.lastBreak + 1 : buffer.lines.length;
      const section = buffer.section;
      emit(buffer.takePrefix(splitIndex), section);
      if (buffer.isEmpty) {
        buffer.section = '';
      }
      continue;
    }

    if (buffer.length >= minChars && trimmed === '') {
      flush();
    }
  }

  if (!buffer.isEmpty) {
    flush();
  }

  return chunks;
}

/**
 * Chunk markdown with default options, returning only the text of each chunk
 */
export function chunkMarkdown(markdown: string): string[] {
  return chunkMarkdownWithOptions(markdown);
}

/**
 * Chunk markdown with custom options, returning only the text of each chunk
 */
export function chunkMarkdownWithOptions(
  markdown: string,
  options?: Partial<ChunkOptions>
): string[] {
  return chunkMarkdownStructure(markdown, options).map((chunk) => chunk.text);
}
