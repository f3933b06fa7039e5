/**
 * Metadata Wrapping
 *
 * Attaches YAML-style front-matter to every chunk of a document and enforces
 * the embedding budget on the wrapped result:
 *
 * ```
 * ---
 * doc_id: 3f2c...
 * file_id: 9a41...
 * source: "handbook.pdf"
 * section: "Getting Started"
 * chunk_index: 0
 * created_at: 2024-05-01T12:00:00Z
 * ---
 *
 * # Getting Started
 * ...
 * ```
 *
 * Blocks that do not fit are split again and retried before any later block,
 * so `chunk_index` follows document order and increases by one per emitted
 * chunk.
 */

import { InvariantError } from '../errors/index.js';
import { chunkMarkdownStructure } from './markdown-chunker.js';
import { splitLargeChunk } from './overflow.js';
import { charsToTokens, estimateTokenCount, safeTokenBudget, tokensToChars } from './token-counter.js';
import {
  createChunkOptions,
  createEmbeddingBudget,
  DEFAULT_SECTION,
  type ChunkMetadata,
  type DocumentIdentity,
  type WrapOptions,
  type WrappedChunk,
} from './types.js';

/** Longest section label written to front-matter */
export const MAX_SECTION_LENGTH = 200;

const FRONT_MATTER_PATTERN =
  /^---\ndoc_id: (.*)\nfile_id: (.*)\nsource: "(.*)"\nsection: "(.*)"\nchunk_index: (\d+)\ncreated_at: (.*)\n---\n\n/;

// =============================================================================
// Field Formatting
// =============================================================================

/**
 * Make a value safe for a double-quoted front-matter field: trimmed, line
 * breaks collapsed to spaces, double quotes turned into single quotes.
 */
export function sanitizeMetadataValue(value: string): string {
  return value
    .trim()
    .replace(/\r\n|\r|\n/g, ' ')
    .replace(/"/g, "'");
}

/**
 * RFC 3339 UTC timestamp with second precision
 */
export function formatCreatedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function formatSection(section: string): string {
  let label = sanitizeMetadataValue(section);
  if (label.length > MAX_SECTION_LENGTH) {
    label = label.slice(0, MAX_SECTION_LENGTH).trimEnd();
    const last = label.charCodeAt(label.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
      label = label.slice(0, -1);
    }
  }
  return label || DEFAULT_SECTION;
}

function requireSingleLine(value: string, field: string): string {
  if (value.trim() === '' || /[\r\n]/.test(value)) {
    throw new InvariantError(`${field} must be a non-empty single-line value`, {
      context: { field },
    });
  }
  return value;
}

/**
 * Render the front-matter block for one chunk. Values are written as given;
 * `source` and `section` are expected to be sanitized already.
 */
export function buildFrontMatter(metadata: ChunkMetadata): string {
  return (
    '---\n' +
    `doc_id: ${metadata.docId}\n` +
    `file_id: ${metadata.fileId}\n` +
    `source: "${metadata.source}"\n` +
    `section: "${metadata.section}"\n` +
    `chunk_index: ${metadata.chunkIndex}\n` +
    `created_at: ${metadata.createdAt}\n` +
    '---\n\n'
  );
}

// =============================================================================
// Wrapping
// =============================================================================

/**
 * Chunk markdown and wrap every chunk with front-matter.
 *
 * Every returned chunk satisfies
 * `estimatedTokens ≤ maxEmbeddingTokens − metadataTokenBuffer`.
 *
 * @throws InvariantError when the identity is malformed or the front-matter
 * alone leaves no room for content
 */
export function wrapMarkdownChunks(
  markdown: string,
  identity: DocumentIdentity,
  options: WrapOptions = {}
): WrappedChunk[] {
  const chunkOptions = createChunkOptions(options.chunkOptions);
  const budget = safeTokenBudget(createEmbeddingBudget(options.budget));
  const { charsPerToken, overlapPercent } = chunkOptions;

  if (Number.isNaN(identity.createdAt.getTime())) {
    throw new InvariantError('createdAt must be a valid date', { context: { field: 'createdAt' } });
  }
  const docId = requireSingleLine(identity.docId, 'docId');
  const fileId = requireSingleLine(identity.fileId, 'fileId');
  const source = sanitizeMetadataValue(identity.source);
  const createdAt = formatCreatedAt(identity.createdAt);

  const wrapped: WrappedChunk[] = [];

  for (const chunk of chunkMarkdownStructure(markdown, chunkOptions)) {
    const section = formatSection(chunk.section);
    const queue: string[] = [chunk.text];

    while (queue.length > 0) {
      const part = queue.shift();
      if (part === undefined) {
        break;
      }

      const chunkIndex = wrapped.length;
      const frontMatter = buildFrontMatter({ docId, fileId, source, section, chunkIndex, createdAt });
      const overhead = charsToTokens(frontMatter.length, charsPerToken);

      if (estimateTokenCount(part, charsPerToken) + overhead <= budget) {
        if (part.trim() === '') {
          continue;
        }
        const content = frontMatter + part;
        wrapped.push({
          chunkIndex,
          section,
          body: part,
          content,
          estimatedTokens: estimateTokenCount(content, charsPerToken),
        });
        continue;
      }

      // Size the window for the highest chunk_index the pieces will take.
      let reservedIndex = chunkIndex;
      let pieces: string[];
      for (;;) {
        const reserved = charsToTokens(
          buildFrontMatter({ docId, fileId, source, section, chunkIndex: reservedIndex, createdAt }).length,
          charsPerToken
        );
        const windowTokens = budget - reserved;
        if (windowTokens <= 0) {
          throw new InvariantError('chunk front-matter exceeds the embedding token budget', {
            context: { section, overhead: reserved, budget },
          });
        }

        pieces = splitLargeChunk(part, {
          windowChars: tokensToChars(windowTokens, charsPerToken),
          overlapPercent,
        });
        const lastIndex = chunkIndex + pieces.length - 1;
        if (String(lastIndex).length <= String(reservedIndex).length) {
          break;
        }
        reservedIndex = lastIndex;
      }
      if (pieces.length <= 1) {
        throw new InvariantError('oversized chunk could not be split within the token budget', {
          context: { section, length: part.length, budget },
        });
      }
      queue.unshift(...pieces);
    }
  }

  return wrapped;
}

/**
 * Chunk markdown and return the wrapped strings in `chunk_index` order
 */
export function wrapMarkdownWithMetadata(
  markdown: string,
  identity: DocumentIdentity,
  options?: WrapOptions
): string[] {
  return wrapMarkdownChunks(markdown, identity, options).map((chunk) => chunk.content);
}

/**
 * Read the front-matter back from a wrapped chunk.
 *
 * @returns the metadata and body, or null when the string carries no
 * front-matter
 */
export function parseChunkMetadata(
  wrapped: string
): { metadata: ChunkMetadata; body: string } | null {
  const match = FRONT_MATTER_PATTERN.exec(wrapped);
  if (!match) {
    return null;
  }

  const [header, docId, fileId, source, section, chunkIndex, createdAt] = match;
  return {
    metadata: {
      docId,
      fileId,
      source,
      section,
      chunkIndex: Number.parseInt(chunkIndex, 10),
      createdAt,
    },
    body: wrapped.slice(header.length),
  };
}
