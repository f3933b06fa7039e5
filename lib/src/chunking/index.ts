/**
 * Chunking Module
 *
 * Structure-aware markdown chunking with a hard embedding budget, plus the
 * plain-text and sentence utilities around it.
 *
 * @example
 * ```typescript
 * import { wrapMarkdownChunks, parseChunkMetadata } from 'rag-doc-ingest';
 *
 * const chunks = wrapMarkdownChunks(markdown, {
 *   docId: 'doc-1',
 *   fileId: processed.id,
 *   source: processed.filename,
 *   createdAt: processed.processedAt,
 * });
 *
 * for (const chunk of chunks) {
 *   console.log(`Chunk ${chunk.chunkIndex} [${chunk.section}]: ${chunk.estimatedTokens} tokens`);
 * }
 *
 * // Recover the addressing fields from a stored chunk
 * const parsed = parseChunkMetadata(chunks[0].content);
 * ```
 */

// Types
export {
  ChunkOptionsSchema,
  type ChunkOptions,
  createChunkOptions,
  EmbeddingBudgetSchema,
  type EmbeddingBudget,
  DEFAULT_EMBEDDING_BUDGET,
  createEmbeddingBudget,
  DEFAULT_SECTION,
  type StructuralChunk,
  type DocumentIdentity,
  type WrappedChunk,
  type ChunkMetadata,
  type WrapOptions,
} from './types.js';

// Token estimation
export {
  DEFAULT_CHARS_PER_TOKEN,
  estimateTokenCount,
  tokensToChars,
  charsToTokens,
  safeTokenBudget,
} from './token-counter.js';

// Plain text
export { chunkText, chunkTextWithOverlap } from './text-chunker.js';
export { splitOnSentences } from './sentences.js';

// Markdown
export {
  chunkMarkdownStructure,
  chunkMarkdown,
  chunkMarkdownWithOptions,
  parseHeading,
} from './markdown-chunker.js';

// Overflow and metadata
export { splitLargeChunk, fallbackSplit, type OverflowSplitOptions } from './overflow.js';
export {
  MAX_SECTION_LENGTH,
  sanitizeMetadataValue,
  formatCreatedAt,
  buildFrontMatter,
  wrapMarkdownChunks,
  wrapMarkdownWithMetadata,
  parseChunkMetadata,
} from './metadata.js';
