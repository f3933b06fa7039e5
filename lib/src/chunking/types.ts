/**
 * Chunking Types and Schemas
 *
 * Options, budgets and chunk shapes for structure-aware markdown chunking and
 * front-matter wrapping.
 */

import { z } from 'zod';

// =============================================================================
// Chunk Options
// =============================================================================

const DEFAULT_MIN_TOKENS = 800;

/**
 * Options for the structural markdown chunker and the overflow splitter
 */
export const ChunkOptionsSchema = z
  .object({
    /**
     * Hard limit. Once a buffer reaches `maxTokens × charsPerToken` characters
     * it is split at the last paragraph break.
     */
    maxTokens: z.number().int().positive().default(1200),

    /**
     * Soft limit. A buffer of at least `minTokens × charsPerToken` characters
     * is flushed at the next blank line. Defaults to 800, or to `maxTokens`
     * when that is lower.
     */
    minTokens: z.number().int().positive().optional(),

    /**
     * Characters per token used by the length heuristic
     */
    charsPerToken: z.number().int().positive().default(4),

    /**
     * Overlap between consecutive overflow windows (0-1)
     */
    overlapPercent: z.number().min(0).lt(1).default(0.1),
  })
  .transform((options) => ({
    ...options,
    minTokens: options.minTokens ?? Math.min(DEFAULT_MIN_TOKENS, options.maxTokens),
  }))
  .refine((options) => options.minTokens <= options.maxTokens, {
    message: 'minTokens must not exceed maxTokens',
    path: ['minTokens'],
  });

export type ChunkOptions = z.infer<typeof ChunkOptionsSchema>;

/**
 * Create chunk options with defaults applied
 */
export function createChunkOptions(overrides?: Partial<ChunkOptions>): ChunkOptions {
  return ChunkOptionsSchema.parse(overrides ?? {});
}

// =============================================================================
// Embedding Budget
// =============================================================================

export const EmbeddingBudgetSchema = z.object({
  /** Largest input the embedding model accepts */
  maxEmbeddingTokens: z.number().int().positive().default(7000),
  /** Headroom kept free below the model limit */
  metadataTokenBuffer: z.number().int().nonnegative().default(200),
});

export type EmbeddingBudget = z.infer<typeof EmbeddingBudgetSchema>;

export const DEFAULT_EMBEDDING_BUDGET: EmbeddingBudget = {
  maxEmbeddingTokens: 7000,
  metadataTokenBuffer: 200,
};

export function createEmbeddingBudget(overrides?: Partial<EmbeddingBudget>): EmbeddingBudget {
  return EmbeddingBudgetSchema.parse(overrides ?? {});
}

// =============================================================================
// Chunks
// =============================================================================

/** Section label used when no heading has been seen */
export const DEFAULT_SECTION = 'Document';

/**
 * A section-tagged block produced by the structural chunker, before wrapping
 */
export interface StructuralChunk {
  section: string;
  text: string;
}

/**
 * Who a wrapped chunk belongs to
 */
export interface DocumentIdentity {
  docId: string;
  fileId: string;
  /** Original filename or URL */
  source: string;
  createdAt: Date;
}

/**
 * A chunk with its front-matter attached, ready for embedding
 */
export interface WrappedChunk {
  chunkIndex: number;
  /** Sanitized section label as written in the front-matter */
  section: string;
  body: string;
  /** Front-matter followed by the body */
  content: string;
  /** Estimated token count of `content` */
  estimatedTokens: number;
}

/**
 * Front-matter fields as they appear in a wrapped chunk
 */
export interface ChunkMetadata {
  docId: string;
  fileId: string;
  source: string;
  section: string;
  chunkIndex: number;
  /** RFC 3339 UTC timestamp, second precision */
  createdAt: string;
}

export interface WrapOptions {
  chunkOptions?: Partial<ChunkOptions>;
  budget?: Partial<EmbeddingBudget>;
}
