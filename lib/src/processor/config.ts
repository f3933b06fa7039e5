/**
 * Processor Configuration
 *
 * Input limits and chunking options. Values are read from environment
 * variables by `loadProcessorConfig`.
 */

import { z } from 'zod';
import { ChunkOptionsSchema } from '../chunking/index.js';

export const ProcessorConfigSchema = z.object({
  /** Largest accepted upload, in bytes */
  maxFileBytes: z.number().int().positive().default(10 * 1024 * 1024),

  /** Largest accepted text submission, in UTF-8 bytes */
  maxTextBytes: z.number().int().positive().default(200_000),

  /** Window size for plain-text submissions, in characters */
  textChunkSize: z.number().int().positive().default(1000),

  /** Options for chunking converted markdown */
  chunking: ChunkOptionsSchema.default({}),
});

export type ProcessorConfig = z.infer<typeof ProcessorConfigSchema>;
export type ProcessorConfigInput = z.input<typeof ProcessorConfigSchema>;

export function createProcessorConfig(overrides?: ProcessorConfigInput): ProcessorConfig {
  return ProcessorConfigSchema.parse(overrides ?? {});
}

function readInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function readFloat(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

/**
 * Loads processor configuration from environment variables.
 *
 * Optional environment variables:
 * - PROCESSOR_MAX_FILE_BYTES: Upload size limit (default: 10485760)
 * - PROCESSOR_MAX_TEXT_BYTES: Text submission limit (default: 200000)
 * - PROCESSOR_TEXT_CHUNK_SIZE: Plain-text window (default: 1000)
 * - CHUNK_MAX_TOKENS: Hard chunk limit (default: 1200)
 * - CHUNK_MIN_TOKENS: Soft chunk limit (default: 800)
 * - CHUNK_CHARS_PER_TOKEN: Token heuristic divisor (default: 4)
 * - CHUNK_OVERLAP_PERCENT: Overflow window overlap (default: 0.1)
 *
 * @throws {z.ZodError} If a variable is set to an invalid value
 */
export function loadProcessorConfig(env: NodeJS.ProcessEnv = process.env): ProcessorConfig {
  return ProcessorConfigSchema.parse({
    maxFileBytes: readInt(env['PROCESSOR_MAX_FILE_BYTES']),
    maxTextBytes: readInt(env['PROCESSOR_MAX_TEXT_BYTES']),
    textChunkSize: readInt(env['PROCESSOR_TEXT_CHUNK_SIZE']),
    chunking: {
      maxTokens: readInt(env['CHUNK_MAX_TOKENS']),
      minTokens: readInt(env['CHUNK_MIN_TOKENS']),
      charsPerToken: readInt(env['CHUNK_CHARS_PER_TOKEN']),
      overlapPercent: readFloat(env['CHUNK_OVERLAP_PERCENT']),
    },
  });
}
