/**
 * Processor Types
 *
 * Uploads going into the processor and the records coming out of it.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';

// =============================================================================
// Processed File
// =============================================================================

/**
 * Result of processing one upload or text submission. Frozen once produced.
 */
export interface ProcessedFile {
  /** Random UUID */
  readonly id: string;
  readonly filename: string;
  /** Bytes read from the upload (UTF-8 bytes for text submissions) */
  readonly originalSize: number;
  /** Lowercase hex SHA-256 of the input bytes */
  readonly contentHash: string;
  readonly markdown: string;
  readonly chunks: readonly string[];
  readonly processedAt: Date;
}

// =============================================================================
// File Type
// =============================================================================

/**
 * Where a stored document came from, derived from its filename
 */
export const FileType = {
  /** Pasted text: `text-YYYYMMDD-HHmmss.txt` */
  TEXT: 'text',
  /** Crawled page: `website-...` */
  WEBSITE: 'website',
  /** Any other upload */
  FILE: 'file',
} as const;

export type FileType = (typeof FileType)[keyof typeof FileType];

/**
 * Summary of a processed file for listings and storage rows
 */
export interface FileMetadata {
  id: string;
  filename: string;
  /** Extension including the dot, as written in the filename */
  extension: string;
  size: number;
  hash: string;
  processedAt: Date;
  chunkCount: number;
  tokenCount: number;
  /** First level-one heading, or '' */
  title: string;
  wordCount: number;
  fileType: FileType;
}

// =============================================================================
// Uploads
// =============================================================================

/**
 * An uploaded file. `size` is the declared size; the stream is read once.
 */
export interface FileUpload {
  filename: string;
  size: number;
  open(): AsyncIterable<Uint8Array>;
}

/**
 * Wrap in-memory bytes (or a UTF-8 string) as an upload
 */
export function fileUploadFromBuffer(filename: string, data: Uint8Array | string): FileUpload {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return {
    filename,
    size: bytes.byteLength,
    async *open() {
      yield bytes;
    },
  };
}

/**
 * Wrap a file on disk as an upload, streamed when opened
 *
 * @param filename - Name reported to the processor (defaults to the path's base name)
 */
export async function fileUploadFromPath(path: string, filename?: string): Promise<FileUpload> {
  const info = await stat(path);
  return {
    filename: filename ?? basename(path),
    size: info.size,
    open: () => createReadStream(path),
  };
}
