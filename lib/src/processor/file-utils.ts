/**
 * File Utilities
 *
 * Naming, validation and summary helpers around processed files.
 */

import { basename, extname } from 'node:path';
import { estimateTokenCount } from '../chunking/index.js';
import { ProcessingErrorCode, ValidationError } from '../errors/index.js';
import { FileType, type FileMetadata, type ProcessedFile } from './types.js';

const INVALID_FILENAME_CHARS = ['/', '\\', ':', '*', '?', '"', '<', '>', '|'] as const;

/**
 * Extensions most conversion services accept. The authoritative list comes
 * from the converter at run time.
 */
export const COMMON_FILE_TYPES: readonly string[] = [
  '.txt', '.md', '.pdf', '.docx', '.doc', '.rtf',
  '.html', '.htm', '.xml', '.json', '.csv',
  '.xlsx', '.xls', '.pptx', '.ppt',
];

// =============================================================================
// Names
// =============================================================================

/**
 * Reject empty names, traversal sequences and reserved characters
 *
 * @throws {ValidationError} with code INVALID_FILENAME
 */
export function validateFilename(filename: string): void {
  const fail = (message: string): never => {
    throw new ValidationError(message, ProcessingErrorCode.INVALID_FILENAME, {
      context: { filename },
    });
  };

  if (filename.trim() === '') {
    fail('filename cannot be empty');
  }
  if (filename.includes('..')) {
    fail('filename cannot contain path traversal sequences');
  }
  for (const char of INVALID_FILENAME_CHARS) {
    if (filename.includes(char)) {
      fail(`filename contains invalid character: ${char}`);
    }
  }
}

/**
 * `<prefix>-<base name>`
 */
export function generateStoredFilename(prefix: string, originalFilename: string): string {
  return `${prefix}-${basename(originalFilename)}`;
}

/**
 * Strip the `<prefix>-` added by `generateStoredFilename`; other names are
 * returned unchanged
 */
export function parseStoredFilename(storedFilename: string, prefix: string): string {
  const marker = `${prefix}-`;
  return storedFilename.startsWith(marker) ? storedFilename.slice(marker.length) : storedFilename;
}

/**
 * Filename for a text submission: `text-YYYYMMDD-HHmmss.txt` (UTC)
 */
export function generateTextFilename(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `text-${day}-${time}.txt`;
}

export function getFileType(filename: string): FileType {
  if (filename.startsWith('text-') && filename.endsWith('.txt')) {
    return FileType.TEXT;
  }
  if (filename.startsWith('website-')) {
    return FileType.WEBSITE;
  }
  return FileType.FILE;
}

/**
 * Identifier for one chunk of a file: `<namespace>-<base name>-<index>`
 */
export function generateDocumentId(namespace: string, filename: string, chunkIndex: number): string {
  return `${namespace}-${basename(filename)}-${chunkIndex}`;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Human-readable size with 1024-based units ("512 B", "1.5 KB", "10.0 MB")
 */
export function formatFileSize(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }

  let divisor = unit;
  let exponent = 0;
  for (let n = Math.floor(bytes / unit); n >= unit; n = Math.floor(n / unit)) {
    divisor *= unit;
    exponent++;
  }
  return `${(bytes / divisor).toFixed(1)} ${'KMGTPE'.charAt(exponent)}B`;
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= 3) {
    return '...';
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

// =============================================================================
// Content Helpers
// =============================================================================

/**
 * Collapse runs of blank lines into one
 */
export function cleanMarkdown(markdown: string): string {
  const cleaned: string[] = [];
  let lastWasBlank = false;

  for (const line of markdown.split('\n')) {
    if (line.trim() === '') {
      if (!lastWasBlank) {
        cleaned.push('');
        lastWasBlank = true;
      }
    } else {
      cleaned.push(line);
      lastWasBlank = false;
    }
  }

  return cleaned.join('\n');
}

/**
 * Text of the first level-one heading, or '' when there is none
 */
export function extractTitle(markdown: string): string {
  for (const line of markdown.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('# ')) {
      return trimmed.slice(1).trim();
    }
  }
  return '';
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== '').length;
}

/**
 * Summarize a processed file
 */
export function generateFileMetadata(file: ProcessedFile): FileMetadata {
  return {
    id: file.id,
    filename: file.filename,
    extension: extname(file.filename),
    size: file.originalSize,
    hash: file.contentHash,
    processedAt: file.processedAt,
    chunkCount: file.chunks.length,
    tokenCount: estimateTokenCount(file.markdown),
    title: extractTitle(file.markdown),
    wordCount: countWords(file.markdown),
    fileType: getFileType(file.filename),
  };
}
