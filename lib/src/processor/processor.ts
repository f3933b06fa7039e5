/**
 * Document Processor
 *
 * Validates uploads and text submissions, fingerprints them, converts files
 * to markdown through the conversion service, and chunks the result.
 *
 * @example
 * ```typescript
 * const processor = new DocumentProcessor({
 *   converter: new HttpConversionClient(loadConversionConfig()),
 *   config: loadProcessorConfig(),
 * });
 *
 * const file = await processor.processFile(await fileUploadFromPath('./handbook.pdf'));
 * console.log(`${file.filename}: ${file.chunks.length} chunks (${file.contentHash})`);
 * ```
 */

import { createHash, randomUUID } from 'node:crypto';
import { posix } from 'node:path';
import { chunkMarkdownWithOptions, chunkText } from '../chunking/index.js';
import type { DocumentConverter, RequestOptions } from '../conversion/index.js';
import {
  InvariantError,
  ProcessingErrorCode,
  ValidationError,
  isDocumentProcessingError,
  wrapError,
  type ErrorContext,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { createProcessorConfig, type ProcessorConfig, type ProcessorConfigInput } from './config.js';
import { SupportedExtensionCache } from './extension-cache.js';
import { formatFileSize, generateTextFilename } from './file-utils.js';
import type { FileUpload, ProcessedFile } from './types.js';

const MEBIBYTE = 1024 * 1024;

export interface DocumentProcessorOptions {
  /** Conversion service; required for `processFile` and `getSupportedExtensions` */
  converter?: DocumentConverter;
  config?: ProcessorConfigInput;
  logger?: Logger;
  /** Clock, for deterministic timestamps */
  now?: () => Date;
}

interface ReadResult {
  data: Buffer;
  contentHash: string;
  size: number;
}

function describeLimit(bytes: number): string {
  return bytes % MEBIBYTE === 0 ? `${bytes / MEBIBYTE}MB` : formatFileSize(bytes);
}

function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export class DocumentProcessor {
  private readonly converter: DocumentConverter | undefined;
  private readonly config: ProcessorConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly extensions: SupportedExtensionCache;

  constructor(options: DocumentProcessorOptions = {}) {
    this.converter = options.converter;
    this.config = createProcessorConfig(options.config);
    this.logger = options.logger ?? createLogger('processor');
    this.now = options.now ?? (() => new Date());
    this.extensions = new SupportedExtensionCache(
      (requestOptions) => this.requireConverter().supportedExtensions(requestOptions),
      this.logger.child('extensions')
    );
  }

  getConfig(): Readonly<ProcessorConfig> {
    return this.config;
  }

  // ===========================================================================
  // Files
  // ===========================================================================

  /**
   * Validate, read, convert and chunk an uploaded file
   *
   * @throws {ValidationError} for rejected input
   * @throws {UpstreamError} when the conversion service fails
   * @throws {InvariantError} when no converter is configured or the upload cannot be read
   */
  async processFile(upload: FileUpload, options: RequestOptions = {}): Promise<ProcessedFile> {
    const { maxFileBytes } = this.config;
    const tooLarge = `file exceeds maximum size (${describeLimit(maxFileBytes)})`;

    if (upload.size > maxFileBytes) {
      throw this.reject(tooLarge, ProcessingErrorCode.FILE_TOO_LARGE, {
        filename: upload.filename,
        size: upload.size,
      });
    }

    const filename = posix.basename(upload.filename.trim().replace(/\\/g, '/'));
    if (filename === '' || filename === '.' || filename === '..') {
      throw this.reject('file name is required', ProcessingErrorCode.FILENAME_REQUIRED, {
        size: upload.size,
      });
    }

    const extension = posix.extname(filename).toLowerCase();
    if (extension === '' || extension === '.') {
      throw this.reject('file extension is required', ProcessingErrorCode.EXTENSION_REQUIRED, {
        filename,
      });
    }

    const converter = this.requireConverter();

    let supported: ReadonlySet<string>;
    try {
      supported = await this.extensions.get(options);
    } catch (error) {
      throw wrapError(
        error,
        'failed to load supported file types',
        ProcessingErrorCode.EXTENSIONS_UNAVAILABLE,
        { filename }
      );
    }
    if (!supported.has(extension)) {
      throw this.reject(`unsupported file type: ${extension}`, ProcessingErrorCode.UNSUPPORTED_EXTENSION, {
        filename,
        extension,
      });
    }

    const { data, contentHash, size } = await this.readUpload(upload, filename, tooLarge);
    this.logger.debug('Read upload', { filename, size });

    let converted: string;
    try {
      converted = await converter.convert(filename, data, options);
    } catch (error) {
      throw wrapError(error, 'failed to convert file to markdown', ProcessingErrorCode.CONVERSION_FAILED, {
        filename,
        size,
      });
    }

    const markdown = converted.trim();
    if (markdown === '') {
      throw this.reject(
        'failed to convert file to markdown: converted markdown is empty',
        ProcessingErrorCode.EMPTY_CONTENT,
        { filename, size }
      );
    }

    const chunks = chunkMarkdownWithOptions(markdown, this.config.chunking);
    if (chunks.length === 0) {
      throw this.reject('file did not produce any indexable content', ProcessingErrorCode.NO_INDEXABLE_CONTENT, {
        filename,
        size,
      });
    }

    this.logger.info('Processed file', { filename, size, chunkCount: chunks.length });

    return Object.freeze({
      id: randomUUID(),
      filename,
      originalSize: size,
      contentHash,
      markdown,
      chunks: Object.freeze(chunks),
      processedAt: this.now(),
    });
  }

  /**
   * Read the upload once, hashing while buffering
   */
  private async readUpload(upload: FileUpload, filename: string, tooLarge: string): Promise<ReadResult> {
    const hasher = createHash('sha256');
    const parts: Uint8Array[] = [];
    let size = 0;

    try {
      for await (const part of upload.open()) {
        size += part.byteLength;
        if (size > this.config.maxFileBytes) {
          throw this.reject(tooLarge, ProcessingErrorCode.FILE_TOO_LARGE, { filename, size });
        }
        hasher.update(part);
        parts.push(part);
      }
    } catch (error) {
      if (isDocumentProcessingError(error)) {
        throw error;
      }
      throw wrapError(error, 'failed to read file', ProcessingErrorCode.IO_ERROR, { filename });
    }

    return {
      data: Buffer.concat(parts, size),
      contentHash: hasher.digest('hex'),
      size,
    };
  }

  // ===========================================================================
  // Text
  // ===========================================================================

  /**
   * Validate and chunk a plain-text submission. The text is kept unchanged as
   * the file's markdown.
   *
   * @throws {ValidationError} for empty or oversized text
   */
  processText(text: string): ProcessedFile {
    if (text.trim() === '') {
      throw this.reject('text is required', ProcessingErrorCode.TEXT_REQUIRED, { size: text.length });
    }

    const size = Buffer.byteLength(text, 'utf8');
    if (size > this.config.maxTextBytes) {
      throw this.reject('text exceeds maximum allowed length', ProcessingErrorCode.TEXT_TOO_LARGE, { size });
    }

    const chunks = chunkText(text, this.config.textChunkSize);
    if (chunks.length === 0) {
      throw this.reject('text did not produce any chunks', ProcessingErrorCode.NO_INDEXABLE_CONTENT, { size });
    }

    const processedAt = this.now();
    const filename = generateTextFilename(processedAt);
    this.logger.info('Processed text', { filename, size, chunkCount: chunks.length });

    return Object.freeze({
      id: randomUUID(),
      filename,
      originalSize: size,
      contentHash: sha256Hex(text),
      markdown: text,
      chunks: Object.freeze(chunks),
      processedAt,
    });
  }

  // ===========================================================================
  // Supported Extensions
  // ===========================================================================

  /**
   * Extensions accepted by `processFile`, sorted. Fetched on first use.
   */
  async getSupportedExtensions(options: RequestOptions = {}): Promise<string[]> {
    this.requireConverter();
    const extensions = await this.extensions.get(options);
    return [...extensions].sort();
  }

  /**
   * Forget the cached extension list; the next call fetches it again
   */
  invalidateSupportedExtensions(): void {
    this.extensions.invalidate();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private requireConverter(): DocumentConverter {
    if (!this.converter) {
      throw new InvariantError('conversion client is not configured', {
        code: ProcessingErrorCode.CONVERTER_NOT_CONFIGURED,
      });
    }
    return this.converter;
  }

  private reject(message: string, code: ProcessingErrorCode, context: ErrorContext): ValidationError {
    this.logger.warn(`Rejected input: ${message}`, { ...context });
    return new ValidationError(message, code, { context });
  }
}
