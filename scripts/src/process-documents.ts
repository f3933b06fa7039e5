#!/usr/bin/env node
/**
 * Document Processing Script
 *
 * Runs documents (or a text snippet) through the ingestion pipeline and prints
 * what a storage consumer would receive.
 *
 * The processing pipeline:
 * 1. Validate the upload (size, filename, extension)
 * 2. Check the extension against the conversion service's supported list
 * 3. Read and fingerprint the file (SHA-256)
 * 4. Convert to markdown via the conversion service
 * 5. Chunk the markdown (headings, code fences and tables kept intact)
 * 6. Optionally wrap each chunk with front-matter for embedding
 *
 * Usage:
 *   npx tsx scripts/src/process-documents.ts [options] <file...>
 *   # or via npm script:
 *   npm run process-documents -- [options] <file...>
 *
 * Options:
 *   --text=TEXT         Process TEXT as a plain-text submission instead of files
 *   --wrap              Print wrapped chunks as JSON lines
 *   --doc-id=ID         Document id written to front-matter (default: the file id)
 *   --store-dir=DIR     Save each raw upload under DIR before processing
 *   --prefix=PREFIX     Stored filename prefix (default: a random UUID)
 *   --list-extensions   Print the extensions the conversion service accepts
 *   --verbose           Show debug logging
 *   --quiet             Errors only
 *   --log-format=FMT    Log format: text, json, compact, pretty (default: pretty)
 *
 * Environment variables:
 *   - CONVERSION_API_URL: Conversion service URL (default: http://localhost:8000)
 *   - CONVERSION_TIMEOUT_MS: Request timeout (default: 60000)
 *   - PROCESSOR_MAX_FILE_BYTES, PROCESSOR_MAX_TEXT_BYTES, PROCESSOR_TEXT_CHUNK_SIZE
 *   - CHUNK_MAX_TOKENS, CHUNK_MIN_TOKENS, CHUNK_CHARS_PER_TOKEN, CHUNK_OVERLAP_PERCENT
 *   - LOG_LEVEL, LOG_FORMAT, NO_COLOR
 *
 * Examples:
 *   npm run process-documents -- ./docs/handbook.pdf
 *   npm run process-documents -- --wrap --doc-id=handbook ./docs/handbook.pdf
 *   npm run process-documents -- --text="Quick note to index"
 *   npm run process-documents -- --store-dir=./uploads --prefix=team-a ./docs/*.docx
 */

import { randomUUID } from 'node:crypto';

import {
  DocumentProcessor,
  HttpConversionClient,
  Logger,
  LogLevel,
  LogFormatSchema,
  fileUploadFromPath,
  formatFileSize,
  generateFileMetadata,
  isDocumentProcessingError,
  loadConversionConfig,
  loadLoggerConfigFromEnv,
  loadProcessorConfig,
  saveUploadToDirectory,
  wrapMarkdownChunks,
  type ChunkOptions,
  type LogFormat,
  type ProcessedFile,
} from '../../lib/src/index.js';

// ============================================================================
// Types
// ============================================================================

interface ParsedArgs {
  files: string[];
  text?: string;
  wrap: boolean;
  docId?: string;
  storeDir?: string;
  prefix: string;
  listExtensions: boolean;
  verbose: boolean;
  quiet: boolean;
  logFormat?: LogFormat;
}

interface RunStats {
  processed: number;
  failed: number;
  totalChunks: number;
  totalBytes: number;
  errors: string[];
}

// ============================================================================
// Argument Parsing
// ============================================================================

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);

  const result: ParsedArgs = {
    files: [],
    wrap: false,
    prefix: randomUUID(),
    listExtensions: false,
    verbose: false,
    quiet: false,
  };

  for (const arg of args) {
    if (arg === '--wrap') {
      result.wrap = true;
    } else if (arg === '--list-extensions') {
      result.listExtensions = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg.startsWith('--text=')) {
      result.text = arg.slice(7);
    } else if (arg.startsWith('--doc-id=')) {
      result.docId = arg.slice(9);
    } else if (arg.startsWith('--store-dir=')) {
      result.storeDir = arg.slice(12);
    } else if (arg.startsWith('--prefix=')) {
      result.prefix = arg.slice(9);
    } else if (arg.startsWith('--log-format=')) {
      const format = LogFormatSchema.safeParse(arg.slice(13));
      if (format.success) {
        result.logFormat = format.data;
      } else {
        console.error(`Unknown log format: ${arg.slice(13)}`);
        process.exit(1);
      }
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (arg.startsWith('--')) {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    } else {
      result.files.push(arg);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Document Processing Script

Usage:
  npm run process-documents -- [options] <file...>

Options:
  --text=TEXT         Process TEXT as a plain-text submission instead of files
  --wrap              Print wrapped chunks as JSON lines
  --doc-id=ID         Document id written to front-matter (default: the file id)
  --store-dir=DIR     Save each raw upload under DIR before processing
  --prefix=PREFIX     Stored filename prefix (default: a random UUID)
  --list-extensions   Print the extensions the conversion service accepts
  --verbose           Show debug logging
  --quiet             Errors only
  --log-format=FMT    Log format: text, json, compact, pretty (default: pretty)
  --help, -h          Show this help
`);
}

function createScriptLogger(args: ParsedArgs): Logger {
  const envConfig = loadLoggerConfigFromEnv();
  let level = envConfig.level ?? LogLevel.INFO;
  if (args.verbose) {
    level = LogLevel.DEBUG;
  } else if (args.quiet) {
    level = LogLevel.ERROR;
  }

  return new Logger({
    ...envConfig,
    level,
    format: args.logFormat ?? envConfig.format ?? 'pretty',
    source: 'process-documents',
  });
}

// ============================================================================
// Output
// ============================================================================

function printResult(file: ProcessedFile, args: ParsedArgs, chunkOptions: ChunkOptions): void {
  const metadata = generateFileMetadata(file);

  if (!args.wrap) {
    console.log(JSON.stringify(metadata));
    return;
  }

  const chunks = wrapMarkdownChunks(
    file.markdown,
    {
      docId: args.docId ?? file.id,
      fileId: file.id,
      source: file.filename,
      createdAt: file.processedAt,
    },
    { chunkOptions }
  );

  for (const chunk of chunks) {
    console.log(
      JSON.stringify({
        docId: args.docId ?? file.id,
        fileId: file.id,
        chunkIndex: chunk.chunkIndex,
        section: chunk.section,
        estimatedTokens: chunk.estimatedTokens,
        content: chunk.content,
      })
    );
  }
}

function printStats(stats: RunStats, logger: Logger): void {
  logger.info('Run complete', {
    processed: stats.processed,
    failed: stats.failed,
    chunks: stats.totalChunks,
    input: formatFileSize(stats.totalBytes),
  });
  for (const error of stats.errors) {
    logger.error(error);
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs();
  const logger = createScriptLogger(args);

  const stats: RunStats = {
    processed: 0,
    failed: 0,
    totalChunks: 0,
    totalBytes: 0,
    errors: [],
  };

  const processor = new DocumentProcessor({
    converter: new HttpConversionClient(loadConversionConfig(), {
      logger: logger.child('conversion'),
    }),
    config: loadProcessorConfig(),
    logger: logger.child('processor'),
  });

  if (args.listExtensions) {
    const extensions = await processor.getSupportedExtensions();
    console.log(extensions.join('\n'));
    return;
  }

  if (args.text !== undefined) {
    const file = processor.processText(args.text);
    stats.processed++;
    stats.totalChunks += file.chunks.length;
    stats.totalBytes += file.originalSize;
    printResult(file, args, processor.getConfig().chunking);
    printStats(stats, logger);
    return;
  }

  if (args.files.length === 0) {
    printHelp();
    process.exit(1);
  }

  for (const path of args.files) {
    try {
      const upload = await fileUploadFromPath(path);

      if (args.storeDir) {
        const storedPath = await saveUploadToDirectory(upload, args.storeDir, args.prefix, logger);
        logger.info('Stored upload', { path: storedPath });
      }

      const file = await processor.processFile(upload);
      stats.processed++;
      stats.totalChunks += file.chunks.length;
      stats.totalBytes += file.originalSize;
      printResult(file, args, processor.getConfig().chunking);
    } catch (error) {
      stats.failed++;
      const message = error instanceof Error ? error.message : String(error);
      stats.errors.push(`${path}: ${message}`);
      if (isDocumentProcessingError(error)) {
        logger.warn('Failed to process document', { path, code: error.code, kind: error.kind });
      } else {
        logger.error('Failed to process document', error, { path });
      }
    }
  }

  printStats(stats, logger);

  if (stats.failed > 0) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
