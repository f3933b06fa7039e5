/**
 * RAG Document Ingestion - Library
 *
 * Converts documents to markdown, splits them into bounded chunks and wraps
 * each chunk with addressable front-matter for embedding and storage.
 */

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Chunking (Markdown and Plain Text)
export * from './chunking/index.js';

// Conversion (Document-to-Markdown Service Client)
export * from './conversion/index.js';

// Processor (Validation, Hashing, Conversion, Chunking)
export * from './processor/index.js';

// Storage (Raw Upload Files)
export * from './storage/index.js';
