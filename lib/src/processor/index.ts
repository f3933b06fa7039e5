/**
 * Processor Module
 *
 * Turns uploads and text submissions into chunked `ProcessedFile` records.
 */

export {
  type ProcessedFile,
  FileType,
  type FileMetadata,
  type FileUpload,
  fileUploadFromBuffer,
  fileUploadFromPath,
} from './types.js';

export {
  ProcessorConfigSchema,
  type ProcessorConfig,
  type ProcessorConfigInput,
  createProcessorConfig,
  loadProcessorConfig,
} from './config.js';

export {
  SupportedExtensionCache,
  normalizeExtension,
  type ExtensionFetcher,
} from './extension-cache.js';

export {
  COMMON_FILE_TYPES,
  validateFilename,
  generateStoredFilename,
  parseStoredFilename,
  generateTextFilename,
  getFileType,
  generateDocumentId,
  formatFileSize,
  truncateText,
  cleanMarkdown,
  extractTitle,
  countWords,
  generateFileMetadata,
} from './file-utils.js';

export { DocumentProcessor, type DocumentProcessorOptions } from './processor.js';
