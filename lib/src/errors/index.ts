/**
 * Errors Module
 *
 * Error taxonomy for document processing: validation, upstream and internal.
 */

export {
  ErrorKind,
  ProcessingErrorCode,
  ERROR_CODE_KIND,
  getErrorKind,
  type ErrorContext,
} from './types.js';

export {
  DocumentProcessingError,
  ValidationError,
  UpstreamError,
  InvariantError,
  createProcessingError,
  wrapError,
  isDocumentProcessingError,
  isValidationError,
  isUpstreamError,
  isInvariantError,
  getErrorChain,
} from './errors.js';
