/**
 * Error Types
 *
 * Error codes and classification shared by the processor, the conversion
 * client and the chunking engine.
 */

// =============================================================================
// Error Kinds
// =============================================================================

/**
 * Broad classification of a failure.
 *
 * - validation: the caller's input was rejected; never retried
 * - upstream: a collaborator (conversion service) failed; the caller decides on retry
 * - internal: a programming error or misconfiguration
 */
export const ErrorKind = {
  VALIDATION: 'validation',
  UPSTREAM: 'upstream',
  INTERNAL: 'internal',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for document processing failures
 */
export const ProcessingErrorCode = {
  /** Upload is larger than the configured maximum */
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  /** Upload has no usable file name */
  FILENAME_REQUIRED: 'FILENAME_REQUIRED',
  /** File name contains traversal sequences or reserved characters */
  INVALID_FILENAME: 'INVALID_FILENAME',
  /** File name has no extension */
  EXTENSION_REQUIRED: 'EXTENSION_REQUIRED',
  /** Extension is not in the conversion service's supported set */
  UNSUPPORTED_EXTENSION: 'UNSUPPORTED_EXTENSION',
  /** Text submission is empty or whitespace only */
  TEXT_REQUIRED: 'TEXT_REQUIRED',
  /** Text submission exceeds the maximum length */
  TEXT_TOO_LARGE: 'TEXT_TOO_LARGE',
  /** Conversion produced no content */
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  /** Chunking produced zero chunks */
  NO_INDEXABLE_CONTENT: 'NO_INDEXABLE_CONTENT',
  /** Conversion request failed */
  CONVERSION_FAILED: 'CONVERSION_FAILED',
  /** Supported-extension list could not be fetched */
  EXTENSIONS_UNAVAILABLE: 'EXTENSIONS_UNAVAILABLE',
  /** Outbound request was aborted by the caller */
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
  /** No conversion client configured */
  CONVERTER_NOT_CONFIGURED: 'CONVERTER_NOT_CONFIGURED',
  /** Reading or writing file bytes failed */
  IO_ERROR: 'IO_ERROR',
  /** Internal invariant violated (malformed metadata, budget overrun) */
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
} as const;

export type ProcessingErrorCode = (typeof ProcessingErrorCode)[keyof typeof ProcessingErrorCode];

/**
 * Kind for each error code
 */
export const ERROR_CODE_KIND: Record<ProcessingErrorCode, ErrorKind> = {
  [ProcessingErrorCode.FILE_TOO_LARGE]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.FILENAME_REQUIRED]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.INVALID_FILENAME]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.EXTENSION_REQUIRED]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.UNSUPPORTED_EXTENSION]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.TEXT_REQUIRED]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.TEXT_TOO_LARGE]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.EMPTY_CONTENT]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.NO_INDEXABLE_CONTENT]: ErrorKind.VALIDATION,
  [ProcessingErrorCode.CONVERSION_FAILED]: ErrorKind.UPSTREAM,
  [ProcessingErrorCode.EXTENSIONS_UNAVAILABLE]: ErrorKind.UPSTREAM,
  [ProcessingErrorCode.REQUEST_CANCELLED]: ErrorKind.UPSTREAM,
  [ProcessingErrorCode.CONVERTER_NOT_CONFIGURED]: ErrorKind.INTERNAL,
  [ProcessingErrorCode.IO_ERROR]: ErrorKind.INTERNAL,
  [ProcessingErrorCode.INVARIANT_VIOLATION]: ErrorKind.INTERNAL,
};

/**
 * Get the kind for an error code
 */
export function getErrorKind(code: ProcessingErrorCode): ErrorKind {
  return ERROR_CODE_KIND[code];
}

// =============================================================================
// Error Context
// =============================================================================

/**
 * Diagnostic context attached to an error.
 *
 * Describes the operation's input (name, size, endpoint); raw content is never
 * stored here.
 */
export interface ErrorContext {
  filename?: string;
  size?: number;
  extension?: string;
  status?: number;
  endpoint?: string;
  [key: string]: string | number | boolean | undefined;
}
