/**
 * Document Processing Errors
 *
 * Error classes for the three failure kinds: rejected input, failing
 * collaborators and violated internal invariants.
 */

import {
  type ErrorContext,
  type ErrorKind,
  ErrorKind as ErrorKindEnum,
  ProcessingErrorCode,
  getErrorKind,
} from './types.js';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all document processing failures.
 *
 * The message is a human-readable cause chain ("failed to convert file to
 * markdown: conversion failed for file a.pdf (status 500): boom"); the
 * original error stays reachable through `cause`.
 */
export class DocumentProcessingError extends Error {
  readonly code: ProcessingErrorCode;
  readonly kind: ErrorKind;
  readonly context: ErrorContext;

  constructor(
    message: string,
    code: ProcessingErrorCode,
    options?: { context?: ErrorContext | undefined; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DocumentProcessingError';
    this.code = code;
    this.kind = getErrorKind(code);
    this.context = options?.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DocumentProcessingError);
    }
  }

  /** Whether the caller may reasonably retry the operation */
  get retryable(): boolean {
    return this.kind === ErrorKindEnum.UPSTREAM && this.code !== ProcessingErrorCode.REQUEST_CANCELLED;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Input was rejected: oversized, empty, missing filename or extension,
 * unsupported type, or no indexable content.
 */
export class ValidationError extends DocumentProcessingError {
  constructor(
    message: string,
    code: ProcessingErrorCode,
    options?: { context?: ErrorContext | undefined; cause?: unknown }
  ) {
    super(message, code, options);
    this.name = 'ValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

/**
 * A collaborator (conversion service, extension list) failed or was cancelled.
 */
export class UpstreamError extends DocumentProcessingError {
  constructor(
    message: string,
    code: ProcessingErrorCode,
    options?: { context?: ErrorContext | undefined; cause?: unknown }
  ) {
    super(message, code, options);
    this.name = 'UpstreamError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamError);
    }
  }

  /** HTTP status returned by the collaborator, if any */
  get status(): number | undefined {
    return this.context.status;
  }
}

/**
 * A programming error: malformed metadata, a budget overrun, missing wiring.
 */
export class InvariantError extends DocumentProcessingError {
  constructor(
    message: string,
    options?: { context?: ErrorContext | undefined; cause?: unknown; code?: ProcessingErrorCode }
  ) {
    super(message, options?.code ?? ProcessingErrorCode.INVARIANT_VIOLATION, options);
    this.name = 'InvariantError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvariantError);
    }
  }
}

// =============================================================================
// Construction Helpers
// =============================================================================

/**
 * Create the error class matching a code's kind
 */
export function createProcessingError(
  message: string,
  code: ProcessingErrorCode,
  options?: { context?: ErrorContext | undefined; cause?: unknown }
): DocumentProcessingError {
  switch (getErrorKind(code)) {
    case ErrorKindEnum.VALIDATION:
      return new ValidationError(message, code, options);
    case ErrorKindEnum.UPSTREAM:
      return new UpstreamError(message, code, options);
    case ErrorKindEnum.INTERNAL:
    default:
      return new InvariantError(message, { ...options, code });
  }
}

/**
 * Wrap an error with a description of the failed operation.
 *
 * Domain errors keep their code (and therefore their kind) and merge context;
 * anything else is classified with `fallbackCode`.
 *
 * @example
 * ```typescript
 * try {
 *   markdown = await converter.convert(filename, data);
 * } catch (error) {
 *   throw wrapError(error, 'failed to convert file to markdown', ProcessingErrorCode.CONVERSION_FAILED, {
 *     filename,
 *   });
 * }
 * ```
 */
export function wrapError(
  error: unknown,
  message: string,
  fallbackCode: ProcessingErrorCode,
  context?: ErrorContext
): DocumentProcessingError {
  const causeMessage = error instanceof Error ? error.message : String(error);
  const fullMessage = causeMessage ? `${message}: ${causeMessage}` : message;

  if (error instanceof DocumentProcessingError) {
    return createProcessingError(fullMessage, error.code, {
      context: { ...error.context, ...context },
      cause: error,
    });
  }

  return createProcessingError(fullMessage, fallbackCode, { context, cause: error });
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDocumentProcessingError(error: unknown): error is DocumentProcessingError {
  return error instanceof DocumentProcessingError;
}

export function isValidationError(error: unknown): error is DocumentProcessingError {
  return error instanceof DocumentProcessingError && error.kind === ErrorKindEnum.VALIDATION;
}

export function isUpstreamError(error: unknown): error is DocumentProcessingError {
  return error instanceof DocumentProcessingError && error.kind === ErrorKindEnum.UPSTREAM;
}

export function isInvariantError(error: unknown): error is DocumentProcessingError {
  return error instanceof DocumentProcessingError && error.kind === ErrorKindEnum.INTERNAL;
}

/**
 * Walk the cause chain, outermost first
 */
export function getErrorChain(error: unknown): Error[] {
  const chain: Error[] = [];
  let current: unknown = error;
  while (current instanceof Error && !chain.includes(current)) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}
