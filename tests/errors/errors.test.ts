/**
 * Unit Tests for Document Processing Errors
 */

import { describe, it, expect } from 'vitest';
import {
  DocumentProcessingError,
  ErrorKind,
  InvariantError,
  ProcessingErrorCode,
  UpstreamError,
  ValidationError,
  createProcessingError,
  getErrorChain,
  getErrorKind,
  isDocumentProcessingError,
  isInvariantError,
  isUpstreamError,
  isValidationError,
  wrapError,
} from '../../lib/src/errors/index.js';

describe('getErrorKind()', () => {
  it('should classify codes', () => {
    expect(getErrorKind(ProcessingErrorCode.FILE_TOO_LARGE)).toBe(ErrorKind.VALIDATION);
    expect(getErrorKind(ProcessingErrorCode.CONVERSION_FAILED)).toBe(ErrorKind.UPSTREAM);
    expect(getErrorKind(ProcessingErrorCode.IO_ERROR)).toBe(ErrorKind.INTERNAL);
  });
});

describe('error classes', () => {
  it('should carry code, kind and context', () => {
    const error = new ValidationError('file name is required', ProcessingErrorCode.FILENAME_REQUIRED, {
      context: { size: 12 },
    });

    expect(error).toBeInstanceOf(DocumentProcessingError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.message).toBe('file name is required');
    expect(error.code).toBe('FILENAME_REQUIRED');
    expect(error.kind).toBe('validation');
    expect(error.context).toEqual({ size: 12 });
    expect(error.retryable).toBe(false);
  });

  it('should default context to an empty object', () => {
    expect(new UpstreamError('boom', ProcessingErrorCode.CONVERSION_FAILED).context).toEqual({});
  });

  it('should expose the upstream status', () => {
    const error = new UpstreamError('bad gateway', ProcessingErrorCode.CONVERSION_FAILED, {
      context: { status: 502 },
    });
    expect(error.status).toBe(502);
    expect(error.retryable).toBe(true);
  });

  it('should not retry cancelled requests', () => {
    expect(new UpstreamError('cancelled', ProcessingErrorCode.REQUEST_CANCELLED).retryable).toBe(false);
  });

  it('should default invariant errors to INVARIANT_VIOLATION', () => {
    const error = new InvariantError('budget overrun');
    expect(error.code).toBe('INVARIANT_VIOLATION');
    expect(error.kind).toBe('internal');
  });

  it('should accept a specific invariant code', () => {
    const error = new InvariantError('conversion client is not configured', {
      code: ProcessingErrorCode.CONVERTER_NOT_CONFIGURED,
    });
    expect(error.code).toBe('CONVERTER_NOT_CONFIGURED');
  });
});

describe('createProcessingError()', () => {
  it('should pick the class matching the code kind', () => {
    expect(createProcessingError('a', ProcessingErrorCode.TEXT_REQUIRED)).toBeInstanceOf(ValidationError);
    expect(createProcessingError('b', ProcessingErrorCode.EXTENSIONS_UNAVAILABLE)).toBeInstanceOf(
      UpstreamError
    );
    expect(createProcessingError('c', ProcessingErrorCode.IO_ERROR)).toBeInstanceOf(InvariantError);
  });
});

describe('wrapError()', () => {
  it('should prefix the cause message and use the fallback code', () => {
    const cause = new Error('socket hang up');
    const wrapped = wrapError(cause, 'failed to call /convert', ProcessingErrorCode.CONVERSION_FAILED, {
      endpoint: '/convert',
    });

    expect(wrapped.message).toBe('failed to call /convert: socket hang up');
    expect(wrapped.code).toBe('CONVERSION_FAILED');
    expect(wrapped.context).toEqual({ endpoint: '/convert' });
    expect(wrapped.cause).toBe(cause);
  });

  it('should keep the code of a domain error and merge context', () => {
    const inner = new ValidationError('unsupported file type: .xyz', ProcessingErrorCode.UNSUPPORTED_EXTENSION, {
      context: { extension: '.xyz' },
    });
    const wrapped = wrapError(inner, 'failed to process', ProcessingErrorCode.CONVERSION_FAILED, {
      filename: 'a.xyz',
    });

    expect(wrapped).toBeInstanceOf(ValidationError);
    expect(wrapped.code).toBe('UNSUPPORTED_EXTENSION');
    expect(wrapped.context).toEqual({ extension: '.xyz', filename: 'a.xyz' });
  });

  it('should stringify non-error causes', () => {
    expect(wrapError('plain', 'outer', ProcessingErrorCode.IO_ERROR).message).toBe('outer: plain');
  });

  it('should keep the message when the cause message is empty', () => {
    expect(wrapError(new Error(''), 'outer', ProcessingErrorCode.IO_ERROR).message).toBe('outer');
  });
});

describe('type guards', () => {
  it('should match by kind', () => {
    const validation = new ValidationError('v', ProcessingErrorCode.TEXT_TOO_LARGE);
    const upstream = new UpstreamError('u', ProcessingErrorCode.CONVERSION_FAILED);
    const invariant = new InvariantError('i');

    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(upstream)).toBe(false);
    expect(isUpstreamError(upstream)).toBe(true);
    expect(isInvariantError(invariant)).toBe(true);
    expect(isDocumentProcessingError(new Error('plain'))).toBe(false);
  });
});

describe('getErrorChain()', () => {
  it('should list errors outermost first', () => {
    const root = new Error('root');
    const middle = wrapError(root, 'middle', ProcessingErrorCode.IO_ERROR);
    const outer = wrapError(middle, 'outer', ProcessingErrorCode.CONVERSION_FAILED);

    expect(getErrorChain(outer).map((error) => error.message)).toEqual([
      'outer: middle: root',
      'middle: root',
      'root',
    ]);
  });

  it('should return nothing for non-errors', () => {
    expect(getErrorChain('nope')).toEqual([]);
  });
});
