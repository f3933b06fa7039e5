/**
 * Unit Tests for Error Message Extraction
 */

import { describe, it, expect } from 'vitest';
import { extractErrorMessage } from '../../lib/src/conversion/index.js';

describe('extractErrorMessage()', () => {
  it('should prefer a string detail', () => {
    expect(extractErrorMessage('{"detail":"unsupported format","message":"other"}', '400')).toBe(
      'unsupported format'
    );
  });

  it('should use the msg of the first detail entry', () => {
    expect(
      extractErrorMessage('{"detail":[{"loc":["body","file"],"msg":"field required"},{"msg":"second"}]}', '422')
    ).toBe('field required');
  });

  it('should fall through to message, then error', () => {
    expect(extractErrorMessage('{"detail":"  ","message":"bad upload"}', '400')).toBe('bad upload');
    expect(extractErrorMessage('{"error":"quota exceeded"}', '429')).toBe('quota exceeded');
  });

  it('should use the raw body when no known field is present', () => {
    expect(extractErrorMessage('{"status":"down"}', '503')).toBe('{"status":"down"}');
    expect(extractErrorMessage('  gateway exploded  ', '502')).toBe('gateway exploded');
  });

  it('should use the fallback for an empty body', () => {
    expect(extractErrorMessage('   ', '500 Internal Server Error')).toBe('500 Internal Server Error');
  });

  it('should ignore detail entries without msg', () => {
    expect(extractErrorMessage('{"detail":[{"type":"missing"}],"error":"invalid"}', '422')).toBe('invalid');
  });
});
