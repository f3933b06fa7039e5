/**
 * Unit Tests for Sentence Splitting
 */

import { describe, it, expect } from 'vitest';
import { splitOnSentences } from '../../lib/src/chunking/index.js';

describe('splitOnSentences()', () => {
  it('should split on terminators followed by a capitalized word', () => {
    expect(splitOnSentences('Hello world. This is a test! Is it? Yes.')).toEqual([
      'Hello world.',
      'This is a test!',
      'Is it?',
      'Yes.',
    ]);
  });

  it('should not split decimals or lowercase continuations', () => {
    expect(splitOnSentences('Pi is 3.14 today. ok then.')).toEqual(['Pi is 3.14 today. ok then.']);
  });

  it('should split across newlines', () => {
    expect(splitOnSentences('First line.\nSecond line')).toEqual(['First line.', 'Second line']);
  });

  it('should flush text without a terminator', () => {
    expect(splitOnSentences('No terminator here')).toEqual(['No terminator here']);
  });

  it('should trim sentences', () => {
    expect(splitOnSentences(' One. Two. ')).toEqual(['One.', 'Two.']);
  });

  it('should require a single space before the next sentence', () => {
    expect(splitOnSentences('One.  Two.')).toEqual(['One.  Two.']);
  });

  it('should return nothing for empty or blank text', () => {
    expect(splitOnSentences('')).toEqual([]);
    expect(splitOnSentences('   ')).toEqual([]);
  });
});
