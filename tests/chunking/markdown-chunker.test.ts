/**
 * Unit Tests for the Structural Markdown Chunker
 *
 * Tests section tagging, soft/hard split triggers, and the integrity of
 * fenced code blocks and tables:
 * - chunkMarkdownStructure()
 * - chunkMarkdown() / chunkMarkdownWithOptions()
 * - parseHeading()
 */

import { describe, it, expect } from 'vitest';
import {
  chunkMarkdown,
  chunkMarkdownStructure,
  chunkMarkdownWithOptions,
  parseHeading,
} from '../../lib/src/chunking/index.js';

// =============================================================================
// Fixtures
// =============================================================================

/** A fenced block of roughly 3,700 characters with blank lines inside */
function mediumFence(): string {
  const lines = ['```python'];
  for (let i = 0; i < 40; i++) {
    lines.push('x'.repeat(90));
    lines.push('');
  }
  lines.push('```');
  return lines.join('\n');
}

const SAMPLE_DOCUMENT = [
  'Preface before any heading.',
  '',
  '# Getting Started',
  'Install the package and run the setup script.',
  '',
  '## Configuration',
  '| key | value |',
  '| --- | ----- |',
  '| port | 8080 |',
  '',
  '```bash',
  '# not a heading',
  'npm start',
  '```',
  '',
  '### Notes',
  'Final remarks.',
].join('\n');

// =============================================================================
// Sections
// =============================================================================

describe('chunkMarkdownStructure()', () => {
  describe('sections', () => {
    it('should start a new chunk at each heading', () => {
      expect(chunkMarkdownStructure('# Intro\nHello\n\n## Usage\nRun it')).toEqual([
        { section: 'Intro', text: '# Intro\nHello' },
        { section: 'Usage', text: '## Usage\nRun it' },
      ]);
    });

    it('should tag content before the first heading as Document', () => {
      expect(chunkMarkdownStructure('Preface text\n# A\nBody')).toEqual([
        { section: 'Document', text: 'Preface text' },
        { section: 'A', text: '# A\nBody' },
      ]);
    });

    it('should use Document for an empty heading', () => {
      expect(chunkMarkdownStructure('#\nbody')).toEqual([{ section: 'Document', text: '#\nbody' }]);
    });

    it('should not treat a hash without a space as a heading', () => {
      expect(chunkMarkdownStructure('#hashtag line\nmore')).toEqual([
        { section: 'Document', text: '#hashtag line\nmore' },
      ]);
    });

    it('should ignore headings inside code fences', () => {
      const markdown = '```\n# not a heading\n```';
      expect(chunkMarkdownStructure(markdown)).toEqual([{ section: 'Document', text: markdown }]);
    });

    it('should only close a fence with its own marker', () => {
      expect(chunkMarkdownStructure('~~~\n```\n# inside\n~~~\n# After')).toEqual([
        { section: 'Document', text: '~~~\n```\n# inside\n~~~' },
        { section: 'After', text: '# After' },
      ]);
    });

    it('should split the two-section document into one chunk per section', () => {
      const markdown = '# A\n' + 'x'.repeat(5000) + '\n## B\n' + 'y'.repeat(5000);
      expect(chunkMarkdownStructure(markdown)).toEqual([
        { section: 'A', text: '# A\n' + 'x'.repeat(5000) },
        { section: 'B', text: '## B\n' + 'y'.repeat(5000) },
      ]);
    });
  });

  // ===========================================================================
  // Split Triggers
  // ===========================================================================

  describe('split triggers', () => {
    it('should flush at a blank line once the soft limit is reached', () => {
      const options = { maxTokens: 100, minTokens: 5, charsPerToken: 1 };
      expect(chunkMarkdownWithOptions('abc\ndefg\n\nhij\n\nk', options)).toEqual([
        'abc\ndefg',
        'hij',
        'k',
      ]);
    });

    it('should split after the last blank line at the hard limit and keep the section', () => {
      const options = { maxTokens: 12, minTokens: 12, charsPerToken: 1 };
      expect(chunkMarkdownStructure('# H\naaa\n\nbbbbbbbb', options)).toEqual([
        { section: 'H', text: '# H\naaa' },
        { section: 'H', text: 'bbbbbbbb' },
      ]);
    });

    it('should split at the current line when there is no blank line', () => {
      const options = { maxTokens: 5, minTokens: 5, charsPerToken: 1 };
      expect(chunkMarkdownWithOptions('abcdefgh\nij', options)).toEqual(['abcdefgh', 'ij']);
    });

    it('should not split tables', () => {
      const options = { maxTokens: 10, minTokens: 5, charsPerToken: 1 };
      const table = '| a | b |\n| - | - |\n| 1 | 2 |';
      expect(chunkMarkdownWithOptions(`${table}\n\nnext`, options)).toEqual([table, 'next']);
    });
  });

  // ===========================================================================
  // Code Fences
  // ===========================================================================

  describe('code fences', () => {
    it('should keep a fence between the soft and hard limits in one chunk', () => {
      const fence = mediumFence();
      const markdown = ['Intro paragraph.', '', fence, '', 'Outro'].join('\n');

      expect(chunkMarkdown(markdown)).toEqual([`Intro paragraph.\n\n${fence}`, 'Outro']);
    });

    it('should keep a fence larger than the hard limit in one chunk', () => {
      const fence = '```\n' + Array(60).fill('y'.repeat(100)).join('\n') + '\n```';
      expect(chunkMarkdown(fence)).toEqual([fence]);
    });

    it('should not split at a blank line inside a fence when the hard limit is crossed', () => {
      const options = { maxTokens: 20, minTokens: 10, charsPerToken: 1 };
      const markdown = '```\nab\n\ncd\n```\n' + 'z'.repeat(30);

      expect(chunkMarkdownWithOptions(markdown, options)).toEqual([markdown]);
    });
  });

  // ===========================================================================
  // Edge Cases
  // ===========================================================================

  describe('edge cases', () => {
    it('should return nothing for empty or blank input', () => {
      expect(chunkMarkdownStructure('')).toEqual([]);
      expect(chunkMarkdownStructure('  \n\n \n')).toEqual([]);
    });

    it('should produce non-empty trimmed chunks', () => {
      const chunks = chunkMarkdownStructure(SAMPLE_DOCUMENT);
      expect(chunks.length).toBeGreaterThan(0);
      for (const chunk of chunks) {
        expect(chunk.text).toBe(chunk.text.trim());
        expect(chunk.text).not.toBe('');
      }
    });

    it('should tag the sample document in order', () => {
      expect(chunkMarkdownStructure(SAMPLE_DOCUMENT).map((chunk) => chunk.section)).toEqual([
        'Document',
        'Getting Started',
        'Configuration',
        'Notes',
      ]);
    });

    it('should produce at least one chunk for any non-blank input', () => {
      for (const input of ['x', '# only heading', '|a|b|', '```\nunclosed fence', '\n\nend\n']) {
        expect(chunkMarkdown(input).length).toBeGreaterThanOrEqual(1);
      }
    });
  });
});

describe('chunkMarkdown()', () => {
  it('should return the text of each structural chunk', () => {
    expect(chunkMarkdown(SAMPLE_DOCUMENT)).toEqual(
      chunkMarkdownStructure(SAMPLE_DOCUMENT).map((chunk) => chunk.text)
    );
  });
});

describe('parseHeading()', () => {
  it('should return heading text for ATX headings', () => {
    expect(parseHeading('# Title')).toBe('Title');
    expect(parseHeading('###### Deep')).toBe('Deep');
  });

  it('should strip closing hashes', () => {
    expect(parseHeading('## Title ##')).toBe('Title');
  });

  it('should return an empty string for a bare marker', () => {
    expect(parseHeading('#')).toBe('');
  });

  it('should return null for non-headings', () => {
    expect(parseHeading('####### seven')).toBeNull();
    expect(parseHeading('#tag')).toBeNull();
    expect(parseHeading('plain')).toBeNull();
  });
});
