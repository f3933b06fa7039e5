/**
 * Sentence Splitting
 */

const TERMINATORS = new Set(['.', '!', '?']);

function isUpperAscii(char: string | undefined): boolean {
  return char !== undefined && char >= 'A' && char <= 'Z';
}

/**
 * Split text on sentence boundaries.
 *
 * A `.`, `!` or `?` ends a sentence when it is the last character, or when it
 * is followed by a space or newline and then an uppercase ASCII letter.
 * Anything else ("e.g. this", "3.14") stays inside the current sentence.
 * Sentences are trimmed; empty ones are dropped.
 */
export function splitOnSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  const emit = (end: number): void => {
    const sentence = text.slice(start, end).trim();
    if (sentence !== '') {
      sentences.push(sentence);
    }
    start = end;
  };

  for (let i = 0; i < text.length; i++) {
    if (!TERMINATORS.has(text.charAt(i))) {
      continue;
    }

    if (i === text.length - 1) {
      emit(i + 1);
      continue;
    }

    const next = text.charAt(i + 1);
    if ((next === ' ' || next === '\n') && isUpperAscii(text[i + 2])) {
      emit(i + 1);
    }
  }

  emit(text.length);
  return sentences;
}
