import type { BoundaryStrength, TokenSpan } from '../types/chunk.types';

const TOKEN_REGEX = /\S+\s*/g;
const SENTENCE_END_REGEX = /[.!?…]["'”’)\]]*$/;
const PARAGRAPH_BREAK_REGEX = /\n[^\S\n]*\n/;

/**
 * Split text into word-plus-trailing-whitespace spans.
 * Leading whitespace of the document is folded into the first span.
 */
export function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  TOKEN_REGEX.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = TOKEN_REGEX.exec(text)) !== null) {
    const word = match[0].trimEnd();
    spans.push({
      start: spans.length === 0 ? 0 : match.index,
      end: match.index + match[0].length,
      wordEnd: match.index + word.length,
    });
  }

  return spans;
}

/**
 * Strength of the boundary right after a span:
 * 2 = paragraph break, 1 = sentence end or line break, 0 = none
 */
export function boundaryAfter(text: string, span: TokenSpan): BoundaryStrength {
  const trailing = text.slice(span.wordEnd, span.end);
  if (trailing.length === 0) {
    return 0;
  }
  if (PARAGRAPH_BREAK_REGEX.test(trailing)) {
    return 2;
  }

  const word = text.slice(span.start, span.wordEnd);
  if (SENTENCE_END_REGEX.test(word) || trailing.includes('\n')) {
    return 1;
  }

  return 0;
}
