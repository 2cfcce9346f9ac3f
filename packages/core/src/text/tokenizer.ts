import { normalizeWord } from './normalize';
import type { Token } from './types';

/**
 * A Ukrainian letter followed by letters, apostrophes (' or ʼ) or combining marks U+0300–U+036F.
 * Anything else (Latin, digits, punctuation, detached marks) is non-word text.
 */
const WORD_PATTERN = /[а-яіїєґА-ЯІЇЄҐ][а-яіїєґА-ЯІЇЄҐ'ʼ\u0300-\u036f]*/gu;

const wordMatches = (text: string) => text.matchAll(new RegExp(WORD_PATTERN));

/**
 * Split text into word and non-word tokens.
 * Tokens are contiguous and in document order; joining their `text` gives back the input.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let lastEnd = 0;

  for (const match of wordMatches(text)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (start > lastEnd) {
      tokens.push({ text: text.slice(lastEnd, start), start: lastEnd, end: start, isWord: false });
    }
    tokens.push({ text: match[0], start, end, isWord: true });
    lastEnd = end;
  }

  if (lastEnd < text.length) {
    tokens.push({ text: text.slice(lastEnd), start: lastEnd, end: text.length, isWord: false });
  }

  return tokens;
}

/** Normalized words in document order, duplicates kept. */
export function extractWords(text: string): string[] {
  return Array.from(wordMatches(text), (match) => normalizeWord(match[0]));
}

export function countWords(text: string): number {
  const pattern = new RegExp(WORD_PATTERN);
  let count = 0;
  while (pattern.exec(text)) count += 1;
  return count;
}
