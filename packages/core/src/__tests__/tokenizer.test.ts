import { describe, expect, it } from 'vitest';
import { countWords, extractWords, tokenize, type Token } from '../text';

const words = (tokens: Token[]) => tokens.filter((t) => t.isWord).map((t) => t.text);
const gaps = (tokens: Token[]) => tokens.filter((t) => !t.isWord).map((t) => t.text);

function expectContiguous(text: string, tokens: Token[]) {
  expect(tokens.map((t) => t.text).join('')).toBe(text);
  if (tokens.length === 0) {
    expect(text).toBe('');
    return;
  }
  expect(tokens[0]?.start).toBe(0);
  expect(tokens[tokens.length - 1]?.end).toBe(text.length);
  tokens.forEach((token, i) => {
    expect(text.slice(token.start, token.end)).toBe(token.text);
    const next = tokens[i + 1];
    if (next) expect(token.end).toBe(next.start);
  });
}

describe('tokenize', () => {
  it('splits words from punctuation', () => {
    const tokens = tokenize('Привіт, світ!');
    expect(words(tokens)).toEqual(['Привіт', 'світ']);
    expect(gaps(tokens)).toEqual([', ', '!']);
    expect(tokens).toEqual([
      { text: 'Привіт', start: 0, end: 6, isWord: true },
      { text: ', ', start: 6, end: 8, isWord: false },
      { text: 'світ', start: 8, end: 12, isWord: true },
      { text: '!', start: 12, end: 13, isWord: false },
    ]);
  });

  it('returns no tokens for an empty string', () => {
    expect(tokenize('')).toEqual([]);
  });

  it('emits leading and trailing non-word text as single tokens', () => {
    const tokens = tokenize('  — Добре... 42');
    expect(tokens).toEqual([
      { text: '  — ', start: 0, end: 4, isWord: false },
      { text: 'Добре', start: 4, end: 9, isWord: true },
      { text: '... 42', start: 9, end: 15, isWord: false },
    ]);
  });

  it('keeps case in the token text', () => {
    expect(words(tokenize('ПРИВІТ Світ'))).toEqual(['ПРИВІТ', 'Світ']);
  });

  it('keeps apostrophes inside words', () => {
    expect(words(tokenize("п'ять"))).toEqual(["п'ять"]);
    expect(words(tokenize('мʼята'))).toEqual(['мʼята']);
  });

  it('does not start a word with an apostrophe', () => {
    const tokens = tokenize("'так'");
    expect(tokens).toEqual([
      { text: "'", start: 0, end: 1, isWord: false },
      { text: "так'", start: 1, end: 5, isWord: true },
    ]);
  });

  it('treats Latin text and digits as non-word text', () => {
    const tokens = tokenize('Hello Привіт World2');
    expect(words(tokens)).toEqual(['Привіт']);
    expect(gaps(tokens)).toEqual(['Hello ', ' World2']);
  });

  it('keeps stress marks inside the word', () => {
    const text = 'ме\u0301не';
    const tokens = tokenize(text);
    expect(tokens).toEqual([{ text, start: 0, end: 5, isWord: true }]);
  });

  it('classifies a detached combining mark as non-word text', () => {
    expect(tokenize('\u0301')).toEqual([{ text: '\u0301', start: 0, end: 1, isWord: false }]);
    expect(tokenize(' \u0301ґ')).toEqual([
      { text: ' \u0301', start: 0, end: 2, isWord: false },
      { text: 'ґ', start: 2, end: 3, isWord: true },
    ]);
  });

  it('reconstructs the input and stays contiguous', () => {
    const samples = [
      '',
      'Привіт, світ!',
      'АБ\nВГ\n',
      "  Сім'я — це 7 людей. ",
      'mixed текст with 🙂 emoji',
      '\u0301\u0301',
      'їжак, ґудзик; Єва.',
    ];
    for (const sample of samples) {
      expectContiguous(sample, tokenize(sample));
    }
  });
});

describe('extractWords', () => {
  it('returns normalized words in order, duplicates kept', () => {
    expect(extractWords('Ти ме\u0301не чу\u0301єш? Ти!')).toEqual(['ти', 'мене', 'чуєш', 'ти']);
  });

  it('returns nothing for text without Ukrainian words', () => {
    expect(extractWords('Hello, 123')).toEqual([]);
  });
});

describe('countWords', () => {
  it('counts word tokens', () => {
    expect(countWords('Тут є три слова')).toBe(4);
    expect(countWords('Hello')).toBe(0);
    expect(countWords('')).toBe(0);
  });

  it('gives the same answer on repeated and interleaved calls', () => {
    const text = 'Тут є три слова';
    expect([countWords(text), countWords(text)]).toEqual([4, 4]);
    expect(extractWords(text)).toEqual(['тут', 'є', 'три', 'слова']);
    expect(countWords('слово')).toBe(1);
    expect(tokenize(text).filter((t) => t.isWord)).toHaveLength(4);
  });

  it('keeps the word pattern out of the public surface', async () => {
    const text = await import('../text');
    expect(Object.keys(text)).not.toContain('UKRAINIAN_WORD_PATTERN');
  });
});
