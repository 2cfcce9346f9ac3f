import { describe, expect, it } from 'vitest';
import {
  describeGrammarNote,
  describeText,
  describeWordList,
  validateGrammarNote,
  validateText,
  validateWordList,
} from '../content';

const createdAt = '2025-01-01T10:00:00.000Z';

describe('validateText', () => {
  it('applies defaults for optional fields', () => {
    const result = validateText({ id: 't-1', title: 'Ранок', content: 'Добрий ранок!', createdAt });
    expect(result).toEqual({
      ok: true,
      value: {
        id: 't-1',
        title: 'Ранок',
        content: 'Добрий ранок!',
        difficulty: 'beginner',
        tags: [],
        createdAt,
        source: 'manual',
      },
    });
  });

  it('drops blank tags', () => {
    const result = validateText({ id: 't-1', title: 'Ранок', content: '', createdAt, tags: [' ранок ', ' '] });
    expect(result.ok && result.value.tags).toEqual(['ранок']);
  });

  it('reports the failing field', () => {
    const result = validateText({ id: 't-1', title: 'Ранок', content: '', createdAt, difficulty: 'expert' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.startsWith('difficulty: ')).toBe(true);
    }
  });
});

describe('validateWordList', () => {
  it('accepts entries with null notes', () => {
    const result = validateWordList({
      id: 'w-1',
      title: 'Food Vocabulary',
      words: [{ word: 'хліб', translation: 'bread', notes: null }],
      createdAt,
    });
    expect(result).toEqual({
      ok: true,
      value: {
        id: 'w-1',
        title: 'Food Vocabulary',
        theme: 'general',
        words: [{ word: 'хліб', translation: 'bread', notes: undefined }],
        createdAt,
      },
    });
  });

  it('rejects a missing createdAt', () => {
    const result = validateWordList({ id: 'w-1', title: 'Food', words: [] });
    expect(result).toEqual({ ok: false, errors: ['createdAt: Required'] });
  });
});

describe('validateGrammarNote', () => {
  it('rejects an empty title', () => {
    const result = validateGrammarNote({ id: 'g-1', title: '', content: 'x', createdAt });
    expect(result.ok).toBe(false);
  });
});

describe('content summaries', () => {
  it('describes each content type', () => {
    expect(
      describeText({
        id: 't-1',
        title: 'Ранок',
        content: '',
        difficulty: 'intermediate',
        tags: [],
        createdAt,
        source: 'manual',
      }),
    ).toEqual({ id: 't-1', title: 'Ранок', subtitle: 'intermediate' });

    expect(
      describeWordList({
        id: 'w-1',
        title: 'Food Vocabulary',
        theme: 'food',
        words: [{ word: 'хліб', translation: 'bread' }],
        createdAt,
      }),
    ).toEqual({ id: 'w-1', title: 'Food Vocabulary', subtitle: 'food (1 words)' });

    const note = { id: 'g-1', title: 'Cases', content: '', createdAt };
    expect(describeGrammarNote({ ...note, tags: ['a', 'b', 'c', 'd'] }).subtitle).toBe('a, b, c');
    expect(describeGrammarNote({ ...note, tags: [] }).subtitle).toBe('no tags');
  });
});
