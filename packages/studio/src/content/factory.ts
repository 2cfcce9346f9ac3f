import { randomUUID } from 'node:crypto';
import type { Difficulty, GrammarNote, Text, TextSource, WordEntry, WordList } from '@slovnyk/core';

export function createText(input: {
  title: string;
  content: string;
  difficulty?: Difficulty;
  tags?: string[];
  source?: TextSource;
}): Text {
  return {
    id: randomUUID(),
    title: input.title,
    content: input.content,
    difficulty: input.difficulty ?? 'beginner',
    tags: input.tags ?? [],
    createdAt: new Date().toISOString(),
    source: input.source ?? 'manual',
  };
}

export function createWordList(input: { title: string; theme: string; words?: WordEntry[] }): WordList {
  return {
    id: randomUUID(),
    title: input.title,
    theme: input.theme,
    words: input.words ?? [],
    createdAt: new Date().toISOString(),
  };
}

export function createGrammarNote(input: { title: string; content: string; tags?: string[] }): GrammarNote {
  return {
    id: randomUUID(),
    title: input.title,
    content: input.content,
    tags: input.tags ?? [],
    createdAt: new Date().toISOString(),
  };
}
