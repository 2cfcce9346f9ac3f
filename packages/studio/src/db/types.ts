/**
 * Stored row shapes (snake_case, one JSON object per NDJSON line) and the store contracts.
 */

import { z } from 'zod';
import { WordStageSchema } from '@slovnyk/core';
import type { TextProgress, VocabularyStats, Word, WordStage } from '@slovnyk/core';

export const WordRecordSchema = z.object({
  word: z.string().min(1),
  stage: WordStageSchema,
  translation: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  added_at: z.string(),
  updated_at: z.string(),
});
export type WordRecordV1 = z.infer<typeof WordRecordSchema>;

export const TextProgressRecordSchema = z.object({
  text_id: z.string().min(1),
  last_read: z.string(),
  times_read: z.number().int().positive(),
});
export type TextProgressRecordV1 = z.infer<typeof TextProgressRecordSchema>;

export const WordInfoTypeSchema = z.enum(['word', 'phrase']);
export type WordInfoType = z.infer<typeof WordInfoTypeSchema>;

export const WordInfoRecordSchema = z.object({
  lookup_key: z.string().min(1),
  info_type: WordInfoTypeSchema,
  content: z.string(),
  created_at: z.string(),
});
export type WordInfoRecordV1 = z.infer<typeof WordInfoRecordSchema>;

/** Row parser for readTable/updateTable: invalid or partial rows are dropped. */
export function rowParser<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): (row: unknown) => T | null {
  return (row) => {
    const parsed = schema.safeParse(row);
    return parsed.success ? parsed.data : null;
  };
}

export type VocabularyStore = {
  getWord: (word: string) => Promise<Word | null>;
  getWordsByStage: (stage: WordStage) => Promise<Word[]>;
  getAllWords: () => Promise<Word[]>;
  getKnownWordsSet: () => Promise<Set<string>>;
  getLearningWordsSet: () => Promise<Set<string>>;
  saveWord: (word: Word) => Promise<void>;
  setWordStage: (word: string, stage: WordStage) => Promise<void>;
  bulkSetStage: (words: string[], stage: WordStage) => Promise<void>;
  setWordTranslation: (word: string, translation: string, notes?: string) => Promise<void>;
  deleteWord: (word: string) => Promise<boolean>;
  getVocabularyStats: () => Promise<VocabularyStats>;
};

export type ProgressStore = {
  getTextProgress: (textId: string) => Promise<TextProgress | null>;
  recordTextRead: (textId: string) => Promise<void>;
};

export type WordInfoCache = {
  getWordInfo: (wordOrPhrase: string) => Promise<string | null>;
  saveWordInfo: (wordOrPhrase: string, infoType: WordInfoType, content: string) => Promise<void>;
  clearWordInfoCache: () => Promise<number>;
};
