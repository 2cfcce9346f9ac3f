/**
 * File-based VocabularyStore. One NDJSON row per normalized word.
 */

import { normalizeWord } from '@slovnyk/core';
import type { VocabularyStats, Word, WordStage } from '@slovnyk/core';
import { readTable, updateTable } from './fileStore';
import { WordRecordSchema, rowParser, type WordRecordV1 } from './types';

const TABLE_NAME = 'words';
const parseRow = rowParser(WordRecordSchema);

const loadRows = () => readTable(TABLE_NAME, parseRow);

function toWord(row: WordRecordV1): Word {
  return {
    word: row.word,
    stage: row.stage,
    translation: row.translation ?? undefined,
    notes: row.notes ?? undefined,
    addedAt: row.added_at,
    updatedAt: row.updated_at,
  };
}

const byUpdatedDesc = (a: WordRecordV1, b: WordRecordV1) =>
  new Date(b.updated_at).getTime() - new Date(a.updated_at).getTime();

type Upsert = (existing: WordRecordV1 | undefined, now: string) => WordRecordV1;

/** Insert or update rows by normalized word inside one locked write. */
async function upsertWords(words: string[], build: (key: string) => Upsert): Promise<void> {
  const now = new Date().toISOString();
  await updateTable(TABLE_NAME, parseRow, (rows) => {
    const byWord = new Map(rows.map((row) => [row.word, row]));
    for (const word of words) {
      const key = normalizeWord(word.trim());
      if (!key) continue;
      byWord.set(key, build(key)(byWord.get(key), now));
    }
    return { rows: [...byWord.values()], result: undefined };
  });
}

const stageUpsert =
  (stage: WordStage) =>
  (key: string): Upsert =>
  (existing, now) =>
    existing
      ? { ...existing, stage, updated_at: now }
      : { word: key, stage, translation: null, notes: null, added_at: now, updated_at: now };

export async function getWord(word: string): Promise<Word | null> {
  const key = normalizeWord(word.trim());
  const row = (await loadRows()).find((r) => r.word === key);
  return row ? toWord(row) : null;
}

export async function getWordsByStage(stage: WordStage): Promise<Word[]> {
  const rows = (await loadRows()).filter((r) => r.stage === stage);
  return rows.sort(byUpdatedDesc).map(toWord);
}

export async function getAllWords(): Promise<Word[]> {
  return (await loadRows()).sort(byUpdatedDesc).map(toWord);
}

async function wordsAtStage(stage: WordStage): Promise<Set<string>> {
  const rows = await loadRows();
  return new Set(rows.filter((r) => r.stage === stage).map((r) => r.word));
}

export function getKnownWordsSet(): Promise<Set<string>> {
  return wordsAtStage('known');
}

export function getLearningWordsSet(): Promise<Set<string>> {
  return wordsAtStage('learning');
}

/** Upsert a full word. Absent translation/notes keep the stored value; stage is overwritten. */
export async function saveWord(word: Word): Promise<void> {
  await upsertWords([word.word], (key) => (existing, now) => ({
    word: key,
    stage: word.stage,
    translation: word.translation ?? existing?.translation ?? null,
    notes: word.notes ?? existing?.notes ?? null,
    added_at: existing?.added_at ?? word.addedAt,
    updated_at: now,
  }));
}

export async function setWordStage(word: string, stage: WordStage): Promise<void> {
  await upsertWords([word], stageUpsert(stage));
}

export async function bulkSetStage(words: string[], stage: WordStage): Promise<void> {
  await upsertWords(words, stageUpsert(stage));
}

/** New words start at stage `new`; existing words keep their stage. */
export async function setWordTranslation(word: string, translation: string, notes?: string): Promise<void> {
  await upsertWords([word], (key) => (existing, now) =>
    existing
      ? { ...existing, translation, notes: notes ?? existing.notes, updated_at: now }
      : { word: key, stage: 'new', translation, notes: notes ?? null, added_at: now, updated_at: now },
  );
}

export async function deleteWord(word: string): Promise<boolean> {
  const key = normalizeWord(word.trim());
  return updateTable(TABLE_NAME, parseRow, (rows) => {
    const remaining = rows.filter((r) => r.word !== key);
    return { rows: remaining, result: remaining.length !== rows.length };
  });
}

export async function getVocabularyStats(): Promise<VocabularyStats> {
  const stats: VocabularyStats = { new: 0, learning: 0, known: 0 };
  for (const row of await loadRows()) {
    stats[row.stage] += 1;
  }
  return stats;
}
