import {
  annotate,
  iterLinesAnnotated,
  normalizeWord,
  resolveStage,
  summarizeVocabulary,
} from '@slovnyk/core';
import type {
  AnnotatedText,
  AnnotatedToken,
  StageSet,
  VocabularyStats,
  VocabularySummary,
  Word,
  WordStage,
} from '@slovnyk/core';
import { getVocabularyStore } from '../db/provider';
import type { VocabularyStore } from '../db/types';

export type VocabularyManager = {
  getKnownWords: () => Promise<StageSet>;
  getLearningWords: () => Promise<StageSet>;
  getStage: (word: string) => Promise<WordStage>;
  getWord: (word: string) => Promise<Word | null>;
  setStage: (word: string, stage: WordStage) => Promise<void>;
  bulkSetStage: (words: string[], stage: WordStage) => Promise<void>;
  markKnown: (word: string) => Promise<void>;
  markLearning: (word: string) => Promise<void>;
  setTranslation: (word: string, translation: string, notes?: string) => Promise<void>;
  addWord: (word: Word) => Promise<void>;
  deleteWord: (word: string) => Promise<boolean>;
  getWordsByStage: (stage: WordStage) => Promise<Word[]>;
  getAllWords: () => Promise<Word[]>;
  getQuizWords: (count?: number) => Promise<Word[]>;
  getStats: () => Promise<VocabularyStats>;
  annotateText: (text: string) => Promise<AnnotatedText>;
  iterTextLines: (text: string) => Promise<Generator<AnnotatedToken[], void, undefined>>;
  summarizeText: (text: string) => Promise<VocabularySummary>;
};

/**
 * Vocabulary on top of a store, with cached known/learning snapshots.
 * Every mutation drops the snapshots so the next annotation sees fresh sets.
 */
export function createVocabularyManager(store: VocabularyStore = getVocabularyStore()): VocabularyManager {
  let knownCache: Set<string> | null = null;
  let learningCache: Set<string> | null = null;
  // Bumped on every invalidation; a fetch that started earlier is returned but not cached.
  let generation = 0;

  const invalidate = () => {
    knownCache = null;
    learningCache = null;
    generation += 1;
  };

  const getKnownWords = async (): Promise<StageSet> => {
    if (knownCache) return knownCache;
    const startedAt = generation;
    const fresh = await store.getKnownWordsSet();
    if (startedAt === generation) knownCache = fresh;
    return fresh;
  };

  const getLearningWords = async (): Promise<StageSet> => {
    if (learningCache) return learningCache;
    const startedAt = generation;
    const fresh = await store.getLearningWordsSet();
    if (startedAt === generation) learningCache = fresh;
    return fresh;
  };

  const snapshots = async () => Promise.all([getKnownWords(), getLearningWords()]);

  const setStage = async (word: string, stage: WordStage) => {
    await store.setWordStage(word, stage);
    invalidate();
  };

  return {
    getKnownWords,
    getLearningWords,
    async getStage(word) {
      const [known, learning] = await snapshots();
      return resolveStage(normalizeWord(word.trim()), known, learning);
    },
    getWord: (word) => store.getWord(word),
    setStage,
    async bulkSetStage(words, stage) {
      await store.bulkSetStage(words, stage);
      invalidate();
    },
    markKnown: (word) => setStage(word, 'known'),
    markLearning: (word) => setStage(word, 'learning'),
    // Translations don't change stages, so the snapshots stay valid.
    setTranslation: (word, translation, notes) => store.setWordTranslation(word, translation, notes),
    async addWord(word) {
      await store.saveWord(word);
      invalidate();
    },
    async deleteWord(word) {
      const removed = await store.deleteWord(word);
      if (removed) invalidate();
      return removed;
    },
    getWordsByStage: (stage) => store.getWordsByStage(stage),
    getAllWords: () => store.getAllWords(),
    /** Learning words first, topped up with known words for review; only words with a translation. */
    async getQuizWords(count = 10) {
      const [learning, known] = await Promise.all([
        store.getWordsByStage('learning'),
        store.getWordsByStage('known'),
      ]);
      const withTranslation = (words: Word[]) => words.filter((w) => Boolean(w.translation));
      const picked = withTranslation(learning).slice(0, count);
      return [...picked, ...withTranslation(known).slice(0, count - picked.length)];
    },
    getStats: () => store.getVocabularyStats(),
    async annotateText(text) {
      const [known, learning] = await snapshots();
      return annotate(text, known, learning);
    },
    async iterTextLines(text) {
      const [known, learning] = await snapshots();
      return iterLinesAnnotated(text, known, learning);
    },
    async summarizeText(text) {
      const [known, learning] = await snapshots();
      return summarizeVocabulary(text, known, learning);
    },
  };
}
