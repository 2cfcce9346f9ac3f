import { describeGrammarNote, describeText, describeWordList } from '@slovnyk/core';
import type { ContentSummary, GrammarNote, Text, VocabularySummary, WordList } from '@slovnyk/core';
import { getProgressStore } from '../db/provider';
import type { ProgressStore } from '../db/types';
import { createVocabularyManager, type VocabularyManager } from '../vocabulary/manager';
import { createGrammarStorage, createTextStorage, createWordListStorage } from './storage';

export type ContentManager = {
  listTexts: () => Promise<ContentSummary[]>;
  getText: (id: string) => Promise<Text | null>;
  saveText: (text: Text) => Promise<void>;
  deleteText: (id: string) => Promise<boolean>;
  recordTextRead: (textId: string) => Promise<void>;
  getTextVocabulary: (textId: string) => Promise<VocabularySummary | null>;
  listWordLists: () => Promise<ContentSummary[]>;
  getWordList: (id: string) => Promise<WordList | null>;
  saveWordList: (list: WordList) => Promise<void>;
  deleteWordList: (id: string) => Promise<boolean>;
  addWordToList: (wordListId: string, word: string, translation: string, notes?: string) => Promise<boolean>;
  listGrammar: () => Promise<ContentSummary[]>;
  getGrammar: (id: string) => Promise<GrammarNote | null>;
  saveGrammar: (note: GrammarNote) => Promise<void>;
  deleteGrammar: (id: string) => Promise<boolean>;
  importWordListToVocabulary: (wordListId: string) => Promise<number>;
  lookupTranslation: (word: string) => Promise<string | null>;
};

export type ContentManagerDeps = {
  vocabulary?: VocabularyManager;
  progress?: ProgressStore;
};

const sameWord = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

/** Texts, word lists and grammar notes in one place, tied to the learner's vocabulary. */
export function createContentManager(deps: ContentManagerDeps = {}): ContentManager {
  const vocabulary = deps.vocabulary ?? createVocabularyManager();
  const progress = deps.progress ?? getProgressStore();
  const texts = createTextStorage();
  const wordLists = createWordListStorage();
  const grammar = createGrammarStorage();

  return {
    listTexts: async () => (await texts.listAll()).map(describeText),
    getText: (id) => texts.get(id),
    saveText: (text) => texts.save(text),
    deleteText: (id) => texts.delete(id),
    recordTextRead: (textId) => progress.recordTextRead(textId),
    async getTextVocabulary(textId) {
      const text = await texts.get(textId);
      return text ? vocabulary.summarizeText(text.content) : null;
    },

    listWordLists: async () => (await wordLists.listAll()).map(describeWordList),
    getWordList: (id) => wordLists.get(id),
    saveWordList: (list) => wordLists.save(list),
    deleteWordList: (id) => wordLists.delete(id),
    /** False when the list is missing or already has the word (case-insensitive). */
    async addWordToList(wordListId, word, translation, notes) {
      const list = await wordLists.get(wordListId);
      if (!list) return false;
      if (list.words.some((entry) => sameWord(entry.word, word))) return false;
      await wordLists.save({ ...list, words: [...list.words, { word, translation, notes }] });
      return true;
    },

    listGrammar: async () => (await grammar.listAll()).map(describeGrammarNote),
    getGrammar: (id) => grammar.get(id),
    saveGrammar: (note) => grammar.save(note),
    deleteGrammar: (id) => grammar.delete(id),

    async importWordListToVocabulary(wordListId) {
      const list = await wordLists.get(wordListId);
      if (!list) return 0;
      for (const entry of list.words) {
        await vocabulary.setTranslation(entry.word, entry.translation, entry.notes);
      }
      console.log('[content.import] word_list', { wordListId, count: list.words.length });
      return list.words.length;
    },

    /** First match across all word lists, newest list first. */
    async lookupTranslation(word) {
      for (const list of await wordLists.listAll()) {
        const entry = list.words.find((e) => sameWord(e.word, word));
        if (entry) return entry.translation;
      }
      return null;
    },
  };
}
