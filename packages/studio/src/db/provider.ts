/**
 * Single provider for stores. Always file-based for now; a SQL-backed store would plug in here.
 */

import type { ProgressStore, VocabularyStore, WordInfoCache } from './types';
import * as vocabularyFile from './vocabularyStore.file';
import * as progressFile from './progressStore.file';
import * as wordInfoFile from './wordInfoCache.file';

export function getVocabularyStore(): VocabularyStore {
  return {
    getWord: vocabularyFile.getWord,
    getWordsByStage: vocabularyFile.getWordsByStage,
    getAllWords: vocabularyFile.getAllWords,
    getKnownWordsSet: vocabularyFile.getKnownWordsSet,
    getLearningWordsSet: vocabularyFile.getLearningWordsSet,
    saveWord: vocabularyFile.saveWord,
    setWordStage: vocabularyFile.setWordStage,
    bulkSetStage: vocabularyFile.bulkSetStage,
    setWordTranslation: vocabularyFile.setWordTranslation,
    deleteWord: vocabularyFile.deleteWord,
    getVocabularyStats: vocabularyFile.getVocabularyStats,
  };
}

export function getProgressStore(): ProgressStore {
  return {
    getTextProgress: progressFile.getTextProgress,
    recordTextRead: progressFile.recordTextRead,
  };
}

export function getWordInfoCache(): WordInfoCache {
  return {
    getWordInfo: wordInfoFile.getWordInfo,
    saveWordInfo: wordInfoFile.saveWordInfo,
    clearWordInfoCache: wordInfoFile.clearWordInfoCache,
  };
}
