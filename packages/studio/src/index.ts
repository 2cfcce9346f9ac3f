export * from './db/types';
export { getDataRoot, getContentDir } from './db/paths';
export { getVocabularyStore, getProgressStore, getWordInfoCache } from './db/provider';
export * from './vocabulary/manager';
export * from './content/factory';
export * from './content/storage';
export * from './content/manager';
export * from './llm/client';
export * from './llm/chat';
export * from './generator/prompts';
export * from './generator/parse';
export * from './generator/contentGenerator';
