import type { Difficulty, GrammarNote, Text, WordList } from '@slovnyk/core';
import { createGrammarNote, createText, createWordList } from '../content/factory';
import type { WordInfoCache, WordInfoType } from '../db/types';
import type { ChatFn } from '../llm/chat';
import {
  SYSTEM_PROMPT,
  buildExplainWordPrompt,
  buildGrammarPrompt,
  buildLemmaAnalysisPrompt,
  buildPhraseInfoPrompt,
  buildTextPrompt,
  buildTranslatePrompt,
  buildWordInfoPrompt,
  buildWordListPrompt,
  type TextLength,
} from './prompts';
import { grammarTags, parseGeneratedText, parseWordListResponse, toTitleCase } from './parse';

export type ContentGenerator = {
  generateText: (topic: string, difficulty?: Difficulty, length?: TextLength) => Promise<Text>;
  generateWordList: (theme: string, count?: number) => Promise<WordList>;
  generateGrammarNote: (topic: string) => Promise<GrammarNote>;
  explainWord: (word: string, context?: string) => Promise<string>;
  translateWord: (word: string) => Promise<string>;
  getWordInfo: (word: string, context?: string) => Promise<string>;
  getPhraseInfo: (phrase: string, context?: string) => Promise<string>;
  analyzeTextVocabulary: (words: string[]) => Promise<string>;
};

export type ContentGeneratorOptions = {
  /** When set, word and phrase info are served from and written to this cache. */
  cache?: WordInfoCache;
};

/**
 * Learning content produced by an LLM. Lemma grouping stays on the model side:
 * `analyzeTextVocabulary` returns its raw answer (see parseLemmaGroups).
 */
export function createContentGenerator(chat: ChatFn, options: ContentGeneratorOptions = {}): ContentGenerator {
  const { cache } = options;

  const ask = (prompt: string, maxTokens: number) => chat({ prompt, system: SYSTEM_PROMPT, maxTokens });

  async function cachedInfo(key: string, infoType: WordInfoType, prompt: string): Promise<string> {
    const hit = await cache?.getWordInfo(key);
    if (hit) return hit;
    const content = await ask(prompt, 1500);
    await cache?.saveWordInfo(key, infoType, content);
    return content;
  }

  return {
    async generateText(topic, difficulty = 'beginner', length = 'short') {
      const response = await ask(buildTextPrompt(topic, difficulty, length), 2000);
      const { title, content } = parseGeneratedText(response, topic);
      return createText({
        title,
        content,
        difficulty,
        tags: [topic.toLowerCase()],
        source: 'ai_generated',
      });
    },

    async generateWordList(theme, count = 20) {
      const response = await ask(buildWordListPrompt(theme, count), 3000);
      const words = parseWordListResponse(response);
      if (words.length === 0) {
        console.warn('[generator.word_list] no_entries_parsed', { theme, excerpt: response.slice(0, 120) });
      }
      return createWordList({
        title: `${toTitleCase(theme)} Vocabulary`,
        theme: theme.toLowerCase(),
        words,
      });
    },

    async generateGrammarNote(topic) {
      const content = await ask(buildGrammarPrompt(topic), 3000);
      return createGrammarNote({ title: toTitleCase(topic), content, tags: grammarTags(topic) });
    },

    explainWord: (word, context) => ask(buildExplainWordPrompt(word, context), 1000),

    translateWord: async (word) => (await ask(buildTranslatePrompt(word), 50)).trim(),

    getWordInfo: (word, context) => cachedInfo(word, 'word', buildWordInfoPrompt(word, context)),

    getPhraseInfo: (phrase, context) => cachedInfo(phrase, 'phrase', buildPhraseInfoPrompt(phrase, context)),

    analyzeTextVocabulary: (words) => ask(buildLemmaAnalysisPrompt(words), 4000),
  };
}
