/**
 * Prompt builders for generated learning content. No I/O.
 */

import type { Difficulty } from '@slovnyk/core';

export type TextLength = 'short' | 'medium' | 'long';

export const SYSTEM_PROMPT = `You are a Ukrainian language teaching assistant.
You help create learning materials for English speakers learning Ukrainian.
Always provide accurate Ukrainian with proper grammar and spelling.
Use the Cyrillic alphabet for Ukrainian text.`;

const WORD_COUNTS: Record<TextLength, string> = {
  short: 'about 50',
  medium: 'about 150',
  long: 'about 300',
};

const DIFFICULTY_GUIDANCE: Record<Difficulty, string> = {
  beginner: 'Use simple sentences, common vocabulary, present tense mainly.',
  intermediate: 'Use varied sentence structures, past and future tenses, common idioms.',
  advanced: 'Use complex sentences, advanced vocabulary, all tenses, idiomatic expressions.',
};

const contextLine = (context?: string) => (context?.trim() ? `\nContext: "${context.trim()}"` : '');

export function buildTextPrompt(topic: string, difficulty: Difficulty, length: TextLength): string {
  return `Create a Ukrainian reading text about: ${topic}

Requirements:
- Length: ${WORD_COUNTS[length]} words
- Difficulty: ${difficulty}
- ${DIFFICULTY_GUIDANCE[difficulty]}

Format your response as:
TITLE: [A short Ukrainian title]
---
[The Ukrainian text content]

Do not include translations or explanations.`;
}

export function buildWordListPrompt(theme: string, count: number): string {
  return `Create a list of ${count} Ukrainian words for the theme: ${theme}

Format each word as:
WORD | TRANSLATION | NOTES

NOTES is optional grammatical info (part of speech, gender for nouns, aspect for verbs).

Example:
привіт | hello | greeting, informal
дякую | thank you | expression of gratitude

List ${count} words, one per line:`;
}

export function buildGrammarPrompt(topic: string): string {
  return `Explain this Ukrainian grammar topic for English speakers: ${topic}

Include:
1. A clear explanation of the concept
2. When and how it is used
3. Examples in Ukrainian with English translations
4. Common patterns or rules
5. Common mistakes to avoid

Use Ukrainian examples with translations in parentheses.`;
}

export function buildExplainWordPrompt(word: string, context?: string): string {
  return `Explain this Ukrainian word: ${word}${contextLine(context)}

Provide:
1. Translation(s) to English
2. Part of speech
3. For nouns: gender and example declensions
4. For verbs: aspect and example conjugations
5. An example sentence with translation
6. Related words or expressions`;
}

export function buildTranslatePrompt(word: string): string {
  return `Translate this Ukrainian word to English. Reply with ONLY the translation, nothing else: ${word}`;
}

export function buildWordInfoPrompt(word: string, context?: string): string {
  return `Provide detailed information about this Ukrainian word: ${word}${contextLine(context)}

Format your response exactly like this:

WORD: ${word}
PRONUNCIATION: [phonetic guide for English speakers]
PART OF SPEECH: [noun/verb/adjective/etc.]
GENDER: [for nouns: masculine/feminine/neuter, otherwise N/A]
ASPECT: [for verbs: imperfective/perfective, otherwise N/A]

DEFINITIONS:
1. [primary meaning]

EXAMPLES:
• [Ukrainian sentence] — [English translation]

RELATED WORDS:
• [related word] — [translation]

NOTES:
[Irregularities, common mistakes or usage tips]`;
}

export function buildPhraseInfoPrompt(phrase: string, context?: string): string {
  return `Provide detailed information about this Ukrainian phrase: ${phrase}${contextLine(context)}

Format your response exactly like this:

PHRASE: ${phrase}
LITERAL MEANING: [word-by-word translation]
ACTUAL MEANING: [what it really means]
TYPE: [idiom/expression/collocation/etc.]
REGISTER: [formal/informal/neutral/slang]

USAGE:
[When and how to use this phrase]

EXAMPLES:
• [Ukrainian sentence using the phrase] — [English translation]

NOTES:
[Cultural context, common mistakes or tips]`;
}

export function buildLemmaAnalysisPrompt(words: string[]): string {
  return `Analyze this list of Ukrainian words from a text. Group inflected forms under their dictionary form (lemma).

Words: ${words.join(', ')}

Format your response EXACTLY like this, one entry per line:
LEMMA | translation | part of speech | forms: form1, form2, ...

Example:
кіт | cat | noun (m) | forms: кота, коти, коту
бути | to be | verb | forms: є, був, була

Rules:
- List lemmas alphabetically
- For nouns, indicate gender: (m), (f), (n)
- For verbs, give the infinitive as lemma
- Every word from the input must appear under some lemma

Analyze ALL ${words.length} words:`;
}
