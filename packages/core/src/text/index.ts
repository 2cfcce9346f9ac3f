export type { Token, AnnotatedToken, AnnotatedText, StageSet, VocabularySummary } from './types';
export { stripAccents, normalizeWord } from './normalize';
export { tokenize, extractWords, countWords } from './tokenizer';
export { resolveStage, annotate, getWordTokens, getUniqueWords } from './annotate';
export { iterLinesAnnotated } from './lines';
export { calculateKnownPercentage, getUnknownWords, summarizeVocabulary } from './aggregate';
