import type { WordStage } from '../models';
import { normalizeWord } from './normalize';
import { tokenize } from './tokenizer';
import type { AnnotatedText, AnnotatedToken, StageSet } from './types';

/** Known beats learning beats new; a word listed in both sets resolves to known. */
export function resolveStage(normalized: string, known: StageSet, learning: StageSet): WordStage {
  if (known.has(normalized)) return 'known';
  if (learning.has(normalized)) return 'learning';
  return 'new';
}

/**
 * Tokenize `text` and attach a stage to each token.
 * Non-word tokens always get `new`; offsets are those of `tokenize`.
 */
export function annotate(text: string, known: StageSet, learning: StageSet): AnnotatedText {
  const tokens: AnnotatedToken[] = tokenize(text).map((token) => ({
    ...token,
    stage: token.isWord ? resolveStage(normalizeWord(token.text), known, learning) : 'new',
  }));
  return { original: text, tokens };
}

export function getWordTokens(annotated: AnnotatedText): AnnotatedToken[] {
  return annotated.tokens.filter((token) => token.isWord);
}

export function getUniqueWords(annotated: AnnotatedText): Set<string> {
  return new Set(getWordTokens(annotated).map((token) => normalizeWord(token.text)));
}
