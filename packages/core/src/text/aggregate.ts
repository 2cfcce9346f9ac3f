import { resolveStage } from './annotate';
import { extractWords } from './tokenizer';
import type { StageSet, VocabularySummary } from './types';

const percentage = (part: number, total: number) => (total === 0 ? 0 : (part / total) * 100);

const unknownOf = (words: Iterable<string>, known: StageSet, learning: StageSet) =>
  [...new Set(words)].filter((word) => !known.has(word) && !learning.has(word)).sort();

/** Share of word tokens (not unique words) that are known, 0–100. Text without words gives 0. */
export function calculateKnownPercentage(text: string, known: StageSet): number {
  const words = extractWords(text);
  const knownCount = words.filter((word) => known.has(word)).length;
  return percentage(knownCount, words.length);
}

/** Unique normalized words found in neither set, sorted ascending. */
export function getUnknownWords(text: string, known: StageSet, learning: StageSet): string[] {
  return unknownOf(extractWords(text), known, learning);
}

export function summarizeVocabulary(
  text: string,
  known: StageSet,
  learning: StageSet,
): VocabularySummary {
  const words = extractWords(text);
  const counts = { known: 0, learning: 0, new: 0 };
  for (const word of words) {
    counts[resolveStage(word, known, learning)] += 1;
  }

  return {
    totalWords: words.length,
    uniqueWords: new Set(words).size,
    knownCount: counts.known,
    learningCount: counts.learning,
    newCount: counts.new,
    knownPercentage: percentage(counts.known, words.length),
    unknownWords: unknownOf(words, known, learning),
  };
}
