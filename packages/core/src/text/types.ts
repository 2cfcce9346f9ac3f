import type { WordStage } from '../models';

export type Token = {
  /** Exact substring of the source. */
  text: string;
  /** UTF-16 offset of the first code unit. */
  start: number;
  /** Exclusive end offset. */
  end: number;
  isWord: boolean;
};

export type AnnotatedToken = Token & {
  stage: WordStage;
};

export type AnnotatedText = {
  original: string;
  tokens: AnnotatedToken[];
};

/** Read-only snapshot of normalized words at one stage. */
export type StageSet = ReadonlySet<string>;

export type VocabularySummary = {
  totalWords: number;
  uniqueWords: number;
  knownCount: number;
  learningCount: number;
  newCount: number;
  knownPercentage: number;
  unknownWords: string[];
};
