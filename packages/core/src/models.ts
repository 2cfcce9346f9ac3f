export type WordStage = 'new' | 'learning' | 'known';
export type Difficulty = 'beginner' | 'intermediate' | 'advanced';
export type TextSource = 'manual' | 'ai_generated';

export type Word = {
  word: string;
  stage: WordStage;
  translation?: string;
  notes?: string;
  addedAt: string;
  updatedAt: string;
};

export type WordEntry = {
  word: string;
  translation: string;
  notes?: string;
};

export type Text = {
  id: string;
  title: string;
  content: string;
  difficulty: Difficulty;
  tags: string[];
  createdAt: string;
  source: TextSource;
};

export type WordList = {
  id: string;
  title: string;
  theme: string;
  words: WordEntry[];
  createdAt: string;
};

export type GrammarNote = {
  id: string;
  title: string;
  content: string;
  tags: string[];
  createdAt: string;
};

export type TextProgress = {
  textId: string;
  lastRead: string;
  timesRead: number;
};

export type VocabularyStats = Record<WordStage, number>;

/** Row shown in content browsers. */
export type ContentSummary = {
  id: string;
  title: string;
  subtitle: string;
};
