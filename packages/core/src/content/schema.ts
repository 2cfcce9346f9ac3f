import { z } from 'zod';

export const WordStageSchema = z.enum(['new', 'learning', 'known']);
export const DifficultySchema = z.enum(['beginner', 'intermediate', 'advanced']);
export const TextSourceSchema = z.enum(['manual', 'ai_generated']);

const optionalNotes = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const WordEntrySchema = z.object({
  word: z.string().min(1),
  translation: z.string(),
  notes: optionalNotes,
});

export const TextSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  difficulty: DifficultySchema.default('beginner'),
  tags: z.array(z.string()).default([]),
  createdAt: z.string().datetime(),
  source: TextSourceSchema.default('manual'),
});

export const WordListSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  theme: z.string().min(1).default('general'),
  words: z.array(WordEntrySchema).default([]),
  createdAt: z.string().datetime(),
});

export const GrammarNoteSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  tags: z.array(z.string()).default([]),
  createdAt: z.string().datetime(),
});
