import type { z } from 'zod';
import { GrammarNoteSchema, TextSchema, WordListSchema } from './schema';
import type { GrammarNote, Text, WordList } from '../models';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

const issuesOf = (error: z.ZodError) =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export function validateText(payload: unknown): ValidationResult<Text> {
  const parsed = TextSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: issuesOf(parsed.error) };
  }
  return {
    ok: true,
    value: { ...parsed.data, tags: parsed.data.tags.map((tag) => tag.trim()).filter(Boolean) },
  };
}

export function validateWordList(payload: unknown): ValidationResult<WordList> {
  const parsed = WordListSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: issuesOf(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

export function validateGrammarNote(payload: unknown): ValidationResult<GrammarNote> {
  const parsed = GrammarNoteSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: issuesOf(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}
