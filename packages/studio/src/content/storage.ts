/**
 * JSON-per-item storage for texts, word lists and grammar notes: <data>/<kind>/<id>.json.
 * Files are validated on read; invalid ones are skipped when listing.
 */

import path from 'node:path';
import { validateGrammarNote, validateText, validateWordList } from '@slovnyk/core';
import type { Difficulty, GrammarNote, Text, ValidationResult, WordList } from '@slovnyk/core';
import { getContentDir } from '../db/paths';
import { fileExists, isNotFound, listFiles, readJson, removeFile, writeJsonAtomic } from '../db/fileStore';

export type ContentKind = 'texts' | 'wordlists' | 'grammar';

type StoredItem = { id: string; createdAt: string };

export type ContentStorage<T extends StoredItem> = {
  listAll: () => Promise<T[]>;
  get: (id: string) => Promise<T | null>;
  save: (item: T) => Promise<void>;
  delete: (id: string) => Promise<boolean>;
  exists: (id: string) => Promise<boolean>;
};

const SAFE_ID = /^[\w-]+$/;

async function readItem<T>(
  filePath: string,
  validate: (payload: unknown) => ValidationResult<T>,
): Promise<ValidationResult<T> | null> {
  try {
    return validate(await readJson(filePath));
  } catch (err) {
    if (isNotFound(err)) return null;
    if (err instanceof SyntaxError) return { ok: false, errors: [err.message] };
    throw err;
  }
}

export function createContentStorage<T extends StoredItem>(
  kind: ContentKind,
  validate: (payload: unknown) => ValidationResult<T>,
): ContentStorage<T> {
  const itemPath = (id: string) => path.join(getContentDir(kind), `${id}.json`);

  return {
    /** Newest first. */
    async listAll() {
      const items: T[] = [];
      for (const file of await listFiles(getContentDir(kind), '.json')) {
        const outcome = await readItem(file, validate);
        if (!outcome) continue;
        if (!outcome.ok) {
          console.warn('[content.storage] skipped_invalid', { kind, file, errors: outcome.errors });
          continue;
        }
        items.push(outcome.value);
      }
      return items.sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());
    },
    async get(id) {
      if (!SAFE_ID.test(id)) return null;
      const outcome = await readItem(itemPath(id), validate);
      return outcome?.ok ? outcome.value : null;
    },
    async save(item) {
      if (!SAFE_ID.test(item.id)) {
        throw new Error(`invalid_content_id:${item.id}`);
      }
      await writeJsonAtomic(itemPath(item.id), item);
    },
    async delete(id) {
      if (!SAFE_ID.test(id)) return false;
      return removeFile(itemPath(id));
    },
    async exists(id) {
      return SAFE_ID.test(id) && fileExists(itemPath(id));
    },
  };
}

export type TextStorage = ContentStorage<Text> & {
  listByDifficulty: (difficulty: Difficulty) => Promise<Text[]>;
  listByTag: (tag: string) => Promise<Text[]>;
};

export type WordListStorage = ContentStorage<WordList> & {
  listByTheme: (theme: string) => Promise<WordList[]>;
};

export type GrammarStorage = ContentStorage<GrammarNote> & {
  listByTag: (tag: string) => Promise<GrammarNote[]>;
};

export function createTextStorage(): TextStorage {
  const base = createContentStorage('texts', validateText);
  return {
    ...base,
    listByDifficulty: async (difficulty) => (await base.listAll()).filter((t) => t.difficulty === difficulty),
    listByTag: async (tag) => (await base.listAll()).filter((t) => t.tags.includes(tag)),
  };
}

export function createWordListStorage(): WordListStorage {
  const base = createContentStorage('wordlists', validateWordList);
  return {
    ...base,
    listByTheme: async (theme) => (await base.listAll()).filter((w) => w.theme === theme),
  };
}

export function createGrammarStorage(): GrammarStorage {
  const base = createContentStorage('grammar', validateGrammarNote);
  return {
    ...base,
    listByTag: async (tag) => (await base.listAll()).filter((g) => g.tags.includes(tag)),
  };
}
