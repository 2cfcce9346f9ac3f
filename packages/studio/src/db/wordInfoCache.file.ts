/**
 * File-based cache of generated word/phrase explanations, keyed by lowercase trimmed text.
 */

import { readTable, updateTable } from './fileStore';
import { WordInfoRecordSchema, rowParser, type WordInfoType } from './types';

const TABLE_NAME = 'word_info_cache';
const parseRow = rowParser(WordInfoRecordSchema);

const lookupKey = (wordOrPhrase: string) => wordOrPhrase.toLowerCase().trim();

export async function getWordInfo(wordOrPhrase: string): Promise<string | null> {
  const key = lookupKey(wordOrPhrase);
  const rows = await readTable(TABLE_NAME, parseRow);
  return rows.find((r) => r.lookup_key === key)?.content ?? null;
}

export async function saveWordInfo(wordOrPhrase: string, infoType: WordInfoType, content: string): Promise<void> {
  const key = lookupKey(wordOrPhrase);
  const created_at = new Date().toISOString();
  await updateTable(TABLE_NAME, parseRow, (rows) => ({
    rows: [...rows.filter((r) => r.lookup_key !== key), { lookup_key: key, info_type: infoType, content, created_at }],
    result: undefined,
  }));
}

/** Returns the number of entries removed. */
export async function clearWordInfoCache(): Promise<number> {
  return updateTable(TABLE_NAME, parseRow, (rows) => ({ rows: [], result: rows.length }));
}
