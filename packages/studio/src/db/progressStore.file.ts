/**
 * File-based ProgressStore: how often and when each text was read.
 */

import type { TextProgress } from '@slovnyk/core';
import { readTable, updateTable } from './fileStore';
import { TextProgressRecordSchema, rowParser } from './types';

const TABLE_NAME = 'text_progress';
const parseRow = rowParser(TextProgressRecordSchema);

export async function getTextProgress(textId: string): Promise<TextProgress | null> {
  const rows = await readTable(TABLE_NAME, parseRow);
  const row = rows.find((r) => r.text_id === textId);
  if (!row) return null;
  return { textId: row.text_id, lastRead: row.last_read, timesRead: row.times_read };
}

export async function recordTextRead(textId: string): Promise<void> {
  const now = new Date().toISOString();
  await updateTable(TABLE_NAME, parseRow, (rows) => {
    const existing = rows.find((r) => r.text_id === textId);
    const updated = existing
      ? { ...existing, last_read: now, times_read: existing.times_read + 1 }
      : { text_id: textId, last_read: now, times_read: 1 };
    return { rows: [...rows.filter((r) => r.text_id !== textId), updated], result: undefined };
  });
}
