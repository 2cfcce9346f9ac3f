/**
 * Data root. Everything Slovnyk stores lives under SLOVNYK_DATA_DIR (default: ./data).
 * Resolved on every call so tests and callers can repoint it.
 */

import path from 'node:path';

export function getDataRoot(): string {
  const fromEnv = (process.env.SLOVNYK_DATA_DIR ?? '').trim();
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(process.cwd(), 'data');
}

export function getDbTablesPath(): string {
  return path.join(getDataRoot(), 'db', 'tables');
}

export function getContentDir(kind: 'texts' | 'wordlists' | 'grammar'): string {
  return path.join(getDataRoot(), kind);
}
