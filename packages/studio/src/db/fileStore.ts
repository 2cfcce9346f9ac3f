/**
 * NDJSON tables and JSON files. Atomic writes (write temp -> rename).
 * In-process mutex per table so overlapping calls don't lose updates.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getDbTablesPath } from './paths';

const tableLocks = new Map<string, Promise<void>>();

/** Serialize read-modify-write cycles per table. */
export async function withTableLock<T>(tableName: string, fn: () => Promise<T>): Promise<T> {
  const prev = tableLocks.get(tableName) ?? Promise.resolve();
  let release: () => void = () => {};
  const next = new Promise<void>((r) => {
    release = r;
  });
  tableLocks.set(tableName, next);
  await prev;
  try {
    return await fn();
  } finally {
    release();
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function readNdjson(filePath: string): Promise<unknown[]> {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    const lines = raw.split('\n').map((l) => l.trim()).filter(Boolean);
    return lines.map((line): unknown => JSON.parse(line));
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

async function writeAtomic(filePath: string, payload: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await fs.writeFile(tmpPath, payload, 'utf-8');
  await fs.rename(tmpPath, filePath);
}

export async function writeNdjsonAtomic(filePath: string, rows: readonly unknown[]): Promise<void> {
  const payload = rows.map((r) => JSON.stringify(r)).join('\n') + (rows.length ? '\n' : '');
  await writeAtomic(filePath, payload);
}

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => path.join(dirPath, entry.name))
      .sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function tablePath(tableName: string): string {
  return path.join(getDbTablesPath(), `${tableName}.ndjson`);
}

/** Read a table, keeping only rows that match `parse`. */
export async function readTable<T>(tableName: string, parse: (row: unknown) => T | null): Promise<T[]> {
  const rows = await readNdjson(tablePath(tableName));
  return rows.flatMap((row) => {
    const parsed = parse(row);
    return parsed === null ? [] : [parsed];
  });
}

/** Locked read-modify-write of a whole table. */
export async function updateTable<T, R>(
  tableName: string,
  parse: (row: unknown) => T | null,
  fn: (rows: T[]) => { rows: T[]; result: R },
): Promise<R> {
  return withTableLock(tableName, async () => {
    const current = await readTable(tableName, parse);
    const { rows, result } = fn(current);
    await writeNdjsonAtomic(tablePath(tableName), rows);
    return result;
  });
}
