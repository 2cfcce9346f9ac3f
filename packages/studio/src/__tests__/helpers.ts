import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach } from 'vitest';

/** Points SLOVNYK_DATA_DIR at a fresh temp dir for each test. Returns a getter for the current dir. */
export function useTempDataDir(): () => string {
  let dir = '';
  const previous = process.env.SLOVNYK_DATA_DIR;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'slovnyk-'));
    process.env.SLOVNYK_DATA_DIR = dir;
  });

  afterEach(async () => {
    if (previous === undefined) delete process.env.SLOVNYK_DATA_DIR;
    else process.env.SLOVNYK_DATA_DIR = previous;
    await fs.rm(dir, { recursive: true, force: true });
  });

  return () => dir;
}
