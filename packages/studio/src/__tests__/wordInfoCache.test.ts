import { describe, expect, it } from 'vitest';
import { clearWordInfoCache, getWordInfo, saveWordInfo } from '../db/wordInfoCache.file';
import { useTempDataDir } from './helpers';

useTempDataDir();

describe('word info cache', () => {
  it('misses on an empty cache', async () => {
    expect(await getWordInfo('слово')).toBeNull();
  });

  it('looks entries up by lowercase trimmed key', async () => {
    await saveWordInfo(' Добрий день ', 'phrase', 'Good day.');
    expect(await getWordInfo('добрий день')).toBe('Good day.');
    expect(await getWordInfo('ДОБРИЙ ДЕНЬ  ')).toBe('Good day.');
  });

  it('replaces an existing entry for the same key', async () => {
    await saveWordInfo('кіт', 'word', 'first');
    await saveWordInfo('Кіт', 'word', 'second');
    expect(await getWordInfo('кіт')).toBe('second');
    expect(await clearWordInfoCache()).toBe(1);
  });

  it('clears everything and reports how many entries went', async () => {
    await saveWordInfo('кіт', 'word', 'cat');
    await saveWordInfo('пес', 'word', 'dog');
    expect(await clearWordInfoCache()).toBe(2);
    expect(await getWordInfo('кіт')).toBeNull();
    expect(await clearWordInfoCache()).toBe(0);
  });
});
