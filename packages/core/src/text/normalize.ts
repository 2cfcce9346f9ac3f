const NONSPACING_MARKS = /\p{Mn}/gu;

/**
 * Remove stress marks and every other nonspacing combining character (category Mn).
 * Works on the NFD form and returns NFC, so `ме́не` becomes `мене`. Letters whose
 * decomposition carries a mark lose it too: `й` becomes `и`, `ї` becomes `і`.
 */
export function stripAccents(value: string): string {
  return value.normalize('NFD').replace(NONSPACING_MARKS, '').normalize('NFC');
}

/** Lookup key for a word: accent-stripped, lowercased. */
export function normalizeWord(word: string): string {
  return stripAccents(word).toLowerCase();
}
