import { countWords } from '@slovnyk/core';
import type { WordEntry } from '@slovnyk/core';

export type LemmaGroup = {
  lemma: string;
  translation: string;
  partOfSpeech: string;
  forms: string[];
};

const splitColumns = (line: string) => line.split('|').map((part) => part.trim());

const usefulLines = (response: string) =>
  response
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));

const trimListMarker = (value: string) => value.replace(/^[-\s]+|[-\s]+$/g, '');

/** `TITLE: ...\n---\n<content>`; anything else is all content under the fallback title. */
export function parseGeneratedText(response: string, fallbackTitle: string): { title: string; content: string } {
  const separator = response.indexOf('---');
  if (!response.includes('TITLE:') || separator === -1) {
    return { title: fallbackTitle, content: response.trim() };
  }
  const title = response.slice(0, separator).replace('TITLE:', '').trim();
  return {
    title: title || fallbackTitle,
    content: response.slice(separator + 3).trim(),
  };
}

/** `WORD | TRANSLATION | NOTES` lines. A line needs at least two columns and a non-empty word. */
export function parseWordListResponse(response: string): WordEntry[] {
  const entries: WordEntry[] = [];
  for (const line of usefulLines(response)) {
    const columns = splitColumns(line);
    if (columns.length < 2) continue;
    const [rawWord = '', translation = '', notes = ''] = columns;
    const word = trimListMarker(rawWord);
    if (!word) continue;
    entries.push(notes ? { word, translation, notes } : { word, translation });
  }
  return entries;
}

/** `LEMMA | translation | part of speech | forms: a, b` lines. */
export function parseLemmaGroups(response: string): LemmaGroup[] {
  const groups: LemmaGroup[] = [];
  for (const line of usefulLines(response)) {
    const [rawLemma = '', translation = '', partOfSpeech = '', rawForms = ''] = splitColumns(line);
    const lemma = trimListMarker(rawLemma);
    if (!translation || countWords(lemma) === 0) continue;
    const forms = rawForms
      .replace(/^forms:/i, '')
      .split(',')
      .map((form) => form.trim())
      .filter(Boolean);
    groups.push({ lemma, translation, partOfSpeech, forms });
  }
  return groups;
}

/** Capitalise the first letter of every word, lowercase the rest. */
export function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/** Lowercased topic words longer than three characters. */
export function grammarTags(topic: string): string[] {
  return topic
    .split(/\s+/)
    .filter((word) => word.length > 3)
    .map((word) => word.toLowerCase());
}
