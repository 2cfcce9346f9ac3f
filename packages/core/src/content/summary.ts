import type { ContentSummary, GrammarNote, Text, WordList } from '../models';

export function describeText(text: Text): ContentSummary {
  return { id: text.id, title: text.title, subtitle: text.difficulty };
}

export function describeWordList(list: WordList): ContentSummary {
  return { id: list.id, title: list.title, subtitle: `${list.theme} (${list.words.length} words)` };
}

export function describeGrammarNote(note: GrammarNote): ContentSummary {
  const subtitle = note.tags.length > 0 ? note.tags.slice(0, 3).join(', ') : 'no tags';
  return { id: note.id, title: note.title, subtitle };
}
