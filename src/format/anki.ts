import type { Flashcard } from '../parse/types.ts';

/** Anki's plain-text import: one question<TAB>answer pair per line */
export function formatAnki(cards: Flashcard[]): string {
  return cards.map((c) => `${c.question}\t${c.answer}`).join('\n');
}
