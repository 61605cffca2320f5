import type { Flashcard } from '../parse/types.ts';

export function formatText(cards: Flashcard[], elapsedMs: number): string {
  if (cards.length === 0) {
    return `0 cards (${elapsedMs}ms)`;
  }

  const lines = [
    `${cards.length} card${cards.length === 1 ? '' : 's'} (${elapsedMs}ms)`,
    '',
  ];

  for (let i = 0; i < cards.length; i++) {
    const c = cards[i]!;
    lines.push(`[${i + 1}] Q: ${c.question}`);
    lines.push(`    A: ${c.answer}`);
    if (i < cards.length - 1) lines.push('');
  }

  return lines.join('\n');
}
