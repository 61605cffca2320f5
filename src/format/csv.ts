import type { Flashcard } from '../parse/types.ts';

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** front,back CSV with a header row, the layout most flashcard apps import */
export function formatCsv(cards: Flashcard[]): string {
  const rows = ['front,back'];
  for (const c of cards) {
    rows.push(`${csvField(c.question)},${csvField(c.answer)}`);
  }
  return rows.join('\n') + '\n';
}
