import type { Flashcard } from '../parse/types.ts';

export interface JsonCard {
  question: string;
  answer: string;
  source_chunk: number;
}

export interface JsonOutput {
  cards: JsonCard[];
  total: number;
  elapsed_ms: number;
}

export function toJsonCards(cards: Flashcard[]): JsonCard[] {
  return cards.map((c) => ({
    question: c.question,
    answer: c.answer,
    source_chunk: c.sourceChunk,
  }));
}

export function formatJson(cards: Flashcard[], elapsedMs: number): string {
  const output: JsonOutput = {
    cards: toJsonCards(cards),
    total: cards.length,
    elapsed_ms: elapsedMs,
  };
  return JSON.stringify(output, null, 2);
}
