import { EXTRACTORS } from "./extractors.ts"
import type { Extractor, Flashcard } from "./types.ts"

export interface ParseOutcome {
  cards: Flashcard[]
  /** Name of the extractor that matched, or null when none did */
  format: string | null
}

/** Run extractors in priority order and keep the first non-empty result */
export function parseWithFormat(text: string, extractors: readonly Extractor[] = EXTRACTORS): ParseOutcome {
  if (!text.trim()) return { cards: [], format: null }
  for (const extractor of extractors) {
    const cards = extractor.extract(text)
    if (cards.length > 0) return { cards, format: extractor.name }
  }
  return { cards: [], format: null }
}

export function parseAny(text: string, extractors?: readonly Extractor[]): Flashcard[] {
  return parseWithFormat(text, extractors).cards
}
