import type { Flashcard } from "./parse/types.ts"

export interface ValidationResult {
  ok: boolean
  message: string
}

const MAX_QUESTION_CHARS = 600
const MAX_ANSWER_CHARS = 1500

/** Sanity checks before showing or exporting a deck */
export function validateCards(cards: Flashcard[]): ValidationResult {
  if (cards.length === 0) {
    return { ok: false, message: "no cards to show yet" }
  }
  if (cards.some((c) => c.question.length > MAX_QUESTION_CHARS)) {
    return { ok: false, message: `some questions are too long (>${MAX_QUESTION_CHARS} chars). try editing or regenerating.` }
  }
  if (cards.some((c) => c.answer.length > MAX_ANSWER_CHARS)) {
    return { ok: false, message: `some answers are very long (>${MAX_ANSWER_CHARS} chars). consider trimming.` }
  }
  if (cards.some((c) => !c.question.trim() || !c.answer.trim())) {
    return { ok: false, message: "found empty question/answer cells. fill or delete them before exporting." }
  }
  return { ok: true, message: "ok" }
}
