import type { Flashcard } from "./types.ts"

export const QUESTION_LABEL = /^\s*(q(uestion)?[:\-]\s*)/i
export const ANSWER_LABEL = /^\s*(a(nswer)?[:\-]\s*)/i
/** "1) ", "2. ", "3- ", "- ", "• ", "* " and the like */
export const LIST_MARKER = /^\s*[\-\u2022*]?\s*(\d+[).\-:]|-|\u2022|\*)\s*/

/** Strip list markup and a redundant Q:/A: label, then collapse whitespace */
export function cleanPiece(s: string): string {
  return s
    .trim()
    .replace(LIST_MARKER, "")
    .replace(QUESTION_LABEL, "")
    .replace(ANSWER_LABEL, "")
    .replace(/\s+/g, " ")
    .trim()
}

/** Clean both sides; null when either ends up empty */
export function makeCard(question: string, answer: string): Flashcard | null {
  const q = cleanPiece(question)
  const a = cleanPiece(answer)
  if (!q || !a) return null
  return { question: q, answer: a, sourceChunk: 0 }
}
