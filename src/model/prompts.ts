// Short and strict; tends to work well with small instruct models
export const SYSTEM_PROMPT =
  "you create high-quality study flashcards from user notes. " +
  "ask clear, testable questions and give short, precise answers only from the notes. " +
  "prefer why/how/compare when useful. if not in notes, write 'not found in notes'. " +
  "return exactly N flashcards."

/** Appended to the user prompt for the single retry */
export const STRICT_TSV_SUFFIX = "\nRespond TSV only: question\\tanswer per line; no extra text."

/** Several formats are shown as acceptable, but TSV is asked for strongly */
export function buildUserPrompt(corpus: string, count: number): string {
  return (
    `notes (compressed excerpts):\n---\n${corpus}\n---\n\n` +
    `create exactly ${count} flashcards about the core ideas. keep answers 1–2 sentences.\n` +
    "preferred output: one line per card, tab-separated -> question\tanswer\n" +
    "acceptable fallback formats if needed: 'Q: ... A: ...' on one line OR two lines.\n" +
    "do not add numbering, bullets, headers, or extra commentary."
  )
}

/** Room for every card but no more than the request needs */
export function completionBudget(count: number): number {
  return Math.min(1200, 45 * Math.max(1, count))
}
