import { z } from "zod"
import { ANSWER_LABEL, LIST_MARKER, QUESTION_LABEL, makeCard } from "./clean.ts"
import type { Extractor, Flashcard } from "./types.ts"

function lines(text: string): string[] {
  return text.split(/\r\n|\r|\n/)
}

/** question<TAB>answer, one card per line */
export const tsvExtractor: Extractor = {
  name: "tsv",
  extract(text) {
    const cards: Flashcard[] = []
    for (const raw of lines(text)) {
      const line = raw.trim()
      const tab = line.indexOf("\t")
      if (tab === -1) continue
      const card = makeCard(line.slice(0, tab), line.slice(tab + 1))
      if (card) cards.push(card)
    }
    return cards
  },
}

/** Split "Q: ... <label> ..." at the answer label; the question starts after the first colon */
function splitAtLabel(line: string, label: string): Flashcard | null {
  const at = line.indexOf(label)
  const colon = line.indexOf(":")
  if (at === -1 || colon === -1 || at <= colon) return null
  return makeCard(line.slice(colon + 1, at), line.slice(at + label.length))
}

/** "Q: ... A: ..." or "Question: ... Answer: ..." on a single line */
export const labeledLineExtractor: Extractor = {
  name: "labeled-line",
  extract(text) {
    const cards: Flashcard[] = []
    for (const raw of lines(text)) {
      const line = raw.trim()
      if (!line) continue
      const lower = line.toLowerCase()
      let card: Flashcard | null = null
      if (line.includes(" A:") && lower.startsWith("q:")) {
        card = splitAtLabel(line, " A:")
      } else if (line.includes(" Answer:") && (lower.startsWith("q:") || lower.startsWith("question:"))) {
        card = splitAtLabel(line, " Answer:")
      }
      if (card) cards.push(card)
    }
    return cards
  },
}

/**
 * A "Q:" line immediately followed by an "A:" line. A question line whose next
 * line is not an answer is skipped rather than re-paired with a later answer.
 */
export const labeledPairExtractor: Extractor = {
  name: "labeled-pair",
  extract(text) {
    const cards: Flashcard[] = []
    const nonEmpty = lines(text)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)

    let i = 0
    while (i < nonEmpty.length - 1) {
      const first = nonEmpty[i] ?? ""
      const second = nonEmpty[i + 1] ?? ""
      if (QUESTION_LABEL.test(first) && ANSWER_LABEL.test(second)) {
        const card = makeCard(first.replace(QUESTION_LABEL, ""), second.replace(ANSWER_LABEL, ""))
        if (card) cards.push(card)
        i += 2
      } else {
        i += 1
      }
    }
    return cards
  },
}

const PAIR_SEPARATORS = [" - ", " — ", " : ", " – "]

/** "1) Term - definition", "• Term: definition" and other list styles */
export const numberedExtractor: Extractor = {
  name: "numbered",
  extract(text) {
    const cards: Flashcard[] = []
    for (const raw of lines(text)) {
      const line = raw.trim().replace(LIST_MARKER, "")
      if (!line) continue
      const separator = PAIR_SEPARATORS.find((sep) => line.includes(sep))
      if (!separator) continue
      const at = line.indexOf(separator)
      const card = makeCard(line.slice(0, at), line.slice(at + separator.length))
      if (card) cards.push(card)
    }
    return cards
  },
}

const JsonCard = z.object({
  question: z.union([z.string(), z.number()]),
  answer: z.union([z.string(), z.number()]),
})

/** Parse the whole text, or failing that the outermost [...] inside it */
function parseLooseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    const start = text.indexOf("[")
    const end = text.lastIndexOf("]")
    if (start === -1 || end <= start) return undefined
    try {
      return JSON.parse(text.slice(start, end + 1))
    } catch {
      return undefined
    }
  }
}

/** [{"question": ..., "answer": ...}, ...], possibly wrapped in prose or code fences */
export const jsonExtractor: Extractor = {
  name: "json",
  extract(text) {
    const data = parseLooseJson(text)
    if (!Array.isArray(data)) return []

    const cards: Flashcard[] = []
    for (const item of data) {
      const parsed = JsonCard.safeParse(item)
      if (!parsed.success) continue
      const card = makeCard(String(parsed.data.question), String(parsed.data.answer))
      if (card) cards.push(card)
    }
    return cards
  },
}

/** Strictest format first */
export const EXTRACTORS: readonly Extractor[] = [
  tsvExtractor,
  labeledLineExtractor,
  labeledPairExtractor,
  numberedExtractor,
  jsonExtractor,
]
