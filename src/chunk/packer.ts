import { splitCandidates } from "./split.ts"
import { getTokenizer } from "./tokenizer.ts"
import {
  DEFAULT_OVERLAP_TOKENS,
  DEFAULT_TARGET_TOKENS,
  OVERSIZE_FACTOR,
  type ChunkOptions,
} from "./types.ts"

const SEPARATOR = "\n\n"
const REPLACEMENT_CHAR = "\uFFFD"
// A byte-level BPE can spread one character over several tokens
const MAX_SNAP = 16

/**
 * Greedily pack units (sections, paragraphs or sentences) into chunks of about
 * `targetTokens` tokens. Every chunk after the first opens with the last
 * `overlapTokens` tokens of its predecessor. A unit too large to fit even with
 * slack is hard-split by token offsets, keeping the same overlap between pieces.
 * Cuts are moved to character boundaries so no piece carries a broken character.
 */
export function chunkText(text: string, opts?: ChunkOptions): string[] {
  const units = splitCandidates(text)
  if (units.length === 0) return []

  const tokenizer = opts?.tokenizer ?? getTokenizer()
  const target = Math.max(1, Math.floor(opts?.targetTokens ?? DEFAULT_TARGET_TOKENS))
  // overlap < target, otherwise hard splitting would never advance
  const overlap = Math.min(
    Math.max(0, Math.floor(opts?.overlapTokens ?? DEFAULT_OVERLAP_TOKENS)),
    target - 1,
  )
  const limit = target * OVERSIZE_FACTOR

  const chunks: string[] = []
  let current: string[] = []
  let currentTokens = 0

  /** Move `end` back until the slice no longer stops inside a character */
  function snapEnd(tokens: number[], start: number, end: number): number {
    for (let e = end; e > start && end - e <= MAX_SNAP; e--) {
      if (!tokenizer.decode(tokens.slice(start, e)).endsWith(REPLACEMENT_CHAR)) return e
    }
    return end
  }

  /** Move `start` forward until the slice no longer opens inside a character */
  function snapStart(tokens: number[], start: number, end: number): number {
    for (let s = start; s < end && s - start <= MAX_SNAP; s++) {
      const head = tokens.slice(s, Math.min(end, s + MAX_SNAP))
      if (!tokenizer.decode(head).startsWith(REPLACEMENT_CHAR)) return s
    }
    return start
  }

  function tailOf(chunk: string): string {
    if (overlap === 0) return ""
    const tokens = tokenizer.encode(chunk)
    const start = snapStart(tokens, Math.max(0, tokens.length - overlap), tokens.length)
    return tokenizer.decode(tokens.slice(start)).trim()
  }

  /** Cut the accumulator into target-sized pieces until the remainder fits */
  function hardSplit(): void {
    const tokens = tokenizer.encode(current.join(SEPARATOR))
    let offset = 0
    while (tokens.length - offset > limit) {
      const end = snapEnd(tokens, offset, offset + target)
      chunks.push(tokenizer.decode(tokens.slice(offset, end)).trim())
      offset = snapStart(tokens, Math.max(offset + 1, end - overlap), tokens.length)
    }
    const rest = tokenizer.decode(tokens.slice(offset)).trim()
    current = rest ? [rest] : []
    currentTokens = rest ? tokens.length - offset : 0
  }

  for (const unit of units) {
    const unitTokens = tokenizer.encode(unit).length

    if (currentTokens + unitTokens <= target) {
      current.push(unit)
      currentTokens += unitTokens
      continue
    }

    if (current.length > 0) {
      chunks.push(current.join(SEPARATOR))
    }

    // No overlap before the very first chunk
    const previous = chunks.at(-1)
    const seed = previous === undefined ? "" : tailOf(previous)
    current = seed ? [seed, unit] : [unit]
    currentTokens = (seed ? tokenizer.encode(seed).length : 0) + unitTokens

    if (currentTokens > limit) hardSplit()
  }

  if (current.length > 0) {
    chunks.push(current.join(SEPARATOR))
  }

  return chunks
}
