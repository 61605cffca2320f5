import type { Tokenizer } from "./tokenizer.ts"

export interface ChunkOptions {
  /** Token budget per chunk (default 1400) */
  targetTokens?: number
  /** Tokens carried from the end of one chunk into the next (default 150) */
  overlapTokens?: number
  /** Defaults to the shared process-wide tokenizer */
  tokenizer?: Tokenizer
}

export const DEFAULT_TARGET_TOKENS = 1400
export const DEFAULT_OVERLAP_TOKENS = 150

/** A chunk may run this far past the target before it is hard-split */
export const OVERSIZE_FACTOR = 1.3
