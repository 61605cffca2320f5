import { createRequire } from "module"
import { TokenizationUnavailableError, errorMessage } from "../errors.ts"

export interface Tokenizer {
  /** Name of the byte-pair encoding in use (e.g. "cl100k_base") */
  readonly encoding: string
  encode(text: string): number[]
  decode(tokens: number[]): string
}

export interface TokenizerCandidate {
  encoding: string
  load: () => Tokenizer
}

// Special-token text in user notes is ordinary text to us
const NO_SPECIAL = { disallowedSpecial: new Set<string>() }

const ROUND_TRIP_SAMPLE = "flashcard round trip"

interface EncodingModule {
  encode(text: string, options?: { disallowedSpecial?: Set<string> }): number[]
  decode(tokens: Iterable<number>): string
}

const requireEncoding = createRequire(import.meta.url)

/**
 * A candidate that loads `gpt-tokenizer/encoding/<encoding>` on first use.
 * Building an encoder is costly, so only the encoding actually picked is built.
 */
export function encodingCandidate(encoding: string): TokenizerCandidate {
  return {
    encoding,
    load: () => {
      const mod: EncodingModule = requireEncoding(`gpt-tokenizer/encoding/${encoding}`)
      return {
        encoding,
        encode: (text) => mod.encode(text, NO_SPECIAL),
        decode: (tokens) => mod.decode(tokens),
      }
    },
  }
}

/** Encodings tried in order: cl100k_base matches the gpt-4/3.5 families, p50k_base is the fallback */
export const DEFAULT_CANDIDATES: TokenizerCandidate[] = [
  encodingCandidate("cl100k_base"),
  encodingCandidate("p50k_base"),
]

/**
 * Build a tokenizer from the first candidate that loads and round-trips a sample.
 * Throws only when every candidate fails.
 */
export function createTokenizer(candidates: TokenizerCandidate[] = DEFAULT_CANDIDATES): Tokenizer {
  const failures: string[] = []
  for (const candidate of candidates) {
    try {
      const tokenizer = candidate.load()
      if (tokenizer.decode(tokenizer.encode(ROUND_TRIP_SAMPLE)) !== ROUND_TRIP_SAMPLE) {
        failures.push(`${candidate.encoding}: sample did not round-trip`)
        continue
      }
      return tokenizer
    } catch (e) {
      failures.push(`${candidate.encoding}: ${errorMessage(e)}`)
    }
  }
  throw new TokenizationUnavailableError(
    `no tokenizer encoding could be loaded (${failures.join(", ") || "no candidates"})`
  )
}

let _tokenizer: Tokenizer | null = null

/** Process-wide tokenizer, built on first use and shared read-only afterwards */
export function getTokenizer(): Tokenizer {
  if (!_tokenizer) {
    _tokenizer = createTokenizer()
  }
  return _tokenizer
}

export function estimateTokens(text: string, tokenizer?: Tokenizer): number {
  if (!text) return 0
  return (tokenizer ?? getTokenizer()).encode(text).length
}
