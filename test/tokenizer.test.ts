import { describe, test, expect } from "vitest"
import { createTokenizer, encodingCandidate, estimateTokens, getTokenizer, type TokenizerCandidate } from "../src/chunk/tokenizer.ts"
import { TokenizationUnavailableError } from "../src/errors.ts"
import { WordTokenizer } from "./wordTokenizer.ts"

describe("estimateTokens", () => {
  test("returns 0 for empty text", () => {
    expect(estimateTokens("")).toBe(0)
  })

  test("counts cl100k tokens", () => {
    expect(estimateTokens("hello world")).toBe(2)
  })

  test("is stable across repeated calls", () => {
    const text = "Photosynthesis converts light energy into chemical energy stored in glucose."
    const first = estimateTokens(text)
    expect(first).toBeGreaterThan(0)
    expect(estimateTokens(text)).toBe(first)
    expect(estimateTokens(text)).toBe(first)
  })

  test("treats special-token text as ordinary text", () => {
    expect(() => estimateTokens("notes <|endoftext|> more notes")).not.toThrow()
    expect(estimateTokens("<|endoftext|>")).toBeGreaterThan(1)
  })

  test("uses an injected tokenizer", () => {
    expect(estimateTokens("one two three", new WordTokenizer())).toBe(3)
  })
})

describe("getTokenizer", () => {
  test("prefers cl100k_base and shares one instance", () => {
    const tokenizer = getTokenizer()
    expect(tokenizer.encoding).toBe("cl100k_base")
    expect(getTokenizer()).toBe(tokenizer)
  })

  test("decodes what it encodes", () => {
    const tokenizer = getTokenizer()
    const text = "Mitochondria — the powerhouse of the cell."
    expect(tokenizer.decode(tokenizer.encode(text))).toBe(text)
  })
})

describe("createTokenizer", () => {
  const broken: TokenizerCandidate = {
    encoding: "broken",
    load: () => {
      throw new Error("encoding file missing")
    },
  }
  const words: TokenizerCandidate = { encoding: "words", load: () => new WordTokenizer() }

  test("falls back to the next candidate when one fails to load", () => {
    expect(createTokenizer([broken, words]).encoding).toBe("words")
  })

  test("rejects a candidate that does not round-trip", () => {
    const lossy: TokenizerCandidate = {
      encoding: "lossy",
      load: () => ({ encoding: "lossy", encode: () => [1], decode: () => "?" }),
    }
    expect(createTokenizer([lossy, words]).encoding).toBe("words")
  })

  test("throws when every candidate fails", () => {
    expect(() => createTokenizer([broken])).toThrow(TokenizationUnavailableError)
    expect(() => createTokenizer([broken])).toThrow("broken: encoding file missing")
    expect(() => createTokenizer([])).toThrow("no candidates")
  })

  test("loads an encoding module only when its candidate is tried", () => {
    const missing = encodingCandidate("no_such_encoding")
    expect(missing.encoding).toBe("no_such_encoding")

    const tokenizer = createTokenizer([missing, encodingCandidate("p50k_base")])
    expect(tokenizer.encoding).toBe("p50k_base")
    expect(tokenizer.decode(tokenizer.encode("hello world"))).toBe("hello world")
  })

  test("reports a missing encoding module instead of crashing on import", () => {
    expect(() => createTokenizer([encodingCandidate("no_such_encoding")])).toThrow(TokenizationUnavailableError)
    expect(() => createTokenizer([encodingCandidate("no_such_encoding")])).toThrow(/^no tokenizer encoding could be loaded \(no_such_encoding: /)
  })
})
