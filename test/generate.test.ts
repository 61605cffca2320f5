import { describe, test, expect, vi, afterEach } from "vitest"
import { Flashmint, generate } from "../src/index.ts"
import { compressCorpus } from "../src/corpus/compress.ts"
import { GenerationError } from "../src/errors.ts"
import { SYSTEM_PROMPT, STRICT_TSV_SUFFIX, buildUserPrompt } from "../src/model/prompts.ts"
import type { CompletionRequest, ModelCaller } from "../src/model/types.ts"

/** A model caller that replays canned replies (or throws the given errors) in order */
function scripted(...replies: Array<string | Error>) {
  const requests: CompletionRequest[] = []
  const caller: ModelCaller = async (request) => {
    requests.push(request)
    const reply = replies[requests.length - 1]
    if (reply === undefined) throw new Error("unexpected extra model call")
    if (reply instanceof Error) throw reply
    return reply
  }
  return { caller, requests }
}

function tsv(n: number): string {
  return Array.from({ length: n }, (_, i) => `Question ${i + 1}?\tAnswer ${i + 1}.`).join("\n")
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("generate", () => {
  test("returns the first reply when it has at least half the cards", async () => {
    const { caller, requests } = scripted(tsv(4))
    const cards = await generate("notes here", 6, caller)

    expect(cards).toHaveLength(4)
    expect(cards[0]).toEqual({ question: "Question 1?", answer: "Answer 1.", sourceChunk: 0 })
    expect(requests).toHaveLength(1)
  })

  test("sends the system prompt, TSV prompt and sampling settings", async () => {
    const { caller, requests } = scripted(tsv(6))
    await generate("notes here", 6, caller)

    expect(requests[0]).toEqual({
      system: SYSTEM_PROMPT,
      prompt: buildUserPrompt("notes here", 6),
      temperature: 0.2,
      topP: 1,
      maxTokens: 270,
    })
  })

  test("caps the completion budget", async () => {
    const { caller, requests } = scripted(tsv(40))
    await generate("notes here", 40, caller, { temperature: 0.5 })

    expect(requests[0]?.maxTokens).toBe(1200)
    expect(requests[0]?.temperature).toBe(0.5)
  })

  test("truncates extra cards", async () => {
    const { caller } = scripted(tsv(5))
    const cards = await generate("notes here", 3, caller)

    expect(cards.map((c) => c.question)).toEqual(["Question 1?", "Question 2?", "Question 3?"])
  })

  test("retries once with a TSV-only reminder when too few cards come back", async () => {
    const { caller, requests } = scripted(tsv(2), tsv(1))
    const cards = await generate("notes here", 6, caller)

    expect(cards).toEqual([{ question: "Question 1?", answer: "Answer 1.", sourceChunk: 0 }])
    expect(requests).toHaveLength(2)
    expect(requests[1]?.prompt).toBe(requests[0]?.prompt + STRICT_TSV_SUFFIX)
  })

  test("returns an empty list when the retry is unusable too", async () => {
    const { caller, requests } = scripted("Sorry, I cannot help with that.", "Still nothing useful here.")
    await expect(generate("notes here", 4, caller)).resolves.toEqual([])
    expect(requests).toHaveLength(2)
  })

  test("retries quietly when the first call throws", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {})
    const { caller } = scripted(new Error("connection reset"), tsv(3))
    const cards = await generate("notes here", 3, caller)

    expect(cards).toHaveLength(3)
    expect(errorLog).not.toHaveBeenCalled()
  })

  test("reports a failed first call when verbose", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {})
    const { caller } = scripted(new Error("connection reset"), tsv(3))
    const cards = await generate("notes here", 3, caller, { verbose: true })

    expect(cards).toHaveLength(3)
    expect(errorLog).toHaveBeenCalledTimes(2)
    expect(errorLog.mock.calls[0]).toEqual(["  attempt 1 failed, retrying once: connection reset"])
  })

  test("raises GenerationError when both calls throw", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    const last = new Error("model unavailable")
    const { caller, requests } = scripted(new Error("timeout"), last)

    const failure = await generate("notes here", 3, caller).catch((e: unknown) => e)
    if (!(failure instanceof GenerationError)) throw new Error("expected a GenerationError")
    expect(failure.code).toBe("GENERATION_FAILED")
    expect(failure.message).toBe("model call failed after retry: model unavailable")
    expect(failure.cause).toBe(last)
    expect(requests).toHaveLength(2)
  })

  test("compresses long notes and appends focus topics", async () => {
    const notes = Array.from({ length: 20_000 }, (_, i) => String.fromCharCode(97 + (i % 26))).join("")
    const { caller, requests } = scripted(tsv(2))
    await generate(notes, 2, caller, { topics: ["cells", "energy"] })

    const expected = compressCorpus(notes) + "\nFocus on: cells, energy"
    expect(requests[0]?.prompt).toBe(buildUserPrompt(expected, 2))
  })

  test("reports attempts when verbose", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {})
    const { caller } = scripted(tsv(4))
    await generate("notes here", 4, caller, { verbose: true })

    expect(errorLog).toHaveBeenCalledTimes(1)
    expect(errorLog.mock.calls[0]?.[0]).toMatch(/^ {2}attempt 1: 4 cards \(tsv\), \d+ms$/)
  })
})

describe("Flashmint", () => {
  test("uses the configured temperature unless overridden", async () => {
    const { caller, requests } = scripted(tsv(2), tsv(2))
    const flashmint = new Flashmint({
      caller,
      config: { apiKey: "test-key", model: "test-model", temperature: 0.7, timeout: 1000 },
    })

    await flashmint.generate("notes here", 2)
    await flashmint.generate("notes here", 2, { temperature: 0 })

    expect(requests.map((r) => r.temperature)).toEqual([0.7, 0])
  })

  test("parses and chunks without a model call", () => {
    const { caller, requests } = scripted()
    const flashmint = new Flashmint({
      caller,
      config: { apiKey: "test-key", model: "test-model", temperature: 0.2, timeout: 1000 },
    })

    expect(flashmint.parse("Q: What is 2+2? A: 4")).toEqual({
      cards: [{ question: "What is 2+2?", answer: "4", sourceChunk: 0 }],
      format: "labeled-line",
    })
    expect(flashmint.chunk("")).toEqual([])
    expect(requests).toHaveLength(0)
  })
})
