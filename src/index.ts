import { chunkText } from "./chunk/packer.ts"
import type { ChunkOptions } from "./chunk/types.ts"
import { compressCorpus } from "./corpus/compress.ts"
import { loadConfig, type Config } from "./config.ts"
import { GenerationError, errorMessage } from "./errors.ts"
import { createOpenAICaller } from "./model/openai.ts"
import { SYSTEM_PROMPT, STRICT_TSV_SUFFIX, buildUserPrompt, completionBudget } from "./model/prompts.ts"
import type { CompletionRequest, ModelCaller } from "./model/types.ts"
import { parseWithFormat, type ParseOutcome } from "./parse/parser.ts"
import type { Flashcard } from "./parse/types.ts"

export { chunkText } from "./chunk/packer.ts"
export { splitCandidates } from "./chunk/split.ts"
export { estimateTokens, getTokenizer, createTokenizer, encodingCandidate, type Tokenizer, type TokenizerCandidate } from "./chunk/tokenizer.ts"
export type { ChunkOptions } from "./chunk/types.ts"
export { compressCorpus, type CompressOptions } from "./corpus/compress.ts"
export { cleanText } from "./corpus/clean.ts"
export { parseAny, parseWithFormat, type ParseOutcome } from "./parse/parser.ts"
export { EXTRACTORS } from "./parse/extractors.ts"
export type { Flashcard, Extractor } from "./parse/types.ts"
export type { CompletionRequest, ModelCaller } from "./model/types.ts"
export { createOpenAICaller, type OpenAICallerOptions } from "./model/openai.ts"
export { validateCards, type ValidationResult } from "./validate.ts"
export { loadConfig, type Config } from "./config.ts"
export * from "./errors.ts"

export interface GenerateOptions {
  /** Sampling temperature (default 0.2) */
  temperature?: number
  /** Topics appended to the notes as a focus hint */
  topics?: string[]
  /** Corpus compression bound in characters (default 12000) */
  maxChars?: number
  /** Number of windows sampled from an oversized corpus (default 8) */
  slices?: number
  /** Print attempt timing and card counts to stderr */
  verbose?: boolean
}

type Attempt = { ok: true; text: string } | { ok: false; error: unknown }

async function callOnce(caller: ModelCaller, request: CompletionRequest): Promise<Attempt> {
  try {
    return { ok: true, text: await caller(request) }
  } catch (error) {
    return { ok: false, error }
  }
}

/**
 * Generate up to `nTotal` flashcards from `fullText` with one model call.
 * If the reply yields fewer than half the requested cards (or the call fails),
 * one retry demanding TSV-only output is made and its result returned as is.
 * Throws GenerationError only when both calls fail outright.
 */
export async function generate(
  fullText: string,
  nTotal: number,
  caller: ModelCaller,
  opts?: GenerateOptions,
): Promise<Flashcard[]> {
  const count = Math.max(0, Math.floor(nTotal))
  const verbose = opts?.verbose ?? false

  let corpus = compressCorpus(fullText, { maxChars: opts?.maxChars, slices: opts?.slices })
  if (opts?.topics && opts.topics.length > 0) {
    corpus += "\nFocus on: " + opts.topics.join(", ")
  }

  const prompt = buildUserPrompt(corpus, count)
  const request: CompletionRequest = {
    system: SYSTEM_PROMPT,
    prompt,
    temperature: opts?.temperature ?? 0.2,
    topP: 1,
    maxTokens: completionBudget(count),
  }

  function report(label: string, outcome: ParseOutcome, started: number): void {
    if (!verbose) return
    const ms = Math.round(performance.now() - started)
    console.error(`  ${label}: ${outcome.cards.length} cards (${outcome.format ?? "no format matched"}), ${ms}ms`)
  }

  const t0 = performance.now()
  const first = await callOnce(caller, request)
  if (first.ok) {
    const outcome = parseWithFormat(first.text)
    report("attempt 1", outcome, t0)
    if (outcome.cards.length >= Math.max(1, Math.floor(count / 2))) {
      return outcome.cards.slice(0, count)
    }
  } else if (verbose) {
    console.error(`  attempt 1 failed, retrying once: ${errorMessage(first.error)}`)
  }

  // Second and last try: very strict reminder to return TSV only
  const t1 = performance.now()
  const second = await callOnce(caller, { ...request, prompt: prompt + STRICT_TSV_SUFFIX })
  if (!second.ok) {
    throw new GenerationError(`model call failed after retry: ${errorMessage(second.error)}`, {
      cause: second.error,
    })
  }
  const outcome = parseWithFormat(second.text)
  report("attempt 2", outcome, t1)
  return outcome.cards.slice(0, count)
}

export interface FlashmintOptions {
  /** Model caller to use; built from `config` with the OpenAI client when omitted */
  caller?: ModelCaller
  /** Defaults to loadConfig() over process.env */
  config?: Config
}

export class Flashmint {
  private caller: ModelCaller | null
  private config: Config

  constructor(opts?: FlashmintOptions) {
    this.config = opts?.config ?? loadConfig()
    this.caller = opts?.caller ?? null
  }

  private getCaller(): ModelCaller {
    if (!this.caller) {
      this.caller = createOpenAICaller({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL,
        model: this.config.model,
        timeout: this.config.timeout,
      })
    }
    return this.caller
  }

  /** Generate cards, falling back to the configured temperature */
  async generate(text: string, count: number, opts?: GenerateOptions): Promise<Flashcard[]> {
    return generate(text, count, this.getCaller(), {
      ...opts,
      temperature: opts?.temperature ?? this.config.temperature,
    })
  }

  chunk(text: string, opts?: ChunkOptions): string[] {
    return chunkText(text, opts)
  }

  parse(text: string): ParseOutcome {
    return parseWithFormat(text)
  }
}
