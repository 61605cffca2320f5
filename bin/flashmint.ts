#!/usr/bin/env -S node --import tsx
import { readFile } from "fs/promises"
import { program } from "commander"
import {
  Flashmint,
  chunkText,
  cleanText,
  estimateTokens,
  isFlashmintError,
  loadConfig,
  parseWithFormat,
  validateCards,
  type Flashcard,
} from "../src/index.ts"
import { formatJson } from "../src/format/json.ts"
import { formatText } from "../src/format/text.ts"
import { formatCsv } from "../src/format/csv.ts"
import { formatAnki } from "../src/format/anki.ts"
import { finiteNumber, nonNegativeInt } from "../src/cli/options.ts"

program
  .name("flashmint")
  .description("Turn study notes into flashcards with a single LLM call")
  .version("0.1.0")
  .option("--model <name>", "chat model name (overrides MODEL_NAME)")
  .option("--base-url <url>", "OpenAI-compatible endpoint (overrides OPENAI_BASE_URL)")

function printCards(cards: Flashcard[], format: string, elapsed: number): void {
  switch (format) {
    case "text":
      console.log(formatText(cards, elapsed))
      break
    case "csv":
      process.stdout.write(formatCsv(cards))
      break
    case "anki":
      console.log(formatAnki(cards))
      break
    case "json":
    default:
      console.log(formatJson(cards, elapsed))
      break
  }
}

async function readStdin(): Promise<string> {
  const parts: Buffer[] = []
  for await (const part of process.stdin) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)))
  }
  return Buffer.concat(parts).toString("utf-8")
}

program
  .command("generate")
  .description("Generate flashcards from a plain-text or markdown notes file")
  .argument("<file>", "notes file")
  .option("--count <n>", "number of cards to ask for", "30")
  .option("--temperature <t>", "sampling temperature (overrides FLASHMINT_TEMPERATURE)")
  .option("--topic <topic...>", "topics to focus on")
  .option("--format <fmt>", "output format: json|text|csv|anki", "json")
  .option("--verbose", "show attempt timing")
  .action(async (file: string, opts: { count: string; temperature?: string; topic?: string[]; format: string; verbose?: boolean }) => {
    const global = program.opts<{ model?: string; baseUrl?: string }>()
    const config = loadConfig()
    const flashmint = new Flashmint({
      config: {
        ...config,
        model: global.model ?? config.model,
        baseURL: global.baseUrl ?? config.baseURL,
      },
    })

    const text = cleanText(await readFile(file, "utf-8"))
    if (!text) {
      console.error("error: no text found in notes file")
      process.exitCode = 1
      return
    }

    const start = performance.now()
    const cards = await flashmint.generate(text, nonNegativeInt(opts.count, "--count"), {
      temperature: opts.temperature !== undefined ? finiteNumber(opts.temperature, "--temperature") : undefined,
      topics: opts.topic,
      verbose: opts.verbose,
    })
    const elapsed = Math.round(performance.now() - start)

    if (cards.length === 0) {
      console.error("the model returned no usable flashcards. try a bit more text or a different model.")
      process.exitCode = 1
      return
    }
    const check = validateCards(cards)
    if (!check.ok) console.error(`warning: ${check.message}`)

    printCards(cards, opts.format, elapsed)
  })

program
  .command("chunk")
  .description("Split a notes file into token-bounded, overlapping chunks")
  .argument("<file>", "notes file")
  .option("--target-tokens <n>", "token budget per chunk", "1400")
  .option("--overlap-tokens <n>", "tokens carried into the next chunk", "150")
  .option("--format <fmt>", "output format: json|text", "text")
  .action(async (file: string, opts: { targetTokens: string; overlapTokens: string; format: string }) => {
    const text = cleanText(await readFile(file, "utf-8"))
    const chunks = chunkText(text, {
      targetTokens: nonNegativeInt(opts.targetTokens, "--target-tokens"),
      overlapTokens: nonNegativeInt(opts.overlapTokens, "--overlap-tokens"),
    })

    if (opts.format === "json") {
      console.log(JSON.stringify(chunks.map((c, i) => ({ index: i, tokens: estimateTokens(c), text: c })), null, 2))
      return
    }
    if (chunks.length === 0) {
      console.log("No text to chunk.")
      return
    }
    console.log(`${chunks.length} chunk${chunks.length !== 1 ? "s" : ""}:\n`)
    chunks.forEach((c, i) => {
      console.log(`--- chunk ${i + 1} (${estimateTokens(c)} tokens) ---`)
      console.log(c)
      console.log("")
    })
  })

program
  .command("parse")
  .description("Parse a saved model response into flashcards (reads stdin without a file)")
  .argument("[file]", "file holding the raw model output")
  .option("--format <fmt>", "output format: json|text|csv|anki", "json")
  .action(async (file: string | undefined, opts: { format: string }) => {
    const raw = file ? await readFile(file, "utf-8") : await readStdin()
    const start = performance.now()
    const { cards, format } = parseWithFormat(raw)
    const elapsed = Math.round(performance.now() - start)
    if (format) console.error(`matched format: ${format}`)
    printCards(cards, opts.format, elapsed)
  })

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err)
  console.error(`error: ${message}`)
  process.exitCode = isFlashmintError(err) && err.code === "CONFIG_INVALID" ? 2 : 1
})
