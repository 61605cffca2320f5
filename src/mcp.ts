#!/usr/bin/env -S node --import tsx
/**
 * flashmint MCP server: exposes flashcard generation, parsing and chunking as MCP tools.
 *
 * Usage:
 *   npx tsx src/mcp.ts [--model name] [--base-url url]
 *
 * Model settings come from OPENAI_API_KEY, OPENAI_BASE_URL and MODEL_NAME; the
 * flags override the last two.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { z } from "zod"
import { Flashmint, loadConfig, type Flashcard } from "./index.ts"
import { toJsonCards } from "./format/json.ts"

// Parse a "--flag value" pair from argv
function parseFlag(name: string): string | undefined {
  const idx = process.argv.indexOf(name)
  if (idx !== -1 && idx + 1 < process.argv.length) {
    return process.argv[idx + 1]
  }
  return undefined
}

function cardsResult(cards: Flashcard[], emptyMessage: string) {
  if (cards.length === 0) {
    return { content: [{ type: "text" as const, text: emptyMessage }] }
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(toJsonCards(cards), null, 2) }],
  }
}

const config = loadConfig()
const flashmint = new Flashmint({
  config: {
    ...config,
    model: parseFlag("--model") ?? config.model,
    baseURL: parseFlag("--base-url") ?? config.baseURL,
  },
})

const server = new McpServer({
  name: "flashmint",
  version: "0.1.0",
})

server.registerTool("flashmint_generate", {
  title: "Generate Flashcards",
  description: `Generate study flashcards from notes with one model call. Long notes are sampled evenly (beginning, middle and end) to keep the request small. If the model returns too few usable cards, one stricter retry is made.

Returns a JSON array of {question, answer, source_chunk}.`,
  inputSchema: {
    text: z.string().min(1).describe("The study notes as plain text"),
    count: z.number().int().min(1).max(200).default(30).describe("Number of flashcards to ask for"),
    temperature: z.number().min(0).max(2).optional().describe("Sampling temperature"),
    topics: z.array(z.string()).optional().describe("Topics the cards should focus on"),
  },
}, async ({ text, count, temperature, topics }) => {
  const cards = await flashmint.generate(text, count, { temperature, topics })
  return cardsResult(cards, "The model returned no usable flashcards. Try more text or a different model.")
})

server.registerTool("flashmint_parse", {
  title: "Parse Flashcards",
  description: `Extract flashcards from raw model output. Accepts tab-separated lines, "Q: ... A: ..." on one or two lines, numbered or bulleted "term - definition" lists, and a JSON array of {question, answer}.`,
  inputSchema: {
    text: z.string().describe("Raw model output"),
  },
}, async ({ text }) => {
  const { cards } = flashmint.parse(text)
  return cardsResult(cards, "No flashcards found in the given text.")
})

server.registerTool("flashmint_chunk", {
  title: "Chunk Notes",
  description: "Split notes into token-bounded chunks, each opening with the tail of the previous one.",
  inputSchema: {
    text: z.string().describe("The notes to split"),
    targetTokens: z.number().int().min(1).default(1400).describe("Token budget per chunk"),
    overlapTokens: z.number().int().min(0).default(150).describe("Tokens carried into the next chunk"),
  },
}, async ({ text, targetTokens, overlapTokens }) => {
  const chunks = flashmint.chunk(text, { targetTokens, overlapTokens })
  return {
    content: [{ type: "text" as const, text: JSON.stringify(chunks, null, 2) }],
  }
})

// Start the server
const transport = new StdioServerTransport()
await server.connect(transport)
