import OpenAI from "openai"
import type { ModelCaller } from "./types.ts"

export interface OpenAICallerOptions {
  apiKey: string
  /** Chat model name, e.g. "mistral:7b-instruct" behind an Ollama endpoint */
  model: string
  /** Custom endpoint for OpenAI-compatible servers */
  baseURL?: string
  /** Client-side retries for transport errors (default 2) */
  maxRetries?: number
  /** Per-request timeout in milliseconds (default 60000) */
  timeout?: number
}

/** Model caller backed by the OpenAI chat completions API (or any compatible server) */
export function createOpenAICaller(options: OpenAICallerOptions): ModelCaller {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    maxRetries: options.maxRetries ?? 2,
    timeout: options.timeout ?? 60_000,
  })

  return async (request) => {
    const response = await client.chat.completions.create({
      model: options.model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.prompt },
      ],
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
    })
    return response.choices[0]?.message.content ?? ""
  }
}
