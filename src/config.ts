import { z } from "zod"
import { ConfigError } from "./errors.ts"

// Unset and empty variables both fall back to the default
const blankToUndefined = (value: unknown) => (value === "" ? undefined : value)

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().default("ollama")),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  MODEL_NAME: z.preprocess(blankToUndefined, z.string().default("mistral:7b-instruct")),
  FLASHMINT_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.2)),
  FLASHMINT_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(60_000)),
})

export interface Config {
  apiKey: string
  baseURL?: string
  model: string
  temperature: number
  timeout: number
}

/** Read model settings from the environment */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`))
  }
  const vars = parsed.data
  return {
    apiKey: vars.OPENAI_API_KEY,
    baseURL: vars.OPENAI_BASE_URL,
    model: vars.MODEL_NAME,
    temperature: vars.FLASHMINT_TEMPERATURE,
    timeout: vars.FLASHMINT_TIMEOUT_MS,
  }
}
