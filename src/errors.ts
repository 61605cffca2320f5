export type ErrorCode = "TOKENIZER_UNAVAILABLE" | "GENERATION_FAILED" | "CONFIG_INVALID"

/** Base class for every error flashmint raises on purpose */
export class FlashmintError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "FlashmintError"
    this.code = code
  }
}

/** No tokenizer encoding could be loaded */
export class TokenizationUnavailableError extends FlashmintError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TOKENIZER_UNAVAILABLE", message, options)
    this.name = "TokenizationUnavailableError"
  }
}

/** The model call failed on both the first attempt and the retry */
export class GenerationError extends FlashmintError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_FAILED", message, options)
    this.name = "GenerationError"
  }
}

export class ConfigError extends FlashmintError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
    this.issues = issues
  }
}

export function isFlashmintError(error: unknown): error is FlashmintError {
  return error instanceof FlashmintError
}

/** Best-effort message for anything caught */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
