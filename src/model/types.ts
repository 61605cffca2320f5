export interface CompletionRequest {
  system: string
  prompt: string
  temperature: number
  topP: number
  maxTokens: number
}

/** A function that sends one chat completion and returns the raw text of the reply */
export type ModelCaller = (request: CompletionRequest) => Promise<string>
