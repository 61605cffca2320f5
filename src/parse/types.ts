export interface Flashcard {
  question: string
  answer: string
  /** Index of the chunk the card came from; always 0 for single-call generation */
  sourceChunk: number
}

/** One output format the parser knows how to read. An empty result means "not this format". */
export interface Extractor {
  readonly name: string
  extract(text: string): Flashcard[]
}
