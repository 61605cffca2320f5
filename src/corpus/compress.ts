export interface CompressOptions {
  /** Texts at or under this length pass through untouched (default 12000) */
  maxChars?: number
  /** Number of evenly spaced windows to keep (default 8) */
  slices?: number
}

export const SLICE_SEPARATOR = "\n...\n"

/**
 * Bound a long document by sampling evenly spaced windows across it, so the
 * beginning, middle and end all reach the model instead of only the head.
 */
export function compressCorpus(text: string, opts?: CompressOptions): string {
  const maxChars = opts?.maxChars ?? 12000
  if (text.length <= maxChars) return text
  // At least one character per window
  const slices = Math.min(Math.max(1, Math.floor(opts?.slices ?? 8)), Math.max(1, maxChars))

  const sliceLen = Math.floor(maxChars / slices)
  const span = text.length - sliceLen
  const segments: string[] = []
  for (let i = 0; i < slices; i++) {
    const start = Math.round((i * span) / Math.max(1, slices - 1))
    segments.push(text.slice(start, start + sliceLen))
  }
  return segments.join(SLICE_SEPARATOR)
}
