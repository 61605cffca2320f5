/** Lines this short that repeat this often are treated as page headers/footers */
const HEADER_MAX_LENGTH = 60
const HEADER_MIN_REPEATS = 3

/** Normalize whitespace and drop obvious repeated headers and footers */
export function cleanText(text: string): string {
  const normalized = text
    .replace(/\r\n?/g, "\n")
    .replace(/\u00a0/g, " ")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")

  const lines = normalized.split("\n").map((line) => line.trim())

  const freq = new Map<string, number>()
  for (const line of lines) {
    if (line.length > 0 && line.length <= HEADER_MAX_LENGTH) {
      freq.set(line, (freq.get(line) ?? 0) + 1)
    }
  }
  const repeated = new Set([...freq].filter(([, n]) => n >= HEADER_MIN_REPEATS).map(([line]) => line))

  const kept = repeated.size > 0 ? lines.filter((line) => !repeated.has(line)) : lines
  return kept.join("\n").trim()
}
