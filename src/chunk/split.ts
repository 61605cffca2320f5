// Markdown headings or ALL-CAPS title lines; the heading line itself is dropped
const HEADING_LINE = /^(?:#{1,6} .*|[A-Z0-9][A-Z0-9 \-]{6,})\n/m
const PARAGRAPH_BREAK = /\n\n+/
const SENTENCE_BREAK = /(?<=[.!?])\s+/

function pieces(text: string, separator: RegExp): string[] {
  return text
    .split(separator)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
}

/**
 * Split text into packing units: heading sections, then paragraphs, then sentences.
 * The first tier that yields more than one unit wins.
 */
export function splitCandidates(text: string): string[] {
  const sections = pieces(text, HEADING_LINE)
  if (sections.length > 1) return sections

  const paragraphs = pieces(text, PARAGRAPH_BREAK)
  if (paragraphs.length > 1) return paragraphs

  return pieces(text, SENTENCE_BREAK)
}
