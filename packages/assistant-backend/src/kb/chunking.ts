import stopWordList from './stopwords.json'

export const CHUNK_SIZE = 800
export const MAX_KEYWORDS = 10

const PARAGRAPH_SEPARATOR = '\n\n'
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList)

// A single CJK ideograph, or a run of letters/digits/underscores outside that block.
const TOKEN_PATTERN = /[\u4e00-\u9fff]|(?:[^\P{L}\u4e00-\u9fff]|[\p{N}_])+/gu
const CJK_IDEOGRAPH = /^[\u4e00-\u9fff]$/
const DIGITS_ONLY = /^\d+$/

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .trim()
}

/**
 * Paragraph-first greedy chunker. Paragraphs are packed together while the
 * buffer stays within `chunkSize`; a paragraph that is longer on its own is
 * packed word by word. Words are never split, so a single word longer than
 * `chunkSize` becomes its own oversized chunk.
 */
export function chunkText(text: string, opts?: { chunkSize?: number }): string[] {
  const chunkSize = opts?.chunkSize ?? CHUNK_SIZE
  const normalized = normalizeText(text)
  if (!normalized) return []

  const chunks: string[] = []
  let current = ''
  const flush = () => {
    if (current) chunks.push(current)
    current = ''
  }

  for (const raw of normalized.split(/\n\s*\n/)) {
    const para = raw.trim()
    if (!para) continue
    if (current.length + para.length + PARAGRAPH_SEPARATOR.length <= chunkSize) {
      current = current ? `${current}${PARAGRAPH_SEPARATOR}${para}` : para
      continue
    }
    flush()
    if (para.length <= chunkSize) {
      current = para
      continue
    }
    for (const word of para.split(/\s+/)) {
      if (current.length + word.length + 1 <= chunkSize) {
        current = current ? `${current} ${word}` : word
      } else {
        flush()
        current = word
      }
    }
  }
  flush()
  return chunks
}

/**
 * Lowercased lexical tokens shared by keyword extraction and retrieval.
 * Ideographs count as tokens on their own; other tokens need two characters,
 * and purely numeric ones are dropped.
 */
export function tokenize(text: string): string[] {
  const matches = text.toLowerCase().match(TOKEN_PATTERN) || []
  return matches.filter((t) => (t.length >= 2 || CJK_IDEOGRAPH.test(t)) && !DIGITS_ONLY.test(t))
}

export function extractKeywords(text: string, maxKeywords = MAX_KEYWORDS): string[] {
  const counts = new Map<string, number>()
  for (const token of tokenize(text)) {
    if (STOP_WORDS.has(token)) continue
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxKeywords)
    .map(([word]) => word)
}
