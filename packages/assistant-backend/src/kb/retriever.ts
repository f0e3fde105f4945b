import { tokenize } from './chunking'

export const BM25_K1 = 1.5
export const BM25_B = 0.75
export const KEYWORD_BOOST = 0.5
export const DEFAULT_TOP_K = 5
export const CONTEXT_SEPARATOR = '\n\n---\n\n'

export interface RankableChunk {
  content: string
  keywords: string[]
}

export interface ScoredChunk<T extends RankableChunk> {
  chunk: T
  score: number
}

export function clampTopK(topK?: number): number {
  if (topK === undefined) return DEFAULT_TOP_K
  if (!Number.isFinite(topK)) return 1
  return Math.max(1, Math.floor(topK))
}

/**
 * BM25 over the given chunks, using term presence (0/1) instead of in-chunk
 * term counts, with document length measured in characters. Each query term
 * found in a chunk's keyword set adds a flat KEYWORD_BOOST.
 */
export function scoreChunks<T extends RankableChunk>(chunks: T[], queryTerms: string[]): ScoredChunk<T>[] {
  const n = chunks.length
  if (!n) return []
  const docTokens = chunks.map((c) => new Set(tokenize(c.content)))
  const docFreq = new Map<string, number>()
  for (const tokens of docTokens) {
    for (const term of tokens) docFreq.set(term, (docFreq.get(term) ?? 0) + 1)
  }
  const avgdl = chunks.reduce((sum, c) => sum + c.content.length, 0) / n || 1

  return chunks.map((chunk, idx) => {
    const tokens = docTokens[idx]
    const dl = chunk.content.length
    let score = 0
    for (const term of queryTerms) {
      const df = docFreq.get(term)
      if (!df) continue
      const idf = Math.log((n - df + 0.5) / (df + 0.5) + 1)
      const tf = tokens.has(term) ? 1 : 0
      const denominator = tf + BM25_K1 * (1 - BM25_B + (BM25_B * dl) / avgdl)
      if (denominator > 0) score += (idf * tf * (BM25_K1 + 1)) / denominator
    }
    const keywords = new Set(chunk.keywords)
    for (const term of queryTerms) {
      if (keywords.has(term)) score += KEYWORD_BOOST
    }
    return { chunk, score }
  })
}

/**
 * Picks the `topK` most relevant chunks. Without usable query terms, or when
 * nothing overlaps the query at all, the first chunks in storage order are
 * returned instead.
 */
export function rankChunks<T extends RankableChunk>(chunks: T[], query: string, topK?: number): T[] {
  const limit = clampTopK(topK)
  if (!chunks.length) return []
  const terms = tokenize(query)
  if (!terms.length) return chunks.slice(0, limit)
  const ranked = scoreChunks(chunks, terms).sort((a, b) => b.score - a.score)
  if (ranked[0].score <= 0) return chunks.slice(0, limit)
  return ranked.slice(0, limit).map((s) => s.chunk)
}

export function renderContext(entries: { source: string; content: string }[]): string {
  return entries.map((e) => `[Source: ${e.source}]\n${e.content}`).join(CONTEXT_SEPARATOR)
}
