import { describe, expect, it } from 'vitest'
import { chunkText, extractKeywords, normalizeText, tokenize } from '../src/kb/chunking'

const sample = `# FAQ\n\nWhat is the assistant?\nIt answers community questions.\n\nHow do I add documents?\nUpload them from the admin panel.`

describe('chunkText', () => {
  it('packs short paragraphs into one chunk', () => {
    expect(chunkText(sample)).toEqual([normalizeText(sample)])
  })

  it('flushes at the size limit and splits long paragraphs on words', () => {
    const text = 'alpha beta\n\ngamma delta\n\nepsilon zeta eta theta iota'
    expect(chunkText(text, { chunkSize: 20 })).toEqual(['alpha beta', 'gamma delta', 'epsilon zeta eta', 'theta iota'])
  })

  it('keeps an oversized word whole', () => {
    expect(chunkText('abcdefghij', { chunkSize: 5 })).toEqual(['abcdefghij'])
  })

  it('returns no chunks for blank input', () => {
    expect(chunkText('')).toEqual([])
    expect(chunkText(' \n\n\t ')).toEqual([])
  })

  it('normalizes line endings, blank runs and horizontal whitespace', () => {
    expect(normalizeText('a  b\r\n\r\n\r\n\r\nc\t\td ')).toBe('a b\n\nc d')
    expect(chunkText('a  b\r\n\r\n\r\n\r\nc')).toEqual(['a b\n\nc'])
  })

  it('loses no characters across chunks', () => {
    const paragraphs = Array.from({ length: 12 }, (_, i) => `Paragraph ${i} talks about topic ${i} in some detail for testing.`)
    const text = paragraphs.join('\n\n')
    const chunks = chunkText(text, { chunkSize: 120 })
    expect(chunks.length).toBeGreaterThan(1)
    const strip = (s: string) => s.replace(/\s+/g, '')
    expect(strip(chunks.join(''))).toBe(strip(normalizeText(text)))
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(120)
  })
})

describe('tokenize', () => {
  it('lowercases and drops short and numeric tokens', () => {
    expect(tokenize('Hello World, x 42 abc123 snake_case')).toEqual(['hello', 'world', 'abc123', 'snake_case'])
  })

  it('splits ideographs into single tokens', () => {
    expect(tokenize('Hello 世界 AI助手')).toEqual(['hello', '世', '界', 'ai', '助', '手'])
  })
})

describe('extractKeywords', () => {
  it('ranks by frequency and skips stop words', () => {
    const text =
      'Bitcoin uses blockchain technology. Bitcoin blockchain technology uses cryptographic hashing. Ethereum also uses blockchain.'
    expect(extractKeywords(text)).toEqual([
      'uses',
      'blockchain',
      'bitcoin',
      'technology',
      'cryptographic',
      'hashing',
      'ethereum',
      'also',
    ])
  })

  it('caps the keyword count', () => {
    expect(extractKeywords('one two three four five six', 3)).toEqual(['one', 'two', 'three'])
  })

  it('skips ideograph stop words', () => {
    expect(extractKeywords('我的 规则')).toEqual(['规', '则'])
  })
})
