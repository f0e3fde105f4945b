import { DocumentFormat, SUPPORTED_FORMATS } from './types'

export class UnsupportedFormatError extends Error {
  constructor(readonly format: string) {
    super(`unsupported_format: ${format || '(none)'}`)
    this.name = 'UnsupportedFormatError'
  }
}

/**
 * Turns raw upload bytes into plain text. PDF and DOCX parsing lives outside
 * this package; callers register an extractor per format they can handle.
 */
export type TextExtractor = (buffer: Buffer) => Promise<string> | string

export type TextExtractors = Partial<Record<DocumentFormat, TextExtractor>>

export function isSupportedFormat(value: string): value is DocumentFormat {
  return SUPPORTED_FORMATS.some((format) => format === value)
}

export function detectFormat(filename: string): DocumentFormat {
  const dot = filename.lastIndexOf('.')
  const ext = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : ''
  if (!isSupportedFormat(ext)) throw new UnsupportedFormatError(ext)
  return ext
}

export async function extractText(buffer: Buffer, format: DocumentFormat, extractors: TextExtractors = {}): Promise<string> {
  const custom = extractors[format]
  if (custom) return custom(buffer)
  if (format === 'txt' || format === 'md') return buffer.toString('utf8')
  throw new UnsupportedFormatError(format)
}
