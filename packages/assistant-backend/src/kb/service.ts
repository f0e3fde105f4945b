import { Clock, Logger, systemClock } from '../types'
import { chunkText, extractKeywords } from './chunking'
import { detectFormat, extractText, TextExtractors } from './parser'
import { clampTopK, DEFAULT_TOP_K, rankChunks, renderContext } from './retriever'
import { MemoryKnowledgeStore } from './store-memory'
import {
  KnowledgeChunk,
  KnowledgeDocument,
  KnowledgeStore,
  NewKnowledgeChunk,
  RetrievalResult,
  StoreDocumentRequest,
  TextIngestRequest,
  UploadIngestRequest,
} from './types'

export interface KnowledgeBaseOptions {
  /**
   * How long a community's chunk snapshot is reused for retrieval. Defaults to 0,
   * so every call reads the store; a cache is only invalidated by writes made
   * through this instance.
   */
  ttlMs?: number
  topK?: number
  chunkSize?: number
  extractors?: TextExtractors
  clock?: Clock
}

interface Snapshot {
  expiresAt: number
  chunks: KnowledgeChunk[]
  sources: Map<number, string>
}

export class KnowledgeBaseService {
  private cache = new Map<string, Snapshot>()
  private readonly clock: Clock
  private readonly ttlMs: number

  constructor(
    private readonly store: KnowledgeStore = new MemoryKnowledgeStore(),
    private readonly logger: Logger = console,
    private readonly options: KnowledgeBaseOptions = {},
  ) {
    this.clock = options.clock ?? systemClock
    this.ttlMs = options.ttlMs ?? 0
  }

  async init() {
    await this.store.init?.()
  }

  async ingestUpload(req: UploadIngestRequest): Promise<KnowledgeDocument> {
    const format = detectFormat(req.filename)
    const text = await extractText(req.buffer, format, this.options.extractors)
    return this.ingestText({
      communityId: req.communityId,
      name: req.filename,
      format,
      text,
      uploadedBy: req.uploadedBy,
      sizeBytes: req.buffer.length,
      location: req.location,
    })
  }

  async ingestText(req: TextIngestRequest): Promise<KnowledgeDocument> {
    const chunks = chunkText(req.text, { chunkSize: this.options.chunkSize })
    if (!chunks.length) {
      this.logger.warn('[kb] document produced no chunks', { communityId: req.communityId, name: req.name })
    }
    return this.storeDocument({
      communityId: req.communityId,
      name: req.name,
      format: req.format,
      sizeBytes: req.sizeBytes ?? Buffer.byteLength(req.text),
      location: req.location ?? req.name,
      uploadedBy: req.uploadedBy,
      chunks,
    })
  }

  async storeDocument(req: StoreDocumentRequest): Promise<KnowledgeDocument> {
    const { chunks, ...doc } = req
    const prepared: NewKnowledgeChunk[] = chunks.map((content, index) => ({
      index,
      content,
      keywords: extractKeywords(content),
      charCount: content.length,
    }))
    const stored = await this.store.storeDocument(doc, prepared)
    this.cache.delete(stored.communityId)
    this.logger.info('[kb] stored document', {
      id: stored.id,
      communityId: stored.communityId,
      chunks: stored.chunkCount,
      chars: stored.totalChars,
    })
    return stored
  }

  async deleteDocument(documentId: number): Promise<void> {
    const doc = await this.store.getDocument(documentId)
    await this.store.deleteDocument(documentId)
    if (!doc) return
    this.cache.delete(doc.communityId)
    this.logger.info('[kb] deleted document', { id: documentId, communityId: doc.communityId })
  }

  hasKnowledge(communityId: string): Promise<boolean> {
    return this.store.hasKnowledge(communityId)
  }

  listDocuments(communityId: string): Promise<KnowledgeDocument[]> {
    return this.store.listDocuments(communityId)
  }

  async search(communityId: string, query: string, topK = this.options.topK ?? DEFAULT_TOP_K): Promise<RetrievalResult> {
    const started = this.clock.now()
    const { snapshot, cache } = await this.snapshot(communityId)
    const chunks = rankChunks(snapshot.chunks, query, clampTopK(topK)).map((c) => ({ ...c, keywords: [...c.keywords] }))
    return { chunks, timingMs: this.clock.now() - started, cache }
  }

  /**
   * Ranked context for a question, each chunk labelled with its source
   * document. An empty string means the community has nothing to retrieve.
   */
  async retrieve(communityId: string, query: string, topK?: number): Promise<string> {
    const { snapshot } = await this.snapshot(communityId)
    if (!snapshot.chunks.length) return ''
    const chosen = rankChunks(snapshot.chunks, query, clampTopK(topK ?? this.options.topK ?? DEFAULT_TOP_K))
    return renderContext(
      chosen.map((c) => ({ source: snapshot.sources.get(c.documentId) ?? 'unknown', content: c.content })),
    )
  }

  private async snapshot(communityId: string): Promise<{ snapshot: Snapshot; cache: 'hit' | 'miss' }> {
    const now = this.clock.now()
    const cached = this.cache.get(communityId)
    if (cached && cached.expiresAt > now) return { snapshot: cached, cache: 'hit' }
    const [chunks, docs] = await Promise.all([this.store.listChunks(communityId), this.store.listDocuments(communityId)])
    const snapshot: Snapshot = {
      expiresAt: now + this.ttlMs,
      chunks,
      sources: new Map(docs.map((d): [number, string] => [d.id, d.name])),
    }
    if (this.ttlMs > 0) this.cache.set(communityId, snapshot)
    return { snapshot, cache: 'miss' }
  }
}

export function createKnowledgeBase(logger?: Logger, options?: KnowledgeBaseOptions) {
  return new KnowledgeBaseService(new MemoryKnowledgeStore(), logger, options)
}
