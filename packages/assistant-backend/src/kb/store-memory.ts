import { nowIso } from '../types'
import { KnowledgeChunk, KnowledgeDocument, KnowledgeStore, NewKnowledgeChunk, NewKnowledgeDocument } from './types'

/**
 * Process-local store used by tests and single-node deployments without Postgres.
 * Each write happens in one synchronous step, so readers never observe a
 * document without its full chunk set.
 */
export class MemoryKnowledgeStore implements KnowledgeStore {
  private docs: KnowledgeDocument[] = []
  private chunks: KnowledgeChunk[] = []
  private nextDocumentId = 1
  private nextChunkId = 1

  async storeDocument(doc: NewKnowledgeDocument, chunks: NewKnowledgeChunk[]): Promise<KnowledgeDocument> {
    const now = nowIso()
    const stored: KnowledgeDocument = {
      ...doc,
      id: this.nextDocumentId++,
      chunkCount: chunks.length,
      totalChars: chunks.reduce((sum, c) => sum + c.charCount, 0),
      status: 'active',
      createdAt: now,
      updatedAt: now,
    }
    const created = chunks.map((c) => ({
      ...c,
      id: this.nextChunkId++,
      documentId: stored.id,
      communityId: doc.communityId,
    }))
    this.docs.push(stored)
    this.chunks.push(...created)
    return { ...stored }
  }

  async deleteDocument(documentId: number): Promise<void> {
    const doc = this.docs.find((d) => d.id === documentId)
    if (!doc) return
    if (doc.status !== 'deleted') {
      doc.status = 'deleted'
      doc.updatedAt = nowIso()
    }
    this.chunks = this.chunks.filter((c) => c.documentId !== documentId)
  }

  async hasKnowledge(communityId: string): Promise<boolean> {
    return this.docs.some((d) => d.communityId === communityId && d.status === 'active')
  }

  async listChunks(communityId: string): Promise<KnowledgeChunk[]> {
    return this.chunks.filter((c) => c.communityId === communityId).map((c) => ({ ...c, keywords: [...c.keywords] }))
  }

  async listDocuments(communityId: string): Promise<KnowledgeDocument[]> {
    return this.docs.filter((d) => d.communityId === communityId && d.status === 'active').map((d) => ({ ...d }))
  }

  async getDocument(documentId: number): Promise<KnowledgeDocument | null> {
    const doc = this.docs.find((d) => d.id === documentId)
    return doc ? { ...doc } : null
  }
}
