export const SUPPORTED_FORMATS = ['txt', 'md', 'pdf', 'docx'] as const

export type DocumentFormat = (typeof SUPPORTED_FORMATS)[number]

export type DocumentStatus = 'active' | 'deleted'

export interface KnowledgeDocument {
  id: number
  communityId: string
  name: string
  format: DocumentFormat
  sizeBytes: number
  /** Where the original upload was kept (path or object key). */
  location: string
  chunkCount: number
  totalChars: number
  uploadedBy: string
  status: DocumentStatus
  createdAt: string
  updatedAt: string
}

export interface KnowledgeChunk {
  id: number
  documentId: number
  communityId: string
  /** Position within the document; contiguous from 0 in reading order. */
  index: number
  content: string
  keywords: string[]
  charCount: number
}

export type NewKnowledgeDocument = Pick<
  KnowledgeDocument,
  'communityId' | 'name' | 'format' | 'sizeBytes' | 'location' | 'uploadedBy'
>

export type NewKnowledgeChunk = Pick<KnowledgeChunk, 'index' | 'content' | 'keywords' | 'charCount'>

export interface KnowledgeStore {
  init?(): Promise<void>
  /**
   * Persists the document row and every chunk as one unit. Implementations must
   * never expose a document whose chunk set is only partially written.
   */
  storeDocument(doc: NewKnowledgeDocument, chunks: NewKnowledgeChunk[]): Promise<KnowledgeDocument>
  /** Soft-deletes the document and hard-deletes its chunks. Idempotent. */
  deleteDocument(documentId: number): Promise<void>
  hasKnowledge(communityId: string): Promise<boolean>
  /** Chunks of the community's active documents, in insertion order. */
  listChunks(communityId: string): Promise<KnowledgeChunk[]>
  /** Active documents of the community, oldest first. */
  listDocuments(communityId: string): Promise<KnowledgeDocument[]>
  getDocument(documentId: number): Promise<KnowledgeDocument | null>
}

export interface StoreDocumentRequest extends NewKnowledgeDocument {
  chunks: string[]
}

export interface UploadIngestRequest {
  communityId: string
  filename: string
  buffer: Buffer
  uploadedBy: string
  location?: string
}

export interface TextIngestRequest {
  communityId: string
  name: string
  format: DocumentFormat
  text: string
  uploadedBy: string
  sizeBytes?: number
  location?: string
}

export interface RetrievalResult {
  chunks: KnowledgeChunk[]
  timingMs: number
  cache: 'hit' | 'miss'
}
