import { Pool } from 'pg'
import { isSupportedFormat } from './parser'
import { DocumentFormat, KnowledgeChunk, KnowledgeDocument, KnowledgeStore, NewKnowledgeChunk, NewKnowledgeDocument } from './types'

type DocumentRow = {
  id: string
  community_id: string
  name: string
  format: string
  size_bytes: string
  location: string
  chunk_count: number
  total_chars: number
  uploaded_by: string
  status: string
  created_at: Date
  updated_at: Date
}

type ChunkRow = {
  id: string
  document_id: string
  community_id: string
  chunk_index: number
  content: string
  keywords: string[] | null
  char_count: number
}

const SCHEMA = `
  create table if not exists knowledge_documents (
    id bigserial primary key,
    community_id text not null,
    name text not null,
    format text not null,
    size_bytes bigint not null default 0,
    location text not null,
    chunk_count integer not null default 0,
    total_chars integer not null default 0,
    uploaded_by text not null,
    status text not null default 'active' check (status in ('active','deleted')),
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now()
  );
  create index if not exists knowledge_documents_community_idx on knowledge_documents(community_id, status);
  create table if not exists knowledge_chunks (
    id bigserial primary key,
    document_id bigint not null references knowledge_documents(id),
    community_id text not null,
    chunk_index integer not null,
    content text not null,
    keywords text[] not null default '{}',
    char_count integer not null default 0,
    unique (document_id, chunk_index)
  );
  create index if not exists knowledge_chunks_community_idx on knowledge_chunks(community_id, id);
`

export class PostgresKnowledgeStore implements KnowledgeStore {
  private ready?: Promise<void>

  constructor(private readonly pool: Pool) {}

  init(): Promise<void> {
    if (!this.ready) {
      this.ready = this.pool.query(SCHEMA).then(
        () => undefined,
        (err: unknown) => {
          this.ready = undefined
          throw err
        },
      )
    }
    return this.ready
  }

  async storeDocument(doc: NewKnowledgeDocument, chunks: NewKnowledgeChunk[]): Promise<KnowledgeDocument> {
    await this.init()
    const totalChars = chunks.reduce((sum, c) => sum + c.charCount, 0)
    const client = await this.pool.connect()
    try {
      await client.query('begin')
      const { rows } = await client.query<DocumentRow>(
        `insert into knowledge_documents(community_id, name, format, size_bytes, location, chunk_count, total_chars, uploaded_by, status)
         values ($1,$2,$3,$4,$5,$6,$7,$8,'active') returning *`,
        [doc.communityId, doc.name, doc.format, doc.sizeBytes, doc.location, chunks.length, totalChars, doc.uploadedBy],
      )
      const row = rows[0]
      for (const chunk of chunks) {
        await client.query(
          `insert into knowledge_chunks(document_id, community_id, chunk_index, content, keywords, char_count)
           values ($1,$2,$3,$4,$5,$6)`,
          [row.id, doc.communityId, chunk.index, chunk.content, chunk.keywords, chunk.charCount],
        )
      }
      await client.query('commit')
      return mapDocumentRow(row)
    } catch (e) {
      await client.query('rollback')
      throw e
    } finally {
      client.release()
    }
  }

  async deleteDocument(documentId: number): Promise<void> {
    await this.init()
    const client = await this.pool.connect()
    try {
      await client.query('begin')
      await client.query(
        `update knowledge_documents set status = 'deleted', updated_at = now() where id = $1 and status <> 'deleted'`,
        [documentId],
      )
      await client.query('delete from knowledge_chunks where document_id = $1', [documentId])
      await client.query('commit')
    } catch (e) {
      await client.query('rollback')
      throw e
    } finally {
      client.release()
    }
  }

  async hasKnowledge(communityId: string): Promise<boolean> {
    await this.init()
    const { rows } = await this.pool.query<{ present: boolean }>(
      `select exists(select 1 from knowledge_documents where community_id = $1 and status = 'active') as present`,
      [communityId],
    )
    return rows[0]?.present === true
  }

  async listChunks(communityId: string): Promise<KnowledgeChunk[]> {
    await this.init()
    const { rows } = await this.pool.query<ChunkRow>(
      `select c.* from knowledge_chunks c
         join knowledge_documents d on d.id = c.document_id
        where c.community_id = $1 and d.status = 'active'
        order by c.id asc`,
      [communityId],
    )
    return rows.map(mapChunkRow)
  }

  async listDocuments(communityId: string): Promise<KnowledgeDocument[]> {
    await this.init()
    const { rows } = await this.pool.query<DocumentRow>(
      `select * from knowledge_documents where community_id = $1 and status = 'active' order by id asc`,
      [communityId],
    )
    return rows.map(mapDocumentRow)
  }

  async getDocument(documentId: number): Promise<KnowledgeDocument | null> {
    await this.init()
    const { rows } = await this.pool.query<DocumentRow>('select * from knowledge_documents where id = $1', [documentId])
    return rows[0] ? mapDocumentRow(rows[0]) : null
  }
}

function toFormat(value: string): DocumentFormat {
  if (!isSupportedFormat(value)) throw new Error(`invalid_document_format: ${value}`)
  return value
}

function mapDocumentRow(row: DocumentRow): KnowledgeDocument {
  return {
    id: Number(row.id),
    communityId: row.community_id,
    name: row.name,
    format: toFormat(row.format),
    sizeBytes: Number(row.size_bytes),
    location: row.location,
    chunkCount: Number(row.chunk_count),
    totalChars: Number(row.total_chars),
    uploadedBy: row.uploaded_by,
    status: row.status === 'deleted' ? 'deleted' : 'active',
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
    updatedAt: row.updated_at instanceof Date ? row.updated_at.toISOString() : String(row.updated_at),
  }
}

function mapChunkRow(row: ChunkRow): KnowledgeChunk {
  return {
    id: Number(row.id),
    documentId: Number(row.document_id),
    communityId: row.community_id,
    index: Number(row.chunk_index),
    content: row.content,
    keywords: row.keywords || [],
    charCount: Number(row.char_count),
  }
}
