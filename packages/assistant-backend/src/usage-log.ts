import { Pool } from 'pg'
import { ModelResultStatus } from './ai/types'
import { nowIso } from './types'

export const USAGE_TEXT_LIMIT = 500

export interface UsageRecord {
  id: number
  communityId: string
  userId: string
  question: string
  answer: string
  promptTokens: number
  completionTokens: number
  totalTokens: number
  latencyMs: number
  status: ModelResultStatus
  createdAt: string
}

export type NewUsageRecord = Omit<UsageRecord, 'id' | 'createdAt'>

export interface UsageSummary {
  calls: number
  totalTokens: number
}

export interface UsageLog {
  init?(): Promise<void>
  record(entry: NewUsageRecord): Promise<UsageRecord>
  /** Newest first. */
  list(communityId: string, opts?: { limit?: number }): Promise<UsageRecord[]>
  summarize(communityId: string): Promise<UsageSummary>
}

const STATUSES: readonly ModelResultStatus[] = ['ok', 'rate_limited', 'failed', 'cancelled']

function toStatus(value: string): ModelResultStatus {
  const found = STATUSES.find((s) => s === value)
  if (!found) throw new Error(`invalid_usage_status: ${value}`)
  return found
}

function truncate(entry: NewUsageRecord): NewUsageRecord {
  return {
    ...entry,
    question: entry.question.slice(0, USAGE_TEXT_LIMIT),
    answer: entry.answer.slice(0, USAGE_TEXT_LIMIT),
  }
}

export class MemoryUsageLog implements UsageLog {
  private records: UsageRecord[] = []
  private nextId = 1

  async record(entry: NewUsageRecord): Promise<UsageRecord> {
    const record: UsageRecord = { ...truncate(entry), id: this.nextId++, createdAt: nowIso() }
    this.records.push(record)
    return record
  }

  async list(communityId: string, opts: { limit?: number } = {}): Promise<UsageRecord[]> {
    const limit = opts.limit ?? 50
    return this.records
      .filter((r) => r.communityId === communityId)
      .reverse()
      .slice(0, limit)
  }

  async summarize(communityId: string): Promise<UsageSummary> {
    const rows = this.records.filter((r) => r.communityId === communityId)
    return { calls: rows.length, totalTokens: rows.reduce((sum, r) => sum + r.totalTokens, 0) }
  }
}

type UsageRow = {
  id: string
  community_id: string
  user_id: string
  question: string
  answer: string
  prompt_tokens: number
  completion_tokens: number
  total_tokens: number
  latency_ms: number
  status: string
  created_at: Date
}

export class PostgresUsageLog implements UsageLog {
  private ready?: Promise<void>

  constructor(private readonly pool: Pool) {}

  init(): Promise<void> {
    if (!this.ready) {
      this.ready = this.pool
        .query(
          `create table if not exists ai_usage_log (
            id bigserial primary key,
            community_id text not null,
            user_id text not null,
            question text not null default '',
            answer text not null default '',
            prompt_tokens integer not null default 0,
            completion_tokens integer not null default 0,
            total_tokens integer not null default 0,
            latency_ms integer not null default 0,
            status text not null,
            created_at timestamptz not null default now()
          );
          create index if not exists ai_usage_log_community_idx on ai_usage_log(community_id, created_at desc);`,
        )
        .then(
          () => undefined,
          (err: unknown) => {
            this.ready = undefined
            throw err
          },
        )
    }
    return this.ready
  }

  async record(entry: NewUsageRecord): Promise<UsageRecord> {
    await this.init()
    const e = truncate(entry)
    const { rows } = await this.pool.query<UsageRow>(
      `insert into ai_usage_log(community_id, user_id, question, answer, prompt_tokens, completion_tokens, total_tokens, latency_ms, status)
       values ($1,$2,$3,$4,$5,$6,$7,$8,$9) returning *`,
      [e.communityId, e.userId, e.question, e.answer, e.promptTokens, e.completionTokens, e.totalTokens, Math.round(e.latencyMs), e.status],
    )
    return mapUsageRow(rows[0])
  }

  async list(communityId: string, opts: { limit?: number } = {}): Promise<UsageRecord[]> {
    await this.init()
    const { rows } = await this.pool.query<UsageRow>(
      'select * from ai_usage_log where community_id = $1 order by id desc limit $2',
      [communityId, opts.limit ?? 50],
    )
    return rows.map(mapUsageRow)
  }

  async summarize(communityId: string): Promise<UsageSummary> {
    await this.init()
    const { rows } = await this.pool.query<{ calls: string; total_tokens: string | null }>(
      'select count(*) as calls, sum(total_tokens) as total_tokens from ai_usage_log where community_id = $1',
      [communityId],
    )
    return { calls: Number(rows[0]?.calls ?? 0), totalTokens: Number(rows[0]?.total_tokens ?? 0) }
  }
}

function mapUsageRow(row: UsageRow): UsageRecord {
  return {
    id: Number(row.id),
    communityId: row.community_id,
    userId: row.user_id,
    question: row.question,
    answer: row.answer,
    promptTokens: Number(row.prompt_tokens),
    completionTokens: Number(row.completion_tokens),
    totalTokens: Number(row.total_tokens),
    latencyMs: Number(row.latency_ms),
    status: toStatus(row.status),
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
  }
}
