import { Pool } from 'pg'
import { HttpClient } from './ai/http'
import { ModelClient } from './ai/model-client'
import { BackoffStrategy, Sleep } from './ai/resilience'
import { AssistantEngine } from './engine'
import { buildPostgresPool } from './env'
import { TextExtractors } from './kb/parser'
import { KnowledgeBaseService } from './kb/service'
import { MemoryKnowledgeStore } from './kb/store-memory'
import { PostgresKnowledgeStore } from './kb/store-postgres'
import { ConversationMemory } from './memory/conversation-memory'
import { Clock, Logger, TraceEvent, systemClock } from './types'
import { MemoryUsageLog, PostgresUsageLog } from './usage-log'

export interface AssistantEngineConfig {
  apiKey?: string
  baseUrl?: string
  model?: string
  timeoutMs?: number
  maxAttempts?: number
  retryDelayMs?: number
  maxConcurrency?: number
  rateLimitPerMinute?: number
  memoryTtlMs?: number
  memoryMaxRounds?: number
  topK?: number
  chunkSize?: number
  /** Reuse of a community's chunk snapshot between questions, in ms. Off by default. */
  retrievalCacheTtlMs?: number
  postgresUrl?: string
  pool?: Pool
  extractors?: TextExtractors
  http?: HttpClient
  backoff?: BackoffStrategy
  sleep?: Sleep
  clock?: Clock
  logger?: Logger
  onTrace?: (event: TraceEvent) => void
}

function getLogger(logger?: Logger): Logger {
  const base: Logger = console
  return { ...base, ...(logger || {}) }
}

/**
 * Wires an engine from plain settings: Postgres-backed stores when a pool or
 * connection string is given, in-memory stores otherwise.
 */
export function createAssistantEngine(config: AssistantEngineConfig): AssistantEngine {
  const logger = getLogger(config.logger)
  if (!config.apiKey) throw new Error('MODEL_API_KEY is required')
  const clock = config.clock ?? systemClock
  const pool = config.pool ?? buildPostgresPool(config.postgresUrl)

  const kb = new KnowledgeBaseService(pool ? new PostgresKnowledgeStore(pool) : new MemoryKnowledgeStore(), logger, {
    ttlMs: config.retrievalCacheTtlMs,
    topK: config.topK,
    chunkSize: config.chunkSize,
    extractors: config.extractors,
    clock,
  })
  const model = new ModelClient(
    {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      model: config.model,
      timeoutMs: config.timeoutMs,
      maxAttempts: config.maxAttempts,
      retryDelayMs: config.retryDelayMs,
      maxConcurrency: config.maxConcurrency,
      rateLimitPerMinute: config.rateLimitPerMinute,
    },
    { http: config.http, backoff: config.backoff, sleep: config.sleep, logger, clock, onTrace: config.onTrace },
  )
  const memory = new ConversationMemory({ ttlMs: config.memoryTtlMs, maxRounds: config.memoryMaxRounds, clock })
  const usage = pool ? new PostgresUsageLog(pool) : new MemoryUsageLog()

  logger.info('[engine] created', { storage: pool ? 'postgres' : 'memory' })
  return new AssistantEngine({ kb, memory, model, usage, logger, topK: config.topK })
}

export { AssistantEngine } from './engine'
export type { AskRequest, AssistantEngineDeps } from './engine'
export { loadEnvConfig, loadEnvFile, buildPostgresPool } from './env'
export type { EnvConfig } from './env'
export { KnowledgeBaseService, createKnowledgeBase } from './kb/service'
export type { KnowledgeBaseOptions } from './kb/service'
export { MemoryKnowledgeStore } from './kb/store-memory'
export { PostgresKnowledgeStore } from './kb/store-postgres'
export { chunkText, extractKeywords, normalizeText, tokenize } from './kb/chunking'
export { rankChunks, scoreChunks, renderContext } from './kb/retriever'
export { detectFormat, extractText, UnsupportedFormatError } from './kb/parser'
export { SUPPORTED_FORMATS } from './kb/types'
export type { TextExtractor, TextExtractors } from './kb/parser'
export type {
  DocumentFormat,
  DocumentStatus,
  KnowledgeChunk,
  KnowledgeDocument,
  KnowledgeStore,
  RetrievalResult,
  TextIngestRequest,
  UploadIngestRequest,
} from './kb/types'
export { ConversationMemory } from './memory/conversation-memory'
export type { ConversationTurn } from './memory/conversation-memory'
export { ModelClient, RATE_LIMITED_MESSAGE, FAILURE_MESSAGE } from './ai/model-client'
export type { ModelClientDeps } from './ai/model-client'
export { resolveModelConfig, DEFAULT_SYSTEM_PROMPT } from './ai/config'
export { buildMessages } from './ai/prompt'
export { SlidingWindowRateLimiter } from './ai/rate-limiter'
export { Semaphore } from './ai/semaphore'
export { withRetry, fixedBackoff, exponentialBackoff, CancelledError } from './ai/resilience'
export type { BackoffStrategy, Sleep } from './ai/resilience'
export { FetchHttpClient, HttpStatusError, RequestTimeoutError } from './ai/http'
export type { HttpClient, HttpRequestOptions, HttpResponse } from './ai/http'
export { InvalidConfigError } from './ai/validation'
export type { ModelClientSettings } from './ai/validation'
export type { AnswerRequest, ChatMessage, ModelConfig, ModelResult, ModelResultStatus, ModelUsage } from './ai/types'
export { MemoryUsageLog, PostgresUsageLog } from './usage-log'
export type { UsageLog, UsageRecord, UsageSummary } from './usage-log'
export type { Logger, Clock } from './types'
