import { config } from 'dotenv'
import { Pool } from 'pg'
import { Logger } from './types'

export type EnvConfig = {
  apiKey?: string
  baseUrl?: string
  model?: string
  timeoutMs: number
  maxConcurrency: number
  rateLimitPerMinute: number
  memoryTtlMs: number
  memoryMaxRounds: number
  postgresUrl?: string
}

const toInt = (value: string | undefined, fallback: number, min = 1) => {
  const parsed = Number.parseInt(value ?? '', 10)
  return Number.isNaN(parsed) || parsed < min ? fallback : parsed
}

/**
 * Reads engine settings from the environment, falling back to defaults for
 * anything missing or unparsable.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): EnvConfig {
  const parsed: EnvConfig = {
    apiKey: env.MODEL_API_KEY || undefined,
    baseUrl: env.MODEL_BASE_URL || undefined,
    model: env.MODEL_NAME || undefined,
    timeoutMs: toInt(env.MODEL_TIMEOUT_MS, 30_000),
    maxConcurrency: toInt(env.MODEL_MAX_CONCURRENCY, 5),
    rateLimitPerMinute: toInt(env.RATE_LIMIT_PER_MINUTE, 10),
    memoryTtlMs: toInt(env.MEMORY_TTL_MINUTES, 30) * 60_000,
    memoryMaxRounds: toInt(env.MEMORY_MAX_ROUNDS, 5),
    postgresUrl: env.POSTGRES_URL || env.DATABASE_URL || undefined,
  }

  if (!parsed.apiKey) {
    logger.warn('[env] MODEL_API_KEY not set; the assistant cannot answer questions.')
  }

  if (!parsed.postgresUrl) {
    logger.warn('[env] POSTGRES_URL not set; falling back to in-memory storage (not durable).')
  }

  logger.info('[env] loaded', {
    model: parsed.model ?? 'default',
    concurrency: parsed.maxConcurrency,
    rateLimit: parsed.rateLimitPerMinute,
    postgres: !!parsed.postgresUrl,
  })

  return parsed
}

/**
 * Loads a dotenv file into `process.env`; keys already set win. Returns the
 * keys the file defines. A missing file is not an error.
 */
export function loadEnvFile(path = '.env', logger: Logger = console): string[] {
  const result = config({ path })
  if (result.error) {
    logger.debug?.('[env] no env file applied', { path, error: result.error.message })
    return []
  }
  const keys = Object.keys(result.parsed ?? {})
  logger.info('[env] applied env file', { path, keys: keys.length })
  return keys
}

export function buildPostgresPool(connectionString?: string): Pool | null {
  if (!connectionString) return null
  return new Pool({ connectionString })
}
