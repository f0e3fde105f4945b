import { v4 as uuidv4 } from 'uuid'
import { Clock, Logger, TraceEvent, errorMessage, systemClock } from '../types'
import { FetchHttpClient, HttpClient } from './http'
import { buildMessages } from './prompt'
import { SlidingWindowRateLimiter } from './rate-limiter'
import { BackoffStrategy, CancelledError, Sleep, fixedBackoff, withRetry } from './resilience'
import { Semaphore } from './semaphore'
import { AnswerRequest, ChatMessage, ModelResult, ModelUsage, ZERO_USAGE } from './types'
import { ChatCompletionPayload, ModelClientSettings, isChatCompletionPayload, validateModelClientSettings } from './validation'

export const DEFAULT_BASE_URL = 'https://api.deepseek.com'
export const DEFAULT_MODEL = 'deepseek-chat'
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_MAX_ATTEMPTS = 3
export const DEFAULT_RETRY_DELAY_MS = 1000
export const DEFAULT_MAX_CONCURRENCY = 5
export const DEFAULT_RATE_LIMIT = 10
export const RATE_WINDOW_MS = 60_000

export const RATE_LIMITED_MESSAGE = '⏳ Rate limit reached. Please try again in a moment.'
export const FAILURE_MESSAGE = "Sorry, I'm unable to respond right now. Please try again later."
export const CANCELLED_MESSAGE = 'Request cancelled.'

export interface ModelClientDeps {
  http?: HttpClient
  limiter?: SlidingWindowRateLimiter
  gate?: Semaphore
  backoff?: BackoffStrategy
  sleep?: Sleep
  logger?: Logger
  clock?: Clock
  onTrace?: (event: TraceEvent) => void
}

interface ChatCompletionBody {
  model: string
  messages: ChatMessage[]
  temperature: number
  max_tokens: number
}

/**
 * Outbound chat-completion client. Every outcome comes back as a
 * `ModelResult`; nothing here throws once the client is constructed.
 *
 * Order per call: community rate window, then per attempt the global
 * concurrency gate, the HTTP call under its own timeout, and on failure a
 * backoff sleep taken outside the gate.
 */
export class ModelClient {
  private readonly endpoint: string
  private readonly model: string
  private readonly timeoutMs: number
  private readonly maxAttempts: number
  private readonly http: HttpClient
  private readonly limiter: SlidingWindowRateLimiter
  private readonly gate: Semaphore
  private readonly backoff: BackoffStrategy
  private readonly logger: Logger
  private readonly clock: Clock

  constructor(private readonly settings: ModelClientSettings, private readonly deps: ModelClientDeps = {}) {
    validateModelClientSettings(settings)
    this.endpoint = `${(settings.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`
    this.model = settings.model || DEFAULT_MODEL
    this.timeoutMs = settings.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxAttempts = settings.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.clock = deps.clock ?? systemClock
    this.http = deps.http ?? new FetchHttpClient()
    this.limiter =
      deps.limiter ??
      new SlidingWindowRateLimiter({
        limit: settings.rateLimitPerMinute ?? DEFAULT_RATE_LIMIT,
        windowMs: RATE_WINDOW_MS,
        clock: this.clock,
      })
    this.gate = deps.gate ?? new Semaphore(settings.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY)
    this.backoff = deps.backoff ?? fixedBackoff(settings.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS)
    this.logger = deps.logger ?? console
  }

  async answer(req: AnswerRequest): Promise<ModelResult> {
    const requestId = uuidv4()
    const started = this.clock.now()

    if (req.communityId && !this.limiter.tryAcquire(req.communityId)) {
      this.logger.debug?.('[ai] rate limited', { communityId: req.communityId, requestId })
      return { status: 'rate_limited', content: RATE_LIMITED_MESSAGE, ...ZERO_USAGE, latencyMs: 0, requestId, attempts: 0 }
    }

    const body: ChatCompletionBody = {
      model: req.config.model || this.model,
      messages: buildMessages(req.config.systemPrompt, req.knowledgeContext, req.history, req.question),
      temperature: req.config.temperature,
      max_tokens: req.config.maxTokens,
    }

    let attempts = 0
    try {
      const payload = await withRetry(
        (attempt) => {
          attempts = attempt
          return this.gate.use(() => this.callOnce(body, req.signal), req.signal)
        },
        { attempts: this.maxAttempts, backoff: this.backoff, signal: req.signal, sleep: this.deps.sleep },
        { logger: this.logger, onTrace: this.deps.onTrace },
      )
      const latencyMs = this.clock.now() - started
      const usage = readUsage(payload)
      this.logger.info('[ai] model call completed', { communityId: req.communityId, requestId, attempts, latencyMs, totalTokens: usage.totalTokens })
      return { status: 'ok', content: payload.choices[0].message.content, ...usage, latencyMs, requestId, attempts }
    } catch (err) {
      const latencyMs = this.clock.now() - started
      if (err instanceof CancelledError) {
        this.logger.info('[ai] model call cancelled', { communityId: req.communityId, requestId, attempts })
        return { status: 'cancelled', content: CANCELLED_MESSAGE, ...ZERO_USAGE, latencyMs, requestId, attempts }
      }
      const error = errorMessage(err)
      this.logger.error('[ai] model call failed', { communityId: req.communityId, requestId, attempts, error })
      return { status: 'failed', content: FAILURE_MESSAGE, ...ZERO_USAGE, latencyMs, requestId, attempts, error }
    }
  }

  private async callOnce(body: ChatCompletionBody, signal?: AbortSignal): Promise<ChatCompletionPayload> {
    const res = await this.http.request(
      {
        url: this.endpoint,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.settings.apiKey}` },
        body,
        expectedStatus: [200],
        timeoutMs: this.timeoutMs,
        signal,
      },
      { logger: this.logger, onTrace: this.deps.onTrace },
    )
    if (!isChatCompletionPayload(res.data)) throw new Error('invalid_response_payload')
    return res.data
  }
}

function readUsage(payload: ChatCompletionPayload): ModelUsage {
  const usage = payload.usage
  return {
    promptTokens: usage?.prompt_tokens ?? 0,
    completionTokens: usage?.completion_tokens ?? 0,
    totalTokens: usage?.total_tokens ?? 0,
  }
}
