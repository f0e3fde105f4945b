import { describe, expect, it, vi } from 'vitest'
import { HttpClient, HttpRequestOptions, HttpResponse, HttpStatusError } from '../src/ai/http'
import { FAILURE_MESSAGE, ModelClient, RATE_LIMITED_MESSAGE } from '../src/ai/model-client'
import { CancelledError } from '../src/ai/resilience'
import { Semaphore } from '../src/ai/semaphore'
import { AnswerRequest } from '../src/ai/types'
import { InvalidConfigError } from '../src/ai/validation'

type Handler = (options: HttpRequestOptions, call: number) => Promise<HttpResponse>

class FakeHttp implements HttpClient {
  calls: HttpRequestOptions[] = []
  constructor(private readonly handler: Handler) {}

  async request(options: HttpRequestOptions): Promise<HttpResponse> {
    this.calls.push(options)
    return this.handler(options, this.calls.length)
  }
}

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}

function completion(content: string, usage?: unknown): HttpResponse {
  return { status: 200, headers: {}, data: usage === undefined ? { choices: [{ message: { content } }] } : { choices: [{ message: { content } }], usage } }
}

function request(overrides: Partial<AnswerRequest> = {}): AnswerRequest {
  return {
    communityId: 'c1',
    userId: 'u1',
    question: 'What are the rules?',
    history: [],
    knowledgeContext: '',
    config: { systemPrompt: 'Be brief.', temperature: 0.5, maxTokens: 256 },
    ...overrides,
  }
}

const noSleep = vi.fn(async (_ms: number) => undefined)

describe('ModelClient', () => {
  it('sends a chat completion request and returns exact usage', async () => {
    const http = new FakeHttp(async () => completion('Be kind.', { prompt_tokens: 12, completion_tokens: 5, total_tokens: 17 }))
    const client = new ModelClient({ apiKey: 'test-key', baseUrl: 'https://model.test/v1/' }, { http, logger: quietLogger() })

    const result = await client.answer(request())

    expect(result).toMatchObject({ status: 'ok', content: 'Be kind.', promptTokens: 12, completionTokens: 5, totalTokens: 17, attempts: 1 })
    expect(result.requestId).toMatch(/^[0-9a-f-]{36}$/)
    expect(http.calls).toHaveLength(1)
    expect(http.calls[0]).toMatchObject({
      url: 'https://model.test/v1/chat/completions',
      method: 'POST',
      headers: { Authorization: 'Bearer test-key' },
      expectedStatus: [200],
      timeoutMs: 30_000,
      body: {
        model: 'deepseek-chat',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'What are the rules?' },
        ],
        temperature: 0.5,
        max_tokens: 256,
      },
    })
  })

  it('defaults missing usage fields to zero', async () => {
    const http = new FakeHttp(async (_opts, call) =>
      call === 1 ? completion('first') : completion('second', { prompt_tokens: 3, total_tokens: null }),
    )
    const client = new ModelClient({ apiKey: 'test-key' }, { http, logger: quietLogger() })
    expect(await client.answer(request())).toMatchObject({ status: 'ok', promptTokens: 0, completionTokens: 0, totalTokens: 0 })
    expect(await client.answer(request())).toMatchObject({ status: 'ok', promptTokens: 3, completionTokens: 0, totalTokens: 0 })
  })

  it('returns the failure result after three failed attempts', async () => {
    let now = 0
    const clock = { now: () => now }
    const http = new FakeHttp(async () => {
      now += 100
      throw new HttpStatusError(502, undefined)
    })
    const sleep = vi.fn(async (_ms: number) => undefined)
    const client = new ModelClient({ apiKey: 'test-key' }, { http, sleep, clock, logger: quietLogger() })

    const result = await client.answer(request())

    expect(result).toMatchObject({
      status: 'failed',
      content: FAILURE_MESSAGE,
      totalTokens: 0,
      promptTokens: 0,
      completionTokens: 0,
      latencyMs: 300,
      attempts: 3,
      error: 'unexpected_status: 502',
    })
    expect(http.calls).toHaveLength(3)
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([1000, 1000])
  })

  it('treats a malformed payload as a failed attempt', async () => {
    const http = new FakeHttp(async (_opts, call) =>
      call === 1 ? { status: 200, headers: {}, data: { choices: [] } } : completion('recovered'),
    )
    const client = new ModelClient({ apiKey: 'test-key' }, { http, sleep: noSleep, logger: quietLogger() })
    expect(await client.answer(request())).toMatchObject({ status: 'ok', content: 'recovered', attempts: 2 })
  })

  it('short-circuits once the community exceeds its rate limit', async () => {
    const http = new FakeHttp(async () => completion('ok'))
    const client = new ModelClient({ apiKey: 'test-key', rateLimitPerMinute: 1 }, { http, logger: quietLogger() })

    expect((await client.answer(request())).status).toBe('ok')
    const limited = await client.answer(request())
    expect(limited).toMatchObject({ status: 'rate_limited', content: RATE_LIMITED_MESSAGE, totalTokens: 0, latencyMs: 0, attempts: 0 })
    expect((await client.answer(request({ communityId: 'c2' }))).status).toBe('ok')
    expect((await client.answer(request({ communityId: '' }))).status).toBe('ok')
    expect(http.calls).toHaveLength(3)
  })

  it('keeps in-flight calls within the concurrency limit', async () => {
    let active = 0
    let peak = 0
    const http = new FakeHttp(async () => {
      active++
      peak = Math.max(peak, active)
      await new Promise((resolve) => setTimeout(resolve, 5))
      active--
      return completion('ok')
    })
    const client = new ModelClient({ apiKey: 'test-key', maxConcurrency: 2 }, { http, logger: quietLogger() })
    const results = await Promise.all(Array.from({ length: 6 }, (_, i) => client.answer(request({ communityId: `c${i}` }))))
    expect(results.every((r) => r.status === 'ok')).toBe(true)
    expect(peak).toBe(2)
  })

  it('frees the gate slot while backing off', async () => {
    const gate = new Semaphore(1)
    const seen: number[] = []
    const sleep = vi.fn(async (_ms: number) => {
      seen.push(gate.available)
    })
    const http = new FakeHttp(async (_opts, call) => {
      if (call === 1) throw new Error('socket hang up')
      return completion('ok')
    })
    const client = new ModelClient({ apiKey: 'test-key' }, { http, gate, sleep, logger: quietLogger() })
    expect((await client.answer(request())).status).toBe('ok')
    expect(seen).toEqual([1])
  })

  it('cancels without further attempts and releases the gate', async () => {
    const gate = new Semaphore(1)
    const controller = new AbortController()
    const http = new FakeHttp(
      (options) =>
        new Promise<HttpResponse>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new CancelledError()))
        }),
    )
    const client = new ModelClient({ apiKey: 'test-key' }, { http, gate, sleep: noSleep, logger: quietLogger() })

    const pending = client.answer(request({ signal: controller.signal }))
    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(gate.available).toBe(0)
    controller.abort()
    const result = await pending

    expect(result).toMatchObject({ status: 'cancelled', totalTokens: 0, attempts: 1 })
    expect(http.calls).toHaveLength(1)
    expect(gate.available).toBe(1)
  })

  it('rejects invalid settings', () => {
    expect(() => new ModelClient({ apiKey: '' })).toThrow(InvalidConfigError)
    expect(() => new ModelClient({ apiKey: 'test-key', baseUrl: 'not a url' })).toThrow(InvalidConfigError)
    expect(() => new ModelClient({ apiKey: 'test-key', maxConcurrency: 0 })).toThrow(InvalidConfigError)
  })
})
