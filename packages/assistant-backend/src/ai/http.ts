import { Hooks } from '../types'
import { CancelledError } from './resilience'

export interface HttpRequestOptions {
  url: string
  method?: string
  headers?: Record<string, string>
  body?: unknown
  expectedStatus?: number | number[]
  /** Per-request deadline; 0 or absent disables it. */
  timeoutMs?: number
  signal?: AbortSignal
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  data: unknown
}

export interface HttpClient {
  request(options: HttpRequestOptions, hooks?: Hooks): Promise<HttpResponse>
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly data: unknown) {
    super(`unexpected_status: ${status}`)
    this.name = 'HttpStatusError'
  }
}

export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`request_timeout: ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
  }
}

export function mergeSignals(signals: (AbortSignal | undefined)[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const cleanups: (() => void)[] = []
  for (const s of signals) {
    if (!s) continue
    if (s.aborted) {
      controller.abort(s.reason)
      break
    }
    const onAbort = () => controller.abort(s.reason)
    s.addEventListener('abort', onAbort, { once: true })
    cleanups.push(() => s.removeEventListener('abort', onAbort))
  }
  return { signal: controller.signal, dispose: () => cleanups.forEach((fn) => fn()) }
}

/**
 * Single-shot JSON client over global fetch. Retrying is left to the caller so
 * that the concurrency gate can be released between attempts.
 */
export class FetchHttpClient implements HttpClient {
  async request(options: HttpRequestOptions, hooks?: Hooks): Promise<HttpResponse> {
    const { url, method = 'POST', headers = {}, body, expectedStatus = [200], timeoutMs = 0, signal } = options
    const timeout = new AbortController()
    const timer = timeoutMs > 0 ? setTimeout(() => timeout.abort(), timeoutMs) : undefined
    const merged = mergeSignals([signal, timeout.signal])
    try {
      const res = await fetch(url, {
        method,
        headers: { 'content-type': 'application/json', ...headers },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: merged.signal,
      })
      const data: unknown = await res.json().catch(() => undefined)
      const okStatuses = Array.isArray(expectedStatus) ? expectedStatus : [expectedStatus]
      if (!okStatuses.includes(res.status)) throw new HttpStatusError(res.status, data)
      return { status: res.status, headers: Object.fromEntries(res.headers.entries()), data }
    } catch (err) {
      if (signal?.aborted) throw new CancelledError()
      if (timeout.signal.aborted) {
        hooks?.logger?.warn('[http] request timed out', { url, timeoutMs })
        throw new RequestTimeoutError(timeoutMs)
      }
      hooks?.logger?.error('[http] request failed', err)
      throw err
    } finally {
      if (timer) clearTimeout(timer)
      merged.dispose()
    }
  }
}
