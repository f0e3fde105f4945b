import { setTimeout as delay } from 'node:timers/promises'
import { Hooks, errorMessage } from '../types'

/** Delay in ms before the attempt following `attempt` (1-based). */
export type BackoffStrategy = (attempt: number) => number

export function fixedBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs
}

export interface ExponentialBackoffOptions {
  baseDelayMs: number
  factor?: number
  maxDelayMs?: number
  jitter?: boolean
}

export function exponentialBackoff(options: ExponentialBackoffOptions): BackoffStrategy {
  const { baseDelayMs, factor = 2, maxDelayMs = 5000, jitter = true } = options
  return (attempt) => {
    const expo = baseDelayMs * Math.pow(factor, attempt - 1)
    return Math.min(maxDelayMs, jitter ? expo * (0.5 + Math.random()) : expo)
  }
}

export class CancelledError extends Error {
  constructor(message = 'cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal })
  } catch (err) {
    if (signal?.aborted) throw new CancelledError()
    throw err
  }
}

export interface RetryOptions {
  /** Total attempts, including the first one. */
  attempts: number
  backoff: BackoffStrategy
  signal?: AbortSignal
  sleep?: Sleep
}

/**
 * Runs `fn` until it resolves or `attempts` are used up, rethrowing the last
 * failure. Cancellation is checked before every attempt and interrupts the
 * backoff sleep; a cancelled run throws `CancelledError`.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions, hooks?: Hooks): Promise<T> {
  const { attempts, backoff, signal, sleep = defaultSleep } = options
  const total = Math.max(1, attempts)
  let attempt = 1
  while (true) {
    if (signal?.aborted) throw new CancelledError()
    const start = Date.now()
    try {
      const result = await fn(attempt)
      hooks?.onTrace?.({ name: 'retry_success', meta: { attempt, duration: Date.now() - start } })
      return result
    } catch (err) {
      if (err instanceof CancelledError || signal?.aborted) throw new CancelledError()
      if (attempt >= total) throw err
      const wait = backoff(attempt)
      hooks?.logger?.warn('[retry] transient failure', { attempt, sleep: wait, error: errorMessage(err) })
      hooks?.onTrace?.({ name: 'retry_backoff', meta: { attempt, sleep: wait } })
      if (wait > 0) await sleep(wait, signal)
      attempt += 1
    }
  }
}
