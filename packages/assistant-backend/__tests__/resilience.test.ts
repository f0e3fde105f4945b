import { describe, expect, it, vi } from 'vitest'
import { CancelledError, exponentialBackoff, fixedBackoff, withRetry } from '../src/ai/resilience'

const noSleep = vi.fn(async (_ms: number) => undefined)

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`)
      return 'done'
    })
    const onTrace = vi.fn()
    const result = await withRetry(fn, { attempts: 3, backoff: fixedBackoff(0) }, { onTrace })
    expect(result).toBe('done')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onTrace).toHaveBeenCalledWith({ name: 'retry_backoff', meta: { attempt: 1, sleep: 0 } })
    expect(onTrace).toHaveBeenLastCalledWith(expect.objectContaining({ name: 'retry_success' }))
  })

  it('rethrows the last failure after the final attempt', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`)
    })
    await expect(withRetry(fn, { attempts: 3, backoff: fixedBackoff(0) })).rejects.toThrow('fail 3')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('sleeps for the backoff delay between attempts', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined)
    const fn = vi.fn(async () => {
      throw new Error('down')
    })
    await expect(withRetry(fn, { attempts: 3, backoff: fixedBackoff(1000), sleep })).rejects.toThrow('down')
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([1000, 1000])
  })

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController()
    const fn = vi.fn(async () => {
      controller.abort()
      throw new Error('aborted mid-call')
    })
    await expect(
      withRetry(fn, { attempts: 3, backoff: fixedBackoff(0), signal: controller.signal, sleep: noSleep }),
    ).rejects.toBeInstanceOf(CancelledError)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('does not start when already cancelled', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn(async () => 'never')
    await expect(withRetry(fn, { attempts: 3, backoff: fixedBackoff(0), signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    )
    expect(fn).not.toHaveBeenCalled()
  })

  it('interrupts a backoff sleep on abort', async () => {
    const controller = new AbortController()
    const fn = vi.fn(async () => {
      setTimeout(() => controller.abort(), 5)
      throw new Error('down')
    })
    await expect(withRetry(fn, { attempts: 3, backoff: fixedBackoff(60_000), signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    )
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe('backoff strategies', () => {
  it('grows exponentially up to the cap without jitter', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 100, factor: 2, maxDelayMs: 500, jitter: false })
    expect([1, 2, 3, 4].map(backoff)).toEqual([100, 200, 400, 500])
  })
})
