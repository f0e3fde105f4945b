import { CancelledError } from './resilience'

type Release = () => void

interface Waiter {
  grant: (release: Release) => void
}

/**
 * Counting semaphore shared by every outbound model call. Slots are handed to
 * waiters in FIFO order; a waiter whose signal aborts leaves the queue
 * without taking a slot.
 */
export class Semaphore {
  private inUse = 0
  private readonly waiters: Waiter[] = []

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) throw new Error(`invalid_semaphore_size: ${max}`)
  }

  get available() {
    return this.max - this.inUse
  }

  get pending() {
    return this.waiters.length
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new CancelledError())
    if (this.inUse < this.max) {
      this.inUse += 1
      return Promise.resolve(this.releaser())
    }
    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter)
        if (idx >= 0) this.waiters.splice(idx, 1)
        reject(new CancelledError())
      }
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(release)
        },
      }
      this.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private releaser(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      // The slot passes straight to the next waiter; inUse is unchanged.
      if (next) next.grant(this.releaser())
      else this.inUse -= 1
    }
  }
}
