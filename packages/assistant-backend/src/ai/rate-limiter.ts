import { Clock, systemClock } from '../types'

export interface RateLimiterOptions {
  limit?: number
  windowMs?: number
  clock?: Clock
}

/**
 * Per-key rolling window. A rejected call is not recorded, so callers that
 * back off regain capacity as soon as the oldest accepted call ages out.
 */
export class SlidingWindowRateLimiter {
  private readonly windows = new Map<string, number[]>()
  private lastSweep = 0
  readonly limit: number
  readonly windowMs: number
  private readonly clock: Clock

  constructor(opts: RateLimiterOptions = {}) {
    this.limit = opts.limit ?? 10
    this.windowMs = opts.windowMs ?? 60_000
    this.clock = opts.clock ?? systemClock
  }

  get size() {
    return this.windows.size
  }

  tryAcquire(key: string): boolean {
    const now = this.clock.now()
    this.sweep(now)
    const recent = (this.windows.get(key) || []).filter((t) => now - t < this.windowMs)
    if (recent.length >= this.limit) {
      this.windows.set(key, recent)
      return false
    }
    recent.push(now)
    this.windows.set(key, recent)
    return true
  }

  remaining(key: string): number {
    const now = this.clock.now()
    const recent = (this.windows.get(key) || []).filter((t) => now - t < this.windowMs)
    if (recent.length) this.windows.set(key, recent)
    else this.windows.delete(key)
    return Math.max(0, this.limit - recent.length)
  }

  /** Drops keys whose whole window has aged out; runs at most once per window. */
  private sweep(now: number) {
    if (now - this.lastSweep < this.windowMs) return
    this.lastSweep = now
    for (const [key, stamps] of this.windows) {
      if (!stamps.some((t) => now - t < this.windowMs)) this.windows.delete(key)
    }
  }
}
