import { Clock, systemClock } from '../types'

export const MEMORY_MAX_ROUNDS = 5
export const MEMORY_TTL_MS = 30 * 60 * 1000

export type TurnRole = 'user' | 'assistant'

export interface ConversationTurn {
  role: TurnRole
  content: string
}

interface StoredTurn extends ConversationTurn {
  at: number
}

export interface ConversationMemoryOptions {
  maxRounds?: number
  ttlMs?: number
  clock?: Clock
}

/**
 * Short-term, per (community, user) chat history. Lives for the process
 * lifetime only; a restart starts every conversation fresh.
 *
 * Every mutation runs synchronously between awaits, so concurrent tasks for
 * the same key never interleave inside a read-prune-write cycle.
 */
export class ConversationMemory {
  private readonly buckets = new Map<string, Map<string, StoredTurn[]>>()
  private lastSweep = 0
  private readonly maxTurns: number
  private readonly ttlMs: number
  private readonly clock: Clock

  constructor(opts: ConversationMemoryOptions = {}) {
    this.maxTurns = Math.max(1, opts.maxRounds ?? MEMORY_MAX_ROUNDS) * 2
    this.ttlMs = opts.ttlMs ?? MEMORY_TTL_MS
    this.clock = opts.clock ?? systemClock
  }

  /** Number of (community, user) buckets currently held. */
  get size() {
    let total = 0
    for (const community of this.buckets.values()) total += community.size
    return total
  }

  append(communityId: string, userId: string, role: TurnRole, content: string): void {
    this.sweep(this.clock.now())
    let community = this.buckets.get(communityId)
    if (!community) {
      community = new Map()
      this.buckets.set(communityId, community)
    }
    const turns = community.get(userId) || []
    turns.push({ role, content, at: this.clock.now() })
    if (turns.length > this.maxTurns) turns.splice(0, turns.length - this.maxTurns)
    community.set(userId, turns)
  }

  history(communityId: string, userId: string): ConversationTurn[] {
    const community = this.buckets.get(communityId)
    const turns = community?.get(userId)
    if (!community || !turns) return []
    const now = this.clock.now()
    const kept = turns.filter((t) => now - t.at < this.ttlMs).slice(-this.maxTurns)
    if (kept.length) {
      community.set(userId, kept)
    } else {
      community.delete(userId)
      if (!community.size) this.buckets.delete(communityId)
    }
    return kept.map(({ role, content }) => ({ role, content }))
  }

  /** Drops buckets whose newest turn has expired; runs at most once per ttl. */
  private sweep(now: number) {
    if (now - this.lastSweep < this.ttlMs) return
    this.lastSweep = now
    for (const [communityId, community] of this.buckets) {
      for (const [userId, turns] of community) {
        const last = turns[turns.length - 1]
        if (!last || now - last.at >= this.ttlMs) community.delete(userId)
      }
      if (!community.size) this.buckets.delete(communityId)
    }
  }

  clear(communityId: string, userId?: string): void {
    if (userId === undefined) {
      this.buckets.delete(communityId)
      return
    }
    const community = this.buckets.get(communityId)
    community?.delete(userId)
    if (community && !community.size) this.buckets.delete(communityId)
  }
}
