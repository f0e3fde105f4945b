import { describe, expect, it } from 'vitest'
import { ConversationMemory } from '../src/memory/conversation-memory'

function manualClock(start = 0) {
  let now = start
  return { now: () => now, advance: (ms: number) => (now += ms) }
}

describe('ConversationMemory', () => {
  it('keeps only the last five rounds', () => {
    const memory = new ConversationMemory()
    for (let i = 0; i < 20; i++) {
      memory.append('c1', 'u1', 'user', `question ${i}`)
      memory.append('c1', 'u1', 'assistant', `reply ${i}`)
    }
    const history = memory.history('c1', 'u1')
    expect(history).toHaveLength(10)
    expect(history[0]).toEqual({ role: 'user', content: 'question 15' })
    expect(history[9]).toEqual({ role: 'assistant', content: 'reply 19' })
  })

  it('separates users and communities', () => {
    const memory = new ConversationMemory()
    memory.append('c1', 'u1', 'user', 'from u1')
    memory.append('c1', 'u2', 'user', 'from u2')
    memory.append('c2', 'u1', 'user', 'elsewhere')
    expect(memory.history('c1', 'u1')).toEqual([{ role: 'user', content: 'from u1' }])
    expect(memory.history('c2', 'u1')).toEqual([{ role: 'user', content: 'elsewhere' }])
    expect(memory.history('c3', 'u1')).toEqual([])
  })

  it('drops turns once they are older than the ttl', () => {
    const clock = manualClock()
    const memory = new ConversationMemory({ ttlMs: 1_000, clock })
    memory.append('c1', 'u1', 'user', 'old')
    clock.advance(600)
    memory.append('c1', 'u1', 'assistant', 'newer')
    clock.advance(400)
    expect(memory.history('c1', 'u1')).toEqual([{ role: 'assistant', content: 'newer' }])
    clock.advance(600)
    expect(memory.history('c1', 'u1')).toEqual([])
  })

  it('honours a custom round limit', () => {
    const memory = new ConversationMemory({ maxRounds: 1 })
    memory.append('c1', 'u1', 'user', 'a')
    memory.append('c1', 'u1', 'assistant', 'b')
    memory.append('c1', 'u1', 'user', 'c')
    expect(memory.history('c1', 'u1').map((t) => t.content)).toEqual(['b', 'c'])
  })

  it('clears a user or a whole community', () => {
    const memory = new ConversationMemory()
    memory.append('c1', 'u1', 'user', 'one')
    memory.append('c1', 'u2', 'user', 'two')
    memory.clear('c1', 'u1')
    expect(memory.history('c1', 'u1')).toEqual([])
    expect(memory.history('c1', 'u2')).toHaveLength(1)
    memory.clear('c1')
    expect(memory.history('c1', 'u2')).toEqual([])
  })

  it('evicts expired conversations that are never read again', () => {
    const clock = manualClock()
    const memory = new ConversationMemory({ ttlMs: 1_000, clock })
    memory.append('c1', 'u1', 'user', 'stale')
    memory.append('c2', 'u2', 'user', 'stale too')
    clock.advance(500)
    memory.append('c1', 'u3', 'user', 'recent')
    expect(memory.size).toBe(3)
    clock.advance(700)
    memory.append('c3', 'u4', 'user', 'fresh')
    expect(memory.size).toBe(2)
    expect(memory.history('c1', 'u3')).toEqual([{ role: 'user', content: 'recent' }])
  })
})
