import { describe, expect, it, vi } from 'vitest'
import type { ResilientLLMClient } from './client'
import { FALLBACK_REPLIES, pickFallbackReply, replyOrFallback } from './fallback'

type ReplyClient = Pick<ResilientLLMClient, 'generateReply'>

describe('pickFallbackReply', () => {
  it('picks by the random source', () => {
    expect(pickFallbackReply(() => 0)).toBe(FALLBACK_REPLIES[0])
    expect(pickFallbackReply(() => 0.6)).toBe(FALLBACK_REPLIES[2])
    expect(pickFallbackReply(() => 0.999)).toBe(FALLBACK_REPLIES[3])
  })
})

describe('replyOrFallback', () => {
  const history = [{ role: 'user' as const, content: 'The workload was heavy.' }]

  it('returns the generated reply', async () => {
    const client: ReplyClient = { generateReply: vi.fn(async () => ({ ok: true as const, value: 'Tell me more.' })) }

    expect(await replyOrFallback(client, history)).toEqual({ text: 'Tell me more.', degraded: false })
  })

  it('degrades to a canned reply when the assistant is unavailable', async () => {
    const error = { type: 'circuit_open' as const, message: 'Circuit for groq is open; retry in 42s' }
    const client: ReplyClient = { generateReply: vi.fn(async () => ({ ok: false as const, error })) }

    const reply = await replyOrFallback(client, history, { random: () => 0.3 })

    expect(reply).toEqual({ text: FALLBACK_REPLIES[1], degraded: true, error })
  })

  it('passes reply options through without the random source', async () => {
    const generateReply = vi.fn<ReplyClient['generateReply']>(async () => ({ ok: true, value: 'ok' }))

    await replyOrFallback({ generateReply }, history, { systemPrompt: 'Be kind.', random: () => 0 })

    expect(generateReply).toHaveBeenCalledWith(history, { systemPrompt: 'Be kind.' })
  })
})
