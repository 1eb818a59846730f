import { describe, expect, it, vi } from 'vitest'
import { resolveConfig } from './config'
import { LLMClientFactory } from './factory'
import type { FetchFn } from './http'
import type { Logger } from './logger'

function createMockLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = []
  return {
    warnings,
    log: vi.fn(),
    verbose: vi.fn(),
    success: vi.fn(),
    warn: (msg: string) => {
      warnings.push(msg)
    },
    error: vi.fn()
  }
}

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 })
}

describe('LLMClientFactory', () => {
  it('returns the same client for repeated requests', () => {
    const factory = new LLMClientFactory(resolveConfig({ provider: 'mock' }))

    const first = factory.defaultClient()
    const second = factory.getClient('mock')

    expect(second).toBe(first)
    expect(first.providerName).toBe('mock')
  })

  it('builds separate clients per provider', () => {
    const factory = new LLMClientFactory(resolveConfig({ provider: 'mock' }))

    expect(factory.getClient('ollama')).not.toBe(factory.getClient('mock'))
    expect(factory.getClient('ollama').model).toBe('llama2')
  })

  it('falls back to the mock provider when Groq has no API key', () => {
    const logger = createMockLogger()
    const factory = new LLMClientFactory(resolveConfig({ provider: 'groq' }), { logger })

    const client = factory.defaultClient()

    expect(client.providerName).toBe('mock')
    expect(logger.warnings).toEqual(['No Groq API key configured, using the mock provider instead'])
  })

  it('wires Groq with the configured key and injected fetch', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => completion('Hello from Groq'))
    const factory = new LLMClientFactory(
      resolveConfig({ provider: 'groq', groq: { apiKey: 'test-secret', model: 'llama3-8b-8192' } }),
      { fetchFn }
    )

    const result = await factory.defaultClient().generateReply([{ role: 'user', content: 'Hi' }])

    expect(result).toEqual({ ok: true, value: 'Hello from Groq' })
    expect(factory.defaultClient().model).toBe('llama3-8b-8192')
    expect(fetchFn).toHaveBeenCalledTimes(1)
  })

  it('scores neutral when Groq replies with non-text content', async () => {
    const logger = createMockLogger()
    const fetchFn = vi.fn<FetchFn>(
      async () => new Response(JSON.stringify({ choices: [{ message: { content: 42 } }] }), { status: 200 })
    )
    const factory = new LLMClientFactory(resolveConfig({ provider: 'groq', groq: { apiKey: 'test-secret' } }), {
      fetchFn,
      logger
    })

    await expect(factory.defaultClient().analyzeSentiment('Great team')).resolves.toBe(0)
    expect(logger.warnings).toEqual(['Sentiment analysis failed (unknown): Empty response from API'])
  })

  it('shares one breaker across every caller of a provider', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('bad key', { status: 401 }))
    const factory = new LLMClientFactory(
      resolveConfig({
        provider: 'groq',
        groq: { apiKey: 'test-secret' },
        breaker: { failureThreshold: 2 }
      }),
      { fetchFn }
    )

    await factory.getClient('groq').generateReply([{ role: 'user', content: 'a' }])
    await factory.getClient('groq').generateReply([{ role: 'user', content: 'b' }])

    expect(factory.getCircuitStatus('groq').state).toBe('OPEN')
    expect(factory.getCircuitStatus('groq').failureCount).toBe(2)
  })

  it('reports a closed breaker for providers never used', () => {
    const factory = new LLMClientFactory(resolveConfig({ provider: 'mock' }))

    expect(factory.getCircuitStatus('ollama')).toEqual({
      state: 'CLOSED',
      failureCount: 0,
      openedAt: null,
      cooldownRemainingMs: 0
    })
  })

  it('clearCache empties every client cache', async () => {
    const factory = new LLMClientFactory(resolveConfig({ provider: 'mock' }))
    const client = factory.defaultClient()
    await client.generateReply([{ role: 'user', content: 'Hello' }])
    expect(client.cacheStats().size).toBe(1)

    factory.clearCache()

    expect(client.cacheStats().size).toBe(0)
  })
})
