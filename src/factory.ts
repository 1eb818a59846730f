/**
 * LLM Client Factory
 *
 * Builds each provider's fully wrapped client once (adapter → retry →
 * breaker → cache) and hands out the same instance on every later request,
 * so one breaker and one cache are shared by every caller in the process.
 *
 * Construct one factory at startup and pass it (or its default client) to
 * the request-handling code.
 */

import { InMemoryResponseCache } from './caching/memory'
import { ResilientLLMClient } from './client'
import type { LLMConfig } from './config'
import type { FetchFn } from './http'
import { silentLogger, type Logger } from './logger'
import { GroqProvider } from './providers/groq'
import { MockProvider } from './providers/mock'
import { OllamaProvider } from './providers/ollama'
import type { LLMProvider } from './providers/types'
import { CircuitBreaker } from './resilience/circuit-breaker'
import { RetryPolicy } from './resilience/retry'
import type { CircuitStatus, ProviderName, ProviderResponse } from './types'

export interface LLMClientFactoryDependencies {
  readonly logger?: Logger | undefined
  readonly fetchFn?: FetchFn | undefined
  readonly now?: (() => number) | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly random?: (() => number) | undefined
  /** Simulated latency for the mock provider */
  readonly mockLatencyMs?: number | undefined
}

export class LLMClientFactory {
  private readonly clients = new Map<ProviderName, ResilientLLMClient>()
  private readonly logger: Logger

  constructor(
    readonly config: LLMConfig,
    private readonly deps: LLMClientFactoryDependencies = {}
  ) {
    this.logger = deps.logger ?? silentLogger
  }

  /** The configured provider's client. */
  defaultClient(): ResilientLLMClient {
    return this.getClient(this.config.provider)
  }

  getClient(providerName: ProviderName = this.config.provider): ResilientLLMClient {
    const existing = this.clients.get(providerName)
    if (existing) return existing

    const client = this.buildClient(providerName)
    this.clients.set(providerName, client)
    return client
  }

  /**
   * Circuit status for a provider. Providers never requested report a fresh CLOSED breaker.
   */
  getCircuitStatus(providerName: ProviderName = this.config.provider): CircuitStatus {
    return this.getClient(providerName).getCircuitStatus()
  }

  /** Clear every provider's cache. */
  clearCache(): void {
    for (const client of this.clients.values()) {
      client.clearCache()
    }
  }

  private buildClient(providerName: ProviderName): ResilientLLMClient {
    const provider = this.createProvider(providerName)
    const { logger, now } = this.deps
    return new ResilientLLMClient({
      provider,
      retry: new RetryPolicy(this.config.retry, {
        logger,
        sleep: this.deps.sleep,
        random: this.deps.random
      }),
      breaker: new CircuitBreaker(provider.name, this.config.breaker, { logger, now }),
      cache: new InMemoryResponseCache<ProviderResponse>(this.config.cache, { logger, now }),
      logger,
      now
    })
  }

  private createProvider(providerName: ProviderName): LLMProvider {
    const { config } = this
    const shared = {
      timeoutMs: config.timeoutMs,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      fetchFn: this.deps.fetchFn
    }

    switch (providerName) {
      case 'groq': {
        const apiKey = config.groq.apiKey
        if (!apiKey) {
          this.logger.warn('No Groq API key configured, using the mock provider instead')
          return new MockProvider({ latencyMs: this.deps.mockLatencyMs })
        }
        this.logger.verbose(`Using Groq provider with model ${config.groq.model}`)
        return new GroqProvider({ ...shared, apiKey, model: config.groq.model, baseUrl: config.groq.baseUrl })
      }
      case 'ollama':
        this.logger.verbose(`Using Ollama provider at ${config.ollama.host} with model ${config.ollama.model}`)
        return new OllamaProvider({ ...shared, host: config.ollama.host, model: config.ollama.model })
      case 'mock':
        return new MockProvider({ latencyMs: this.deps.mockLatencyMs })
    }
  }
}
