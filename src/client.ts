/**
 * Resilient LLM Client
 *
 * Composes one provider adapter with its retry policy, circuit breaker and
 * response cache:
 *
 *   cache (hit returns) → breaker (fails fast when open) → retry → adapter
 */

import { generateConversationCacheKey } from './caching/key'
import type { InMemoryResponseCache } from './caching/memory'
import type { CacheStats } from './caching/types'
import {
  ANALYSIS_INSTRUCTIONS,
  FOLLOW_UP_INSTRUCTIONS,
  INTERVIEW_INSTRUCTIONS,
  INTERVIEW_TEMPERATURES,
  type InterviewAnalysis
} from './interview'
import { silentLogger, type Logger } from './logger'
import type { LLMProvider } from './providers/types'
import type { CircuitBreaker } from './resilience/circuit-breaker'
import type { RetryPolicy } from './resilience/retry'
import { buildSentimentRequest, NEUTRAL_SENTIMENT, parseSentimentScore } from './sentiment'
import {
  type ChatMessage,
  type CircuitStatus,
  type ConversationRequest,
  createConversationRequest,
  type GenerationParams,
  type ProviderName,
  type ProviderResponse,
  type Result
} from './types'

export interface InvokeOptions {
  /** Cancels this caller's wait only */
  readonly signal?: AbortSignal | undefined
}

export interface GenerateReplyOptions extends GenerationParams, InvokeOptions {
  /** Prepended as a system message */
  readonly systemPrompt?: string | undefined
}

/** Interview turns carry their own instructions */
export type InterviewTurnOptions = Omit<GenerateReplyOptions, 'systemPrompt'>

export interface ResilientLLMClientParts {
  readonly provider: LLMProvider
  readonly retry: RetryPolicy
  readonly breaker: CircuitBreaker
  readonly cache: InMemoryResponseCache<ProviderResponse>
  readonly logger?: Logger | undefined
  /** Clock for analysis timestamps */
  readonly now?: (() => number) | undefined
}

export class ResilientLLMClient {
  private readonly provider: LLMProvider
  private readonly retry: RetryPolicy
  private readonly breaker: CircuitBreaker
  private readonly cache: InMemoryResponseCache<ProviderResponse>
  private readonly logger: Logger
  private readonly now: () => number

  constructor(parts: ResilientLLMClientParts) {
    this.provider = parts.provider
    this.retry = parts.retry
    this.breaker = parts.breaker
    this.cache = parts.cache
    this.logger = parts.logger ?? silentLogger
    this.now = parts.now ?? Date.now
  }

  get providerName(): ProviderName {
    return this.provider.name
  }

  get model(): string {
    return this.provider.model
  }

  invoke(request: ConversationRequest, options: InvokeOptions = {}): Promise<Result<ProviderResponse>> {
    const key = generateConversationCacheKey(this.provider.name, this.provider.model, request)
    return this.cache.getOrCompute(
      key,
      () => this.breaker.execute(() => this.retry.execute(() => this.provider.invoke(request))),
      { signal: options.signal }
    )
  }

  /**
   * Generate the assistant's next turn for a conversation.
   */
  async generateReply(
    history: readonly ChatMessage[],
    options: GenerateReplyOptions = {}
  ): Promise<Result<string>> {
    const messages: ChatMessage[] = options.systemPrompt
      ? [{ role: 'system', content: options.systemPrompt }, ...history]
      : [...history]

    const request = createConversationRequest(messages, {
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens
    })

    const result = await this.invoke(request, { signal: options.signal })
    return result.ok ? { ok: true, value: result.value.text } : result
  }

  /**
   * Score the sentiment of a piece of text in [-1, 1].
   * Never fails: provider errors and unreadable replies score as neutral.
   */
  async analyzeSentiment(text: string): Promise<number> {
    const result = await this.invoke(buildSentimentRequest(text))
    if (!result.ok) {
      this.logger.warn(`Sentiment analysis failed (${result.error.type}): ${result.error.message}`)
      return NEUTRAL_SENTIMENT
    }

    const score = parseSentimentScore(result.value.text)
    if (score === null) {
      this.logger.warn(`Could not read a sentiment score from: ${result.value.text}`)
      return NEUTRAL_SENTIMENT
    }
    return score
  }

  /**
   * Answer the employee's latest message and move the interview on.
   */
  conductInterview(
    userInput: string,
    history: readonly ChatMessage[],
    options: InterviewTurnOptions = {}
  ): Promise<Result<string>> {
    return this.generateReply([...history, { role: 'user', content: userInput }], {
      ...options,
      temperature: options.temperature ?? INTERVIEW_TEMPERATURES.interview,
      systemPrompt: INTERVIEW_INSTRUCTIONS
    })
  }

  generateFollowUpQuestion(
    history: readonly ChatMessage[],
    options: InterviewTurnOptions = {}
  ): Promise<Result<string>> {
    return this.generateReply(history, {
      ...options,
      temperature: options.temperature ?? INTERVIEW_TEMPERATURES.followUp,
      systemPrompt: FOLLOW_UP_INSTRUCTIONS
    })
  }

  /**
   * Summarise a finished interview for HR.
   */
  async analyzeInterview(
    history: readonly ChatMessage[],
    options: InvokeOptions = {}
  ): Promise<Result<InterviewAnalysis>> {
    const result = await this.generateReply(history, {
      temperature: INTERVIEW_TEMPERATURES.analysis,
      systemPrompt: ANALYSIS_INSTRUCTIONS,
      signal: options.signal
    })
    if (!result.ok) return result

    return {
      ok: true,
      value: {
        rawAnalysis: result.value,
        interviewLength: history.length,
        timestamp: new Date(this.now()).toISOString()
      }
    }
  }

  getCircuitStatus(): CircuitStatus {
    return this.breaker.getStatus()
  }

  resetCircuit(): void {
    this.breaker.reset()
  }

  clearCache(): void {
    this.cache.clear()
  }

  cacheStats(): CacheStats {
    return this.cache.stats()
  }
}
