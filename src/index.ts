/**
 * Exit-interview LLM Client Library
 *
 * Calls an unreliable, rate-limited language-model provider safely from many
 * concurrent request contexts: retries with backoff, a per-provider circuit
 * breaker, and a single-flight response cache.
 *
 * @license AGPL-3.0
 */

// Cache module
export type {
  CachedResponse,
  CacheKeyComponents,
  CacheStats,
  GetOrComputeOptions,
  ResponseCacheOptions
} from './caching/index'
export {
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_SECONDS,
  generateCacheKey,
  generateConversationCacheKey,
  InMemoryResponseCache
} from './caching/index'
// Client
export {
  type GenerateReplyOptions,
  type InterviewTurnOptions,
  type InvokeOptions,
  ResilientLLMClient,
  type ResilientLLMClientParts
} from './client'
// Configuration
export {
  ConfigError,
  configFromEnv,
  DEFAULT_LLM_CONFIG,
  getConfigPath,
  type LLMConfig,
  loadConfigFile,
  loadLLMConfig,
  type PartialLLMConfig,
  parseConfigObject,
  redactConfig,
  resolveConfig
} from './config'
export { type LLMClientFactoryDependencies, LLMClientFactory } from './factory'
// Degraded replies
export { FALLBACK_REPLIES, type InterviewReply, pickFallbackReply, replyOrFallback } from './fallback'
// HTTP helpers
export {
  emptyResponseError,
  type FetchFn,
  type HttpResponse,
  handleHttpError,
  handleNetworkError,
  httpFetch
} from './http'
// Interview
export {
  ANALYSIS_INSTRUCTIONS,
  FOLLOW_UP_INSTRUCTIONS,
  INTERVIEW_INSTRUCTIONS,
  INTERVIEW_TEMPERATURES,
  type InterviewAnalysis
} from './interview'
export { createLogger, type Logger, silentLogger } from './logger'
// Providers
export {
  DEFAULT_GROQ_BASE_URL,
  DEFAULT_GROQ_MODEL,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_MODEL,
  formatConversationPrompt,
  GroqProvider,
  type GroqProviderOptions,
  type HttpProviderOptions,
  type LLMProvider,
  MOCK_MODEL,
  MockProvider,
  type MockProviderOptions,
  normalizeOllamaHost,
  OllamaProvider,
  type OllamaProviderOptions
} from './providers/index'
// Resilience
export {
  CircuitBreaker,
  type CircuitBreakerDependencies,
  type CircuitBreakerOptions,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS,
  DEFAULT_RETRY_OPTIONS,
  type RetryDependencies,
  type RetryOptions,
  RetryPolicy
} from './resilience/index'
// Sentiment
export {
  buildSentimentRequest,
  clampSentiment,
  NEUTRAL_SENTIMENT,
  parseSentimentScore,
  SENTIMENT_INSTRUCTIONS
} from './sentiment'
// Types
export * from './types/index'

export const VERSION = '0.1.0'
