/**
 * Cache Module
 *
 * In-memory response caching so identical requests share one upstream call.
 */

export { generateCacheKey, generateConversationCacheKey } from './key'
export { type GetOrComputeOptions, InMemoryResponseCache } from './memory'
export {
  type CachedResponse,
  type CacheKeyComponents,
  type CacheStats,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_RESPONSE_CACHE_OPTIONS,
  type ResponseCacheOptions
} from './types'
