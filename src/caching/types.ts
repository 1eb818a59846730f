/**
 * Response Caching Types
 */

/**
 * Cached response wrapper with metadata.
 * Entries are replaced wholesale, never mutated.
 */
export interface CachedResponse<T = unknown> {
  readonly data: T
  readonly cachedAt: number
  readonly expiresAt: number
}

export interface ResponseCacheOptions {
  /** Entries older than this are treated as misses */
  readonly ttlSeconds: number
  /** Oldest entries are evicted once the table grows past this */
  readonly maxEntries: number
}

export interface CacheStats {
  readonly size: number
  readonly hits: number
  readonly misses: number
  /** Keys with a computation running */
  readonly inFlightKeys: number
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Provider name: 'groq', 'ollama', 'mock' */
  readonly service: string
  /** Model identifier */
  readonly model: string
  /** Request payload (will be JSON stringified and sorted) */
  readonly payload: unknown
}

/** Default TTL for cached responses (10 minutes) */
export const DEFAULT_CACHE_TTL_SECONDS = 10 * 60

export const DEFAULT_CACHE_MAX_ENTRIES = 100

export const DEFAULT_RESPONSE_CACHE_OPTIONS: ResponseCacheOptions = {
  ttlSeconds: DEFAULT_CACHE_TTL_SECONDS,
  maxEntries: DEFAULT_CACHE_MAX_ENTRIES
}
