/**
 * In-Memory Response Cache
 *
 * TTL-bounded, size-bounded cache with single-flight computation per key:
 * the first caller to miss registers its computation in the in-flight table,
 * and every concurrent caller for that key awaits the same promise instead of
 * re-reading the entry table, so eviction or clear() cannot trigger a second
 * computation.
 *
 * Failed computations are never stored. The in-flight entry is dropped as
 * soon as the computation settles, and after a failure the first waiter back
 * computes for itself while the rest await that new computation.
 */

import { silentLogger, type Logger } from '../logger'
import { cancelledError, type Result, toApiError } from '../types'
import {
  type CachedResponse,
  type CacheStats,
  DEFAULT_RESPONSE_CACHE_OPTIONS,
  type ResponseCacheOptions
} from './types'

export interface GetOrComputeOptions {
  /** Aborts only this caller's wait; a running computation carries on for the others */
  readonly signal?: AbortSignal | undefined
}

export interface InMemoryCacheDependencies {
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

function shortKey(key: string): string {
  return `${key.slice(0, 8)}...`
}

/**
 * Resolve with the task's result, or with `cancelled` if the signal aborts first.
 */
function raceAbort<T>(task: Promise<Result<T>>, signal: AbortSignal): Promise<Result<T>> {
  if (signal.aborted) return Promise.resolve(cancelledError())
  return new Promise((resolve) => {
    const onAbort = (): void => resolve(cancelledError())
    signal.addEventListener('abort', onAbort, { once: true })
    void task.then((result) => {
      signal.removeEventListener('abort', onAbort)
      resolve(result)
    })
  })
}

export class InMemoryResponseCache<T> {
  /** Map iteration order is insertion order, which is creation order since replacements re-insert */
  private readonly entries = new Map<string, CachedResponse<T>>()
  /** One entry per key with a computation running */
  private readonly inFlight = new Map<string, Promise<Result<T>>>()
  private readonly logger: Logger
  private readonly now: () => number
  private hits = 0
  private misses = 0

  constructor(
    readonly options: ResponseCacheOptions = DEFAULT_RESPONSE_CACHE_OPTIONS,
    deps: InMemoryCacheDependencies = {}
  ) {
    this.logger = deps.logger ?? silentLogger
    this.now = deps.now ?? Date.now
  }

  /**
   * Get a fresh entry, or null. Expired entries are deleted on the way.
   */
  get(key: string): CachedResponse<T> | null {
    const entry = this.entries.get(key)
    if (!entry) return null
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      this.logger.verbose(`Cache expired (key: ${shortKey(key)})`)
      return null
    }
    return entry
  }

  set(key: string, data: T): CachedResponse<T> {
    const cachedAt = this.now()
    const entry: CachedResponse<T> = {
      data,
      cachedAt,
      expiresAt: cachedAt + this.options.ttlSeconds * 1000
    }
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.evictOverflow()
    return entry
  }

  async getOrCompute(
    key: string,
    compute: () => Promise<Result<T>>,
    options: GetOrComputeOptions = {}
  ): Promise<Result<T>> {
    const { signal } = options

    for (;;) {
      if (signal?.aborted) return cancelledError()

      const cached = this.get(key)
      if (cached) {
        this.hits++
        this.logger.verbose(`Cache hit (key: ${shortKey(key)})`)
        return { ok: true, value: cached.data }
      }

      const running = this.inFlight.get(key)
      if (!running) break

      const shared = await (signal ? raceAbort(running, signal) : running)
      if (signal?.aborted) return cancelledError()
      if (shared.ok) {
        this.hits++
        this.logger.verbose(`Cache hit after waiting (key: ${shortKey(key)})`)
        return shared
      }
      // Nothing was stored; look again, and compute if no other waiter already started
    }

    this.misses++
    this.logger.verbose(`Cache miss, computing (key: ${shortKey(key)})`)
    const task = this.computeAndStore(key, compute)
    this.inFlight.set(key, task)
    // Registered before any waiter's continuation, so waiters resume with the entry gone
    void task.finally(() => {
      if (this.inFlight.get(key) === task) this.inFlight.delete(key)
    })
    return signal ? raceAbort(task, signal) : task
  }

  /** Drop every entry. Running computations still store their results. */
  clear(): void {
    this.entries.clear()
  }

  /** Delete expired entries; returns how many were removed. */
  prune(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      inFlightKeys: this.inFlight.size
    }
  }

  private async computeAndStore(key: string, compute: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      const result = await compute()
      if (result.ok) this.set(key, result.value)
      return result
    } catch (error) {
      return { ok: false, error: toApiError(error) }
    }
  }

  private evictOverflow(): void {
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) return
      this.entries.delete(oldest.value)
      this.logger.verbose(`Cache full, evicted oldest (key: ${shortKey(oldest.value)})`)
    }
  }
}
