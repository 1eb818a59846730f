/**
 * Retry Policy
 *
 * Bounded retries with exponential backoff for transient and rate-limit
 * failures. Every other error kind is returned after a single attempt.
 */

import { silentLogger, type Logger } from '../logger'
import { type ApiError, isRetryableError, type Result, toApiError } from '../types'

export interface RetryOptions {
  /** Extra attempts after the first call (3 means at most 4 calls) */
  readonly maxRetries: number
  /** Delay before the first retry; doubles on each further retry */
  readonly baseDelayMs: number
  readonly maxDelayMs: number
  /** Upper bound of the random delay added to each backoff */
  readonly jitterMs: number
}

export interface RetryDependencies {
  readonly logger?: Logger | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  /** Returns a value in [0, 1) */
  readonly random?: (() => number) | undefined
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterMs: 500
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class RetryPolicy {
  private readonly logger: Logger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number

  constructor(
    readonly options: RetryOptions = DEFAULT_RETRY_OPTIONS,
    deps: RetryDependencies = {}
  ) {
    this.logger = deps.logger ?? silentLogger
    this.sleep = deps.sleep ?? defaultSleep
    this.random = deps.random ?? Math.random
  }

  /**
   * Delay before retry number `retryIndex` (0 for the first retry).
   * A rate-limit error's retry-after is honoured as a floor, up to maxDelayMs.
   */
  computeDelay(retryIndex: number, error: ApiError): number {
    const { baseDelayMs, maxDelayMs, jitterMs } = this.options
    let delay = Math.min(maxDelayMs, baseDelayMs * 2 ** retryIndex)

    if (error.type === 'rate_limit' && error.retryAfter !== undefined) {
      delay = Math.min(maxDelayMs, Math.max(delay, error.retryAfter * 1000))
    }

    return jitterMs > 0 ? delay + this.random() * jitterMs : delay
  }

  async execute<T>(operation: (attempt: number) => Promise<Result<T>>): Promise<Result<T>> {
    const totalAttempts = this.options.maxRetries + 1

    for (let attempt = 1; ; attempt++) {
      let result: Result<T>
      try {
        result = await operation(attempt)
      } catch (error) {
        result = { ok: false, error: toApiError(error) }
      }

      if (result.ok || !isRetryableError(result.error)) return result

      if (attempt >= totalAttempts) {
        this.logger.warn(
          `Giving up after ${attempt} attempt(s): ${result.error.type} - ${result.error.message}`
        )
        return result
      }

      const delay = this.computeDelay(attempt - 1, result.error)
      this.logger.warn(
        `Attempt ${attempt}/${totalAttempts} failed (${result.error.type}): ${result.error.message}. Retrying in ${Math.round(delay)}ms`
      )
      await this.sleep(delay)
    }
  }
}
