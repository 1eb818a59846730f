/**
 * Circuit Breaker
 *
 * Per-provider CLOSED → OPEN → HALF_OPEN state machine. While OPEN, calls
 * fail fast with `circuit_open`; after the cool-down a single trial call
 * tests whether the provider has recovered.
 *
 * State is only touched in the synchronous sections before and after the
 * awaited operation, so the event loop serialises every transition.
 */

import { silentLogger, type Logger } from '../logger'
import { CircuitState, type CircuitStatus, type Result, toApiError } from '../types'

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the breaker */
  readonly failureThreshold: number
  /** Time spent OPEN before a trial call is admitted */
  readonly cooldownMs: number
  /** Trial successes needed to close again */
  readonly halfOpenSuccesses: number
}

export interface CircuitBreakerDependencies {
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  cooldownMs: 60_000,
  halfOpenSuccesses: 1
}

type Admission = { readonly allowed: false } | { readonly allowed: true; readonly trial: boolean }

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED
  private failureCount = 0
  private openedAt: number | null = null
  private trialInFlight = false
  private trialSuccesses = 0
  /** Bumped by reset(); outcomes of calls admitted before it are dropped */
  private generation = 0
  private readonly logger: Logger
  private readonly now: () => number

  constructor(
    readonly name: string,
    readonly options: CircuitBreakerOptions = DEFAULT_CIRCUIT_BREAKER_OPTIONS,
    deps: CircuitBreakerDependencies = {}
  ) {
    this.logger = deps.logger ?? silentLogger
    this.now = deps.now ?? Date.now
  }

  async execute<T>(operation: () => Promise<Result<T>>): Promise<Result<T>> {
    const admission = this.admit()
    const generation = this.generation
    if (!admission.allowed) {
      return {
        ok: false,
        error: {
          type: 'circuit_open',
          message: `Circuit for ${this.name} is open; retry in ${Math.ceil(this.cooldownRemaining() / 1000)}s`
        }
      }
    }

    let result: Result<T>
    try {
      result = await operation()
    } catch (error) {
      result = { ok: false, error: toApiError(error) }
    }

    if (generation !== this.generation) return result

    if (result.ok) {
      this.recordSuccess(admission.trial)
    } else if (result.error.type === 'cancelled') {
      if (admission.trial) this.trialInFlight = false
    } else {
      this.recordFailure(admission.trial)
    }
    return result
  }

  getStatus(): CircuitStatus {
    return {
      state: this.state,
      failureCount: this.failureCount,
      openedAt: this.openedAt,
      cooldownRemainingMs: this.cooldownRemaining()
    }
  }

  reset(): void {
    if (this.state !== CircuitState.CLOSED) this.transition(CircuitState.CLOSED, 'reset')
    this.failureCount = 0
    this.openedAt = null
    this.trialInFlight = false
    this.trialSuccesses = 0
    this.generation++
  }

  private cooldownRemaining(): number {
    if (this.state !== CircuitState.OPEN || this.openedAt === null) return 0
    return Math.max(0, this.openedAt + this.options.cooldownMs - this.now())
  }

  private admit(): Admission {
    switch (this.state) {
      case CircuitState.CLOSED:
        return { allowed: true, trial: false }

      case CircuitState.OPEN:
        if (this.cooldownRemaining() > 0) return { allowed: false }
        this.transition(CircuitState.HALF_OPEN, 'cool-down elapsed')
        this.trialSuccesses = 0
        this.trialInFlight = true
        return { allowed: true, trial: true }

      case CircuitState.HALF_OPEN:
        if (this.trialInFlight) return { allowed: false }
        this.trialInFlight = true
        return { allowed: true, trial: true }
    }
  }

  private recordSuccess(trial: boolean): void {
    if (trial) {
      this.trialInFlight = false
      this.trialSuccesses++
      if (this.trialSuccesses >= this.options.halfOpenSuccesses) {
        this.failureCount = 0
        this.openedAt = null
        this.transition(CircuitState.CLOSED, 'trial succeeded')
      }
      return
    }
    // Late results from calls admitted before the breaker opened do not move it.
    if (this.state === CircuitState.CLOSED) this.failureCount = 0
  }

  private recordFailure(trial: boolean): void {
    if (trial) {
      this.trialInFlight = false
      this.failureCount++
      this.open('trial failed')
      return
    }
    if (this.state !== CircuitState.CLOSED) return

    this.failureCount++
    if (this.failureCount >= this.options.failureThreshold) {
      this.open(`${this.failureCount} consecutive failures`)
    }
  }

  private open(reason: string): void {
    this.openedAt = this.now()
    this.transition(CircuitState.OPEN, reason)
  }

  private transition(next: CircuitState, reason: string): void {
    const previous = this.state
    this.state = next
    const message = `Circuit ${this.name}: ${previous} → ${next} (${reason})`
    if (next === CircuitState.OPEN) this.logger.warn(message)
    else this.logger.log(message)
  }
}
