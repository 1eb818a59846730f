/**
 * Resilience Module
 */

export {
  CircuitBreaker,
  type CircuitBreakerDependencies,
  type CircuitBreakerOptions,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS
} from './circuit-breaker'
export { DEFAULT_RETRY_OPTIONS, type RetryDependencies, type RetryOptions, RetryPolicy } from './retry'
