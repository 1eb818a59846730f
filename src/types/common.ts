/**
 * Common Types
 *
 * Shared result and error types used across every layer of the client stack.
 */

// Result Types
export type ApiErrorType =
  | 'transient'
  | 'rate_limit'
  | 'auth'
  | 'invalid_request'
  | 'circuit_open'
  | 'unknown'
  | 'cancelled'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  /** Seconds the provider asked us to wait (from the retry-after header) */
  readonly retryAfter?: number | undefined
  /** HTTP status when the error came from a response */
  readonly status?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

/** Error kinds worth another attempt against the same provider. */
const RETRYABLE_ERROR_TYPES: readonly ApiErrorType[] = ['transient', 'rate_limit']

export function isRetryableError(error: ApiError): boolean {
  return RETRYABLE_ERROR_TYPES.includes(error.type)
}

/**
 * Convert a thrown value into an ApiError.
 * Only used at seams where user-supplied callbacks may throw.
 */
export function toApiError(error: unknown, type: ApiErrorType = 'unknown'): ApiError {
  const message = error instanceof Error ? error.message : String(error)
  return { type, message }
}

export function cancelledError(): Result<never> {
  return { ok: false, error: { type: 'cancelled', message: 'Caller cancelled the request' } }
}
