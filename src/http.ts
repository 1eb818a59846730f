/**
 * HTTP Utilities
 *
 * Fetch with a per-call timeout, and translation of provider wire failures
 * into the shared ApiError taxonomy.
 */

import type { Result } from './types'

/** Injected by tests; defaults to the global fetch. */
export type FetchFn = typeof fetch

/**
 * Standard HTTP response interface for API calls.
 * Narrower than Response so tests can hand-build one.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

const TRANSIENT_STATUSES = new Set([408, 409, 425])
const INVALID_REQUEST_STATUSES = new Set([400, 404, 413, 422])

/**
 * Perform a fetch request bounded by `timeoutMs`.
 * A timeout rejects with a DOMException named 'TimeoutError'.
 */
export async function httpFetch(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchFn: FetchFn = fetch
): Promise<HttpResponse> {
  return fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  return Number.isNaN(seconds) ? undefined : seconds
}

/**
 * Handle HTTP error responses uniformly across all providers.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text().catch(() => '(unreadable body)')
  const status = response.status

  if (status === 429) {
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: parseRetryAfter(response.headers.get('retry-after')),
        status
      }
    }
  }

  if (status === 401 || status === 403) {
    return {
      ok: false,
      error: { type: 'auth', message: `Authentication failed: ${errorText}`, status }
    }
  }

  if (INVALID_REQUEST_STATUSES.has(status)) {
    return {
      ok: false,
      error: { type: 'invalid_request', message: `Invalid request (${status}): ${errorText}`, status }
    }
  }

  if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
    return {
      ok: false,
      error: { type: 'transient', message: `API error ${status}: ${errorText}`, status }
    }
  }

  return {
    ok: false,
    error: { type: 'unknown', message: `Unexpected API response ${status}: ${errorText}`, status }
  }
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

/**
 * Handle network errors (connection failures and timeouts) uniformly.
 * Both are transient.
 */
export function handleNetworkError(error: unknown, timeoutMs?: number): Result<never> {
  if (isTimeoutError(error)) {
    const after = timeoutMs !== undefined ? ` after ${timeoutMs}ms` : ''
    return { ok: false, error: { type: 'transient', message: `Request timed out${after}` } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'transient', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty or malformed API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'unknown', message: 'Empty response from API' } }
}
