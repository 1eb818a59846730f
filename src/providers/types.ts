/**
 * Provider Adapter Types
 *
 * Every provider variant implements one capability: turn a conversation
 * request into a response, reporting failures as tagged ApiErrors.
 */

import type { FetchFn } from '../http'
import type { ConversationRequest, ProviderName, ProviderResponse, Result } from '../types'

export interface LLMProvider {
  readonly name: ProviderName
  /** Model used when the request does not name one */
  readonly model: string
  invoke(request: ConversationRequest): Promise<Result<ProviderResponse>>
}

/** Options shared by the HTTP-backed providers. */
export interface HttpProviderOptions {
  readonly model: string
  /** Per-call timeout; a timed-out call is a transient failure */
  readonly timeoutMs: number
  readonly temperature: number
  readonly maxTokens: number
  readonly fetchFn?: FetchFn | undefined
}

export function emptyConversationError(): Result<never> {
  return {
    ok: false,
    error: { type: 'invalid_request', message: 'Conversation has no messages' }
  }
}
