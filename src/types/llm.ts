/**
 * LLM Types
 *
 * Conversation requests, provider responses and circuit state.
 */

export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  readonly role: ChatRole
  readonly content: string
}

/** Generation parameters shared by every provider. */
export interface GenerationParams {
  /** Overrides the provider's configured model */
  readonly model?: string | undefined
  readonly temperature?: number | undefined
  readonly maxTokens?: number | undefined
}

/**
 * One call's worth of conversation. Owned by the calling request context
 * and never mutated after construction.
 */
export interface ConversationRequest extends GenerationParams {
  readonly messages: readonly ChatMessage[]
}

export interface TokenUsage {
  readonly promptTokens: number
  readonly completionTokens: number
  readonly totalTokens: number
}

export interface ProviderResponse {
  readonly text: string
  readonly provider: ProviderName
  readonly model: string
  readonly usage?: TokenUsage | undefined
  readonly durationMs: number
}

/** Closed set of provider variants. */
export type ProviderName = 'groq' | 'ollama' | 'mock'

export const PROVIDER_NAMES: readonly ProviderName[] = ['groq', 'ollama', 'mock']

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}

export const CircuitState = {
  CLOSED: 'CLOSED',
  OPEN: 'OPEN',
  HALF_OPEN: 'HALF_OPEN'
} as const
export type CircuitState = (typeof CircuitState)[keyof typeof CircuitState]

export interface CircuitStatus {
  readonly state: CircuitState
  readonly failureCount: number
  /** Epoch ms when the breaker last opened, null if it never has since the last close */
  readonly openedAt: number | null
  /** Time left before an OPEN breaker admits a trial call (0 otherwise) */
  readonly cooldownRemainingMs: number
}

/**
 * Build an immutable conversation request.
 */
export function createConversationRequest(
  messages: readonly ChatMessage[],
  params: GenerationParams = {}
): ConversationRequest {
  const frozenMessages = Object.freeze(
    messages.map((m) => Object.freeze({ role: m.role, content: m.content }))
  )
  return Object.freeze({
    messages: frozenMessages,
    ...(params.model !== undefined && { model: params.model }),
    ...(params.temperature !== undefined && { temperature: params.temperature }),
    ...(params.maxTokens !== undefined && { maxTokens: params.maxTokens })
  })
}
