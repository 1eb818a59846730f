/**
 * Mock Provider
 *
 * Offline stand-in used for local development and when the cloud provider
 * has no API key. Replies are canned and deterministic.
 */

import { SENTIMENT_INSTRUCTIONS } from '../sentiment'
import type { ChatMessage, ConversationRequest, ProviderResponse, Result } from '../types'
import { emptyConversationError, type LLMProvider } from './types'

export const MOCK_MODEL = 'mock-interviewer'

const WELCOME_REPLY = 'Welcome to the exit interview! Please tell me about your experience.'
const FIRST_QUESTION_REPLY =
  'Welcome to the exit interview! What was your primary reason for leaving?'
const GENERIC_REPLY = 'Thank you for that information. Can you please elaborate further?'

/** Keyword (matched case-insensitively in the last user message) to reply. */
const KEYWORD_REPLIES: ReadonlyArray<readonly [string, string]> = [
  [
    'why leaving',
    "Thank you for sharing that. It's understandable that you're looking for new growth opportunities. What specific growth aspects felt missing in your current role?"
  ],
  [
    'satisfied',
    'I appreciate your candid feedback about your role. What aspects of your role did you find most fulfilling?'
  ],
  [
    'manager',
    'Thank you for your feedback regarding your manager and team. Is there anything specific that could improve team communication?'
  ],
  [
    'improve',
    'Thank you for these suggestions. Which of these improvements do you think would have the biggest positive impact?'
  ]
]

const NEGATIVE_WORDS = [
  'bad',
  'poor',
  'terrible',
  'difficult',
  'issue',
  'problem',
  'frustrating',
  'disappointing',
  'unhappy',
  'quit',
  'leave'
]
const POSITIVE_WORDS = [
  'good',
  'great',
  'excellent',
  'awesome',
  'happy',
  'satisfied',
  'enjoyed',
  'positive',
  'helpful',
  'learn',
  'growth'
]

export interface MockProviderOptions {
  /** Simulated round-trip latency */
  readonly latencyMs?: number | undefined
}

function lastUserMessage(messages: readonly ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i]
    if (message?.role === 'user') return message.content
  }
  return ''
}

function countMatches(text: string, words: readonly string[]): number {
  return words.filter((word) => text.includes(word)).length
}

/**
 * Lexicon score in [-1, 1]: each positive word adds 0.25, each negative word subtracts 0.25.
 */
export function mockSentimentScore(text: string): number {
  const lower = text.toLowerCase()
  const raw = (countMatches(lower, POSITIVE_WORDS) - countMatches(lower, NEGATIVE_WORDS)) * 0.25
  return Math.max(-1, Math.min(1, raw))
}

export function mockReply(messages: readonly ChatMessage[]): string {
  const lastUser = lastUserMessage(messages).toLowerCase()
  if (!lastUser) return WELCOME_REPLY
  if (lastUser.includes('first question')) return FIRST_QUESTION_REPLY

  for (const [keyword, reply] of KEYWORD_REPLIES) {
    if (lastUser.includes(keyword)) return reply
  }
  return GENERIC_REPLY
}

function isSentimentRequest(messages: readonly ChatMessage[]): boolean {
  return messages.some((m) => m.role === 'system' && m.content === SENTIMENT_INSTRUCTIONS)
}

export class MockProvider implements LLMProvider {
  readonly name = 'mock' as const
  readonly model = MOCK_MODEL

  constructor(private readonly options: MockProviderOptions = {}) {}

  async invoke(request: ConversationRequest): Promise<Result<ProviderResponse>> {
    if (request.messages.length === 0) return emptyConversationError()

    const start = Date.now()
    const latencyMs = this.options.latencyMs ?? 0
    if (latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, latencyMs))
    }

    const text = isSentimentRequest(request.messages)
      ? mockSentimentScore(lastUserMessage(request.messages)).toFixed(2)
      : mockReply(request.messages)

    return {
      ok: true,
      value: {
        text,
        provider: this.name,
        model: request.model ?? this.model,
        durationMs: Date.now() - start
      }
    }
  }
}
