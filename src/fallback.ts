/**
 * Degraded Replies
 *
 * When the assistant is unavailable the interview carries on with a generic
 * prompt instead of failing the user's turn.
 */

import type { GenerateReplyOptions, ResilientLLMClient } from './client'
import type { ApiError, ChatMessage } from './types'

export const FALLBACK_REPLIES: readonly string[] = [
  'I appreciate your thoughts on this. Could you tell me more about your experience?',
  'Thank you for sharing. What other aspects of your work would you like to discuss?',
  "That's helpful feedback. Is there anything else you'd like to add about your time here?",
  'I understand. Could you elaborate on how this affected your work experience?'
]

export interface InterviewReply {
  readonly text: string
  /** True when `text` is a fallback rather than a generated reply */
  readonly degraded: boolean
  readonly error?: ApiError | undefined
}

export function pickFallbackReply(random: () => number = Math.random): string {
  const index = Math.min(FALLBACK_REPLIES.length - 1, Math.floor(random() * FALLBACK_REPLIES.length))
  return FALLBACK_REPLIES[index] ?? 'Could you tell me more about your experience?'
}

export async function replyOrFallback(
  client: Pick<ResilientLLMClient, 'generateReply'>,
  history: readonly ChatMessage[],
  options: GenerateReplyOptions & { random?: (() => number) | undefined } = {}
): Promise<InterviewReply> {
  const { random, ...replyOptions } = options
  const result = await client.generateReply(history, replyOptions)
  if (result.ok) return { text: result.value, degraded: false }
  return { text: pickFallbackReply(random), degraded: true, error: result.error }
}
