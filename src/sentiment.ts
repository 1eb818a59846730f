/**
 * Sentiment Scoring
 *
 * Builds the scoring request and reads a score in [-1, 1] out of the reply.
 */

import { createConversationRequest, type ConversationRequest } from './types'

export const SENTIMENT_INSTRUCTIONS =
  'Analyze the sentiment of the text the user sends. Return ONLY a float value between -1.0 (negative) and 1.0 (positive), and nothing else.'

/** Score recorded when the provider fails or replies with no number. */
export const NEUTRAL_SENTIMENT = 0

export function buildSentimentRequest(text: string): ConversationRequest {
  return createConversationRequest(
    [
      { role: 'system', content: SENTIMENT_INSTRUCTIONS },
      { role: 'user', content: text }
    ],
    { temperature: 0, maxTokens: 10 }
  )
}

export function clampSentiment(score: number): number {
  return Math.max(-1, Math.min(1, score))
}

/**
 * Parse the provider's reply. Accepts a bare number, otherwise takes the
 * first decimal number in the text. Returns null when there is none.
 */
export function parseSentimentScore(reply: string): number | null {
  const trimmed = reply.trim()
  if (trimmed !== '') {
    const whole = Number(trimmed)
    if (Number.isFinite(whole)) return clampSentiment(whole)
  }

  const found = trimmed.match(/-?\d+\.\d+/)?.[0]
  if (found === undefined) return null
  return clampSentiment(Number.parseFloat(found))
}
