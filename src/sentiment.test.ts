import { describe, expect, it } from 'vitest'
import { buildSentimentRequest, clampSentiment, parseSentimentScore, SENTIMENT_INSTRUCTIONS } from './sentiment'

describe('buildSentimentRequest', () => {
  it('asks for a bare score with deterministic settings', () => {
    expect(buildSentimentRequest('I loved my team')).toEqual({
      messages: [
        { role: 'system', content: SENTIMENT_INSTRUCTIONS },
        { role: 'user', content: 'I loved my team' }
      ],
      temperature: 0,
      maxTokens: 10
    })
  })
})

describe('clampSentiment', () => {
  it('clamps to [-1, 1]', () => {
    expect(clampSentiment(1.5)).toBe(1)
    expect(clampSentiment(-3)).toBe(-1)
    expect(clampSentiment(0.3)).toBe(0.3)
  })
})

describe('parseSentimentScore', () => {
  it('reads a bare number', () => {
    expect(parseSentimentScore(' 0.75\n')).toBe(0.75)
    expect(parseSentimentScore('-1')).toBe(-1)
  })

  it('takes the first decimal in surrounding text', () => {
    expect(parseSentimentScore('Score: -0.35 (mildly negative), not 0.9')).toBe(-0.35)
  })

  it('clamps out-of-range values', () => {
    expect(parseSentimentScore('2.5')).toBe(1)
  })

  it('returns null when there is no score', () => {
    expect(parseSentimentScore('')).toBeNull()
    expect(parseSentimentScore('positive')).toBeNull()
  })
})
