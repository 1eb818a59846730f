import { describe, expect, it } from 'vitest'
import { buildSentimentRequest } from '../sentiment'
import { createConversationRequest } from '../types'
import { MOCK_MODEL, MockProvider, mockReply, mockSentimentScore } from './mock'

describe('mockReply', () => {
  it('welcomes when there is no user message yet', () => {
    expect(mockReply([{ role: 'system', content: 'Interview.' }])).toBe(
      'Welcome to the exit interview! Please tell me about your experience.'
    )
  })

  it('opens with the first question', () => {
    expect(mockReply([{ role: 'user', content: 'Ask me the First Question' }])).toBe(
      'Welcome to the exit interview! What was your primary reason for leaving?'
    )
  })

  it('answers keywords from the last user message', () => {
    expect(
      mockReply([
        { role: 'user', content: 'why leaving' },
        { role: 'assistant', content: 'Tell me more.' },
        { role: 'user', content: 'My manager rarely gave feedback.' }
      ])
    ).toMatch(/^Thank you for your feedback regarding your manager/)
  })

  it('falls back to a generic follow-up', () => {
    expect(mockReply([{ role: 'user', content: 'The commute was long.' }])).toBe(
      'Thank you for that information. Can you please elaborate further?'
    )
  })
})

describe('mockSentimentScore', () => {
  it('scores a quarter point per lexicon word', () => {
    expect(mockSentimentScore('The team was great and helpful')).toBe(0.5)
    expect(mockSentimentScore('Poor planning was a constant problem')).toBe(-0.5)
  })

  it('is neutral when positive and negative words balance', () => {
    expect(mockSentimentScore('Good people, bad process')).toBe(0)
  })

  it('clamps to [-1, 1]', () => {
    expect(mockSentimentScore('good great excellent awesome happy')).toBe(1)
  })
})

describe('MockProvider', () => {
  it('replies with the mock model and no usage', async () => {
    const result = await new MockProvider().invoke(
      createConversationRequest([{ role: 'user', content: 'What could we improve?' }])
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.provider).toBe('mock')
    expect(result.value.model).toBe(MOCK_MODEL)
    expect(result.value.usage).toBeUndefined()
    expect(result.value.text).toMatch(/^Thank you for these suggestions/)
  })

  it('answers sentiment requests with a score', async () => {
    const result = await new MockProvider().invoke(buildSentimentRequest('I enjoyed the work'))

    expect(result.ok && result.value.text).toBe('0.25')
  })

  it('rejects an empty conversation', async () => {
    const result = await new MockProvider().invoke(createConversationRequest([]))

    expect(result.ok).toBe(false)
  })
})
