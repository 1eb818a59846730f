/**
 * Groq Provider
 *
 * Cloud adapter for Groq's OpenAI-compatible chat completions API.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { ConversationRequest, ProviderResponse, Result } from '../types'
import { emptyConversationError, type HttpProviderOptions, type LLMProvider } from './types'

export const DEFAULT_GROQ_BASE_URL = 'https://api.groq.com/openai/v1'
export const DEFAULT_GROQ_MODEL = 'llama3-70b-8192'

export interface GroqProviderOptions extends HttpProviderOptions {
  readonly apiKey: string
  readonly baseUrl?: string | undefined
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number }
}

export class GroqProvider implements LLMProvider {
  readonly name = 'groq' as const
  readonly model: string
  private readonly url: string

  constructor(private readonly options: GroqProviderOptions) {
    this.model = options.model
    const baseUrl = (options.baseUrl ?? DEFAULT_GROQ_BASE_URL).replace(/\/+$/, '')
    this.url = `${baseUrl}/chat/completions`
  }

  async invoke(request: ConversationRequest): Promise<Result<ProviderResponse>> {
    if (!this.options.apiKey) {
      return { ok: false, error: { type: 'auth', message: 'Groq API key is not configured' } }
    }
    if (request.messages.length === 0) return emptyConversationError()

    const model = request.model ?? this.model
    const start = Date.now()

    try {
      const response = await httpFetch(
        this.url,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`
          },
          body: JSON.stringify({
            model,
            messages: request.messages,
            temperature: request.temperature ?? this.options.temperature,
            max_tokens: request.maxTokens ?? this.options.maxTokens
          })
        },
        this.options.timeoutMs,
        this.options.fetchFn
      )

      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as ChatCompletionResponse | null
      const text = data?.choices?.[0]?.message?.content
      if (typeof text !== 'string' || text.length === 0) return emptyResponseError()

      const usage = data?.usage
      return {
        ok: true,
        value: {
          text,
          provider: this.name,
          model,
          usage: usage && {
            promptTokens: usage.prompt_tokens ?? 0,
            completionTokens: usage.completion_tokens ?? 0,
            totalTokens: usage.total_tokens ?? (usage.prompt_tokens ?? 0) + (usage.completion_tokens ?? 0)
          },
          durationMs: Date.now() - start
        }
      }
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { ok: false, error: { type: 'unknown', message: `Malformed response: ${error.message}` } }
      }
      return handleNetworkError(error, this.options.timeoutMs)
    }
  }
}
