/**
 * Ollama Provider
 *
 * Local inference server adapter (non-streaming /api/generate).
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { ChatMessage, ConversationRequest, ProviderResponse, Result } from '../types'
import { emptyConversationError, type HttpProviderOptions, type LLMProvider } from './types'

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434'
export const DEFAULT_OLLAMA_MODEL = 'llama2'

export interface OllamaProviderOptions extends HttpProviderOptions {
  readonly host?: string | undefined
}

interface GenerateResponse {
  response?: string
  prompt_eval_count?: number
  eval_count?: number
}

/**
 * Ensure the host has a scheme and no trailing slash.
 */
export function normalizeOllamaHost(host: string): string {
  const withScheme = /^https?:\/\//.test(host) ? host : `http://${host}`
  return withScheme.replace(/\/+$/, '')
}

/**
 * Flatten a conversation into the single prompt /api/generate takes,
 * one `role: content` line per message, ending on the assistant's cue.
 */
export function formatConversationPrompt(messages: readonly ChatMessage[]): string {
  const lines = messages.filter((m) => m.content).map((m) => `${m.role}: ${m.content}`)
  return `${lines.join('\n')}\nassistant:`
}

export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama' as const
  readonly model: string
  readonly host: string

  constructor(private readonly options: OllamaProviderOptions) {
    this.model = options.model
    this.host = normalizeOllamaHost(options.host ?? DEFAULT_OLLAMA_HOST)
  }

  async invoke(request: ConversationRequest): Promise<Result<ProviderResponse>> {
    if (request.messages.length === 0) return emptyConversationError()

    const model = request.model ?? this.model
    const start = Date.now()

    try {
      const response = await httpFetch(
        `${this.host}/api/generate`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model,
            prompt: formatConversationPrompt(request.messages),
            stream: false,
            options: {
              temperature: request.temperature ?? this.options.temperature,
              num_predict: request.maxTokens ?? this.options.maxTokens
            }
          })
        },
        this.options.timeoutMs,
        this.options.fetchFn
      )

      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as GenerateResponse | null
      if (!data || typeof data.response !== 'string' || data.response.length === 0) {
        return emptyResponseError()
      }

      const promptTokens = data.prompt_eval_count ?? 0
      const completionTokens = data.eval_count ?? 0
      return {
        ok: true,
        value: {
          text: data.response,
          provider: this.name,
          model,
          usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
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
