/**
 * Cache Key Generation
 *
 * Generates deterministic SHA256 hash keys for LLM request caching.
 */

import { createHash } from 'node:crypto'
import type { ConversationRequest } from '../types'
import type { CacheKeyComponents } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  for (const [key, value] of entries) {
    sorted[key] = sortKeys(value)
  }
  return sorted
}

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:normalized_payload
 *
 * @example
 * ```ts
 * const key = generateCacheKey({
 *   service: 'groq',
 *   model: 'llama3-70b-8192',
 *   payload: { messages: [{ role: 'user', content: 'hello' }] }
 * })
 * // Returns: '3a7bd3e2...' (64 char hex string)
 * ```
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const normalized = JSON.stringify(sortKeys(payload))
  const input = `${service}:${model}:${normalized}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Generate cache key for a conversation request.
 * Message order matters; unset generation parameters hash as null.
 */
export function generateConversationCacheKey(
  provider: string,
  defaultModel: string,
  request: ConversationRequest
): string {
  return generateCacheKey({
    service: provider,
    model: request.model ?? defaultModel,
    payload: {
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: request.temperature ?? null,
      maxTokens: request.maxTokens ?? null
    }
  })
}
