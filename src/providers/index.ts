/**
 * Providers Module
 */

export {
  DEFAULT_GROQ_BASE_URL,
  DEFAULT_GROQ_MODEL,
  GroqProvider,
  type GroqProviderOptions
} from './groq'
export { MOCK_MODEL, MockProvider, type MockProviderOptions, mockReply, mockSentimentScore } from './mock'
export {
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_MODEL,
  formatConversationPrompt,
  normalizeOllamaHost,
  OllamaProvider,
  type OllamaProviderOptions
} from './ollama'
export type { HttpProviderOptions, LLMProvider } from './types'
