/**
 * Configuration
 *
 * Resolves the client stack's settings from, highest priority first:
 * explicit overrides (CLI flags), environment variables, a JSON config file
 * (~/.config/exit-llm/config.json, EXIT_LLM_CONFIG, or --config-file), defaults.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_RESPONSE_CACHE_OPTIONS, type ResponseCacheOptions } from './caching/types'
import { DEFAULT_GROQ_BASE_URL, DEFAULT_GROQ_MODEL } from './providers/groq'
import { DEFAULT_OLLAMA_HOST, DEFAULT_OLLAMA_MODEL } from './providers/ollama'
import {
  type CircuitBreakerOptions,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS
} from './resilience/circuit-breaker'
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from './resilience/retry'
import { isProviderName, type ProviderName } from './types'

export interface LLMConfig {
  /** Active provider vended as the default client */
  readonly provider: ProviderName
  readonly groq: {
    readonly apiKey?: string | undefined
    readonly model: string
    readonly baseUrl: string
  }
  readonly ollama: {
    readonly host: string
    readonly model: string
  }
  /** Per-call upstream timeout */
  readonly timeoutMs: number
  readonly maxTokens: number
  readonly temperature: number
  readonly retry: RetryOptions
  readonly breaker: CircuitBreakerOptions
  readonly cache: ResponseCacheOptions
}

/** Config file / override shape: every key optional. */
export interface PartialLLMConfig {
  provider?: ProviderName | undefined
  groq?: Partial<LLMConfig['groq']> | undefined
  ollama?: Partial<LLMConfig['ollama']> | undefined
  timeoutMs?: number | undefined
  maxTokens?: number | undefined
  temperature?: number | undefined
  retry?: Partial<RetryOptions> | undefined
  breaker?: Partial<CircuitBreakerOptions> | undefined
  cache?: Partial<ResponseCacheOptions> | undefined
}

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: 'groq',
  groq: { model: DEFAULT_GROQ_MODEL, baseUrl: DEFAULT_GROQ_BASE_URL },
  ollama: { host: DEFAULT_OLLAMA_HOST, model: DEFAULT_OLLAMA_MODEL },
  timeoutMs: 30_000,
  maxTokens: 1024,
  temperature: 0.7,
  retry: DEFAULT_RETRY_OPTIONS,
  breaker: DEFAULT_CIRCUIT_BREAKER_OPTIONS,
  cache: DEFAULT_RESPONSE_CACHE_OPTIONS
}

export class ConfigError extends Error {
  constructor(
    readonly key: string,
    message: string
  ) {
    super(`Invalid config "${key}": ${message}`)
    this.name = 'ConfigError'
  }
}

type Env = Readonly<Record<string, string | undefined>>

/**
 * Get the config file path.
 * Priority: configFile arg > EXIT_LLM_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string, env: Env = process.env): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = env.EXIT_LLM_CONFIG
  if (fromEnv) {
    return fromEnv
  }
  return join(homedir(), '.config', 'exit-llm', 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readNumber(source: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(path, `expected a number, got ${JSON.stringify(value)}`)
  }
  return value
}

function readString(source: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(path, `expected a string, got ${JSON.stringify(value)}`)
  }
  return value
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key]
  if (value === undefined) return {}
  if (!isRecord(value)) throw new ConfigError(key, 'expected an object')
  return value
}

function parseProvider(value: string | undefined, path: string): ProviderName | undefined {
  if (value === undefined) return undefined
  const normalized = value.toLowerCase()
  if (!isProviderName(normalized)) {
    throw new ConfigError(path, `unknown provider "${value}" (expected groq, ollama or mock)`)
  }
  return normalized
}

/**
 * Validate a parsed JSON config file.
 */
export function parseConfigObject(raw: unknown): PartialLLMConfig {
  if (!isRecord(raw)) throw new ConfigError('(root)', 'expected a JSON object')

  const groq = readSection(raw, 'groq')
  const ollama = readSection(raw, 'ollama')
  const retry = readSection(raw, 'retry')
  const breaker = readSection(raw, 'breaker')
  const cache = readSection(raw, 'cache')

  return {
    provider: parseProvider(readString(raw, 'provider', 'provider'), 'provider'),
    groq: {
      apiKey: readString(groq, 'apiKey', 'groq.apiKey'),
      model: readString(groq, 'model', 'groq.model'),
      baseUrl: readString(groq, 'baseUrl', 'groq.baseUrl')
    },
    ollama: {
      host: readString(ollama, 'host', 'ollama.host'),
      model: readString(ollama, 'model', 'ollama.model')
    },
    timeoutMs: readNumber(raw, 'timeoutMs', 'timeoutMs'),
    maxTokens: readNumber(raw, 'maxTokens', 'maxTokens'),
    temperature: readNumber(raw, 'temperature', 'temperature'),
    retry: {
      maxRetries: readNumber(retry, 'maxRetries', 'retry.maxRetries'),
      baseDelayMs: readNumber(retry, 'baseDelayMs', 'retry.baseDelayMs'),
      maxDelayMs: readNumber(retry, 'maxDelayMs', 'retry.maxDelayMs'),
      jitterMs: readNumber(retry, 'jitterMs', 'retry.jitterMs')
    },
    breaker: {
      failureThreshold: readNumber(breaker, 'failureThreshold', 'breaker.failureThreshold'),
      cooldownMs: readNumber(breaker, 'cooldownMs', 'breaker.cooldownMs'),
      halfOpenSuccesses: readNumber(breaker, 'halfOpenSuccesses', 'breaker.halfOpenSuccesses')
    },
    cache: {
      ttlSeconds: readNumber(cache, 'ttlSeconds', 'cache.ttlSeconds'),
      maxEntries: readNumber(cache, 'maxEntries', 'cache.maxEntries')
    }
  }
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist; throws ConfigError if it can't be parsed.
 */
export async function loadConfigFile(configFile?: string, env: Env = process.env): Promise<PartialLLMConfig | null> {
  const path = getConfigPath(configFile, env)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(path, `not valid JSON (${reason})`)
  }
  return parseConfigObject(raw)
}

function envNumber(env: Env, name: string): number | undefined {
  const value = env[name]
  if (value === undefined || value === '') return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(name, `expected a number, got "${value}"`)
  }
  return parsed
}

/**
 * Read config overrides from environment variables.
 */
export function configFromEnv(env: Env = process.env): PartialLLMConfig {
  return {
    provider: parseProvider(env.LLM_PROVIDER || undefined, 'LLM_PROVIDER'),
    groq: {
      apiKey: env.GROQ_API_KEY || undefined,
      model: env.GROQ_MODEL || undefined,
      baseUrl: env.GROQ_BASE_URL || undefined
    },
    ollama: {
      host: env.OLLAMA_HOST || undefined,
      model: env.OLLAMA_MODEL || undefined
    },
    timeoutMs: envNumber(env, 'LLM_TIMEOUT_MS'),
    maxTokens: envNumber(env, 'LLM_MAX_TOKENS'),
    temperature: envNumber(env, 'LLM_TEMPERATURE'),
    retry: {
      maxRetries: envNumber(env, 'LLM_MAX_RETRIES'),
      baseDelayMs: envNumber(env, 'LLM_RETRY_BASE_DELAY_MS'),
      maxDelayMs: envNumber(env, 'LLM_RETRY_MAX_DELAY_MS'),
      jitterMs: envNumber(env, 'LLM_RETRY_JITTER_MS')
    },
    breaker: {
      failureThreshold: envNumber(env, 'LLM_BREAKER_FAILURE_THRESHOLD'),
      cooldownMs: envNumber(env, 'LLM_BREAKER_COOLDOWN_MS'),
      halfOpenSuccesses: envNumber(env, 'LLM_BREAKER_HALF_OPEN_SUCCESSES')
    },
    cache: {
      ttlSeconds: envNumber(env, 'LLM_CACHE_TTL_SECONDS'),
      maxEntries: envNumber(env, 'LLM_CACHE_MAX_ENTRIES')
    }
  }
}

/** First defined value wins. */
function pick<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((v) => v !== undefined)
}

function requireAtLeast(key: string, value: number, min: number): number {
  if (value < min) throw new ConfigError(key, `must be at least ${min}, got ${value}`)
  return value
}

/**
 * Merge layers (highest priority first) over the defaults and validate the result.
 */
export function resolveConfig(...layers: Array<PartialLLMConfig | null | undefined>): LLMConfig {
  const present = layers.filter((l): l is PartialLLMConfig => l !== null && l !== undefined)
  const d = DEFAULT_LLM_CONFIG
  const from = <T>(get: (layer: PartialLLMConfig) => T | undefined, fallback: T): T =>
    pick(...present.map(get)) ?? fallback

  const config: LLMConfig = {
    provider: from((l) => l.provider, d.provider),
    groq: {
      apiKey: pick(...present.map((l) => l.groq?.apiKey)),
      model: from((l) => l.groq?.model, d.groq.model),
      baseUrl: from((l) => l.groq?.baseUrl, d.groq.baseUrl)
    },
    ollama: {
      host: from((l) => l.ollama?.host, d.ollama.host),
      model: from((l) => l.ollama?.model, d.ollama.model)
    },
    timeoutMs: requireAtLeast('timeoutMs', from((l) => l.timeoutMs, d.timeoutMs), 1),
    maxTokens: requireAtLeast('maxTokens', from((l) => l.maxTokens, d.maxTokens), 1),
    temperature: requireAtLeast('temperature', from((l) => l.temperature, d.temperature), 0),
    retry: {
      maxRetries: requireAtLeast('retry.maxRetries', from((l) => l.retry?.maxRetries, d.retry.maxRetries), 0),
      baseDelayMs: requireAtLeast('retry.baseDelayMs', from((l) => l.retry?.baseDelayMs, d.retry.baseDelayMs), 0),
      maxDelayMs: requireAtLeast('retry.maxDelayMs', from((l) => l.retry?.maxDelayMs, d.retry.maxDelayMs), 0),
      jitterMs: requireAtLeast('retry.jitterMs', from((l) => l.retry?.jitterMs, d.retry.jitterMs), 0)
    },
    breaker: {
      failureThreshold: requireAtLeast(
        'breaker.failureThreshold',
        from((l) => l.breaker?.failureThreshold, d.breaker.failureThreshold),
        1
      ),
      cooldownMs: requireAtLeast('breaker.cooldownMs', from((l) => l.breaker?.cooldownMs, d.breaker.cooldownMs), 0),
      halfOpenSuccesses: requireAtLeast(
        'breaker.halfOpenSuccesses',
        from((l) => l.breaker?.halfOpenSuccesses, d.breaker.halfOpenSuccesses),
        1
      )
    },
    cache: {
      ttlSeconds: requireAtLeast('cache.ttlSeconds', from((l) => l.cache?.ttlSeconds, d.cache.ttlSeconds), 0),
      maxEntries: requireAtLeast('cache.maxEntries', from((l) => l.cache?.maxEntries, d.cache.maxEntries), 1)
    }
  }
  return config
}

/**
 * Load the full configuration: overrides > environment > config file > defaults.
 */
export async function loadLLMConfig(
  overrides: PartialLLMConfig = {},
  options: { configFile?: string | undefined; env?: Env | undefined } = {}
): Promise<LLMConfig> {
  const env = options.env ?? process.env
  const fileConfig = await loadConfigFile(options.configFile, env)
  return resolveConfig(overrides, configFromEnv(env), fileConfig)
}

/** Copy of the config safe to print. */
export function redactConfig(config: LLMConfig): LLMConfig {
  const apiKey = config.groq.apiKey
  return {
    ...config,
    groq: { ...config.groq, apiKey: apiKey ? `${apiKey.slice(0, 4)}…` : undefined }
  }
}
