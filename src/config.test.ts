/**
 * Tests for Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  ConfigError,
  configFromEnv,
  DEFAULT_LLM_CONFIG,
  getConfigPath,
  loadConfigFile,
  loadLLMConfig,
  parseConfigObject,
  redactConfig,
  resolveConfig
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'exit-llm-config-test-'))
    configPath = join(tempDir, 'config.json')
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json', {})).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      expect(getConfigPath(undefined, { EXIT_LLM_CONFIG: '/env/config.json' })).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      expect(getConfigPath(undefined, {})).toContain(join('.config', 'exit-llm', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      expect(getConfigPath('/explicit/config.json', { EXIT_LLM_CONFIG: '/env/config.json' })).toBe(
        '/explicit/config.json'
      )
    })
  })

  describe('parseConfigObject', () => {
    it('reads nested sections', () => {
      const parsed = parseConfigObject({
        provider: 'Ollama',
        ollama: { host: 'gpu-box:11434' },
        breaker: { failureThreshold: 2 }
      })

      expect(parsed.provider).toBe('ollama')
      expect(parsed.ollama?.host).toBe('gpu-box:11434')
      expect(parsed.breaker?.failureThreshold).toBe(2)
      expect(parsed.breaker?.cooldownMs).toBeUndefined()
    })

    it('rejects an unknown provider', () => {
      expect(() => parseConfigObject({ provider: 'openai' })).toThrow(
        'Invalid config "provider": unknown provider "openai" (expected groq, ollama or mock)'
      )
    })

    it('rejects values of the wrong type', () => {
      expect(() => parseConfigObject({ retry: { maxRetries: 'three' } })).toThrow(
        'Invalid config "retry.maxRetries": expected a number, got "three"'
      )
    })

    it('rejects a non-object root', () => {
      expect(() => parseConfigObject([1, 2])).toThrow(ConfigError)
    })
  })

  describe('loadConfigFile', () => {
    it('returns null for non-existent file', async () => {
      expect(await loadConfigFile(configPath, {})).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ timeoutMs: 5000, cache: { ttlSeconds: 60 } }))

      const config = await loadConfigFile(configPath, {})

      expect(config?.timeoutMs).toBe(5000)
      expect(config?.cache?.ttlSeconds).toBe(60)
    })

    it('throws ConfigError for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')

      await expect(loadConfigFile(configPath, {})).rejects.toThrow(ConfigError)
    })
  })

  describe('configFromEnv', () => {
    it('reads provider settings and numbers', () => {
      const config = configFromEnv({
        LLM_PROVIDER: 'mock',
        GROQ_API_KEY: 'test-secret',
        OLLAMA_MODEL: 'mistral',
        LLM_MAX_RETRIES: '1',
        LLM_CACHE_TTL_SECONDS: '30'
      })

      expect(config.provider).toBe('mock')
      expect(config.groq?.apiKey).toBe('test-secret')
      expect(config.ollama?.model).toBe('mistral')
      expect(config.retry?.maxRetries).toBe(1)
      expect(config.cache?.ttlSeconds).toBe(30)
    })

    it('treats empty strings as unset', () => {
      const config = configFromEnv({ GROQ_API_KEY: '', LLM_TIMEOUT_MS: '' })

      expect(config.groq?.apiKey).toBeUndefined()
      expect(config.timeoutMs).toBeUndefined()
    })

    it('rejects non-numeric values', () => {
      expect(() => configFromEnv({ LLM_TIMEOUT_MS: 'soon' })).toThrow(
        'Invalid config "LLM_TIMEOUT_MS": expected a number, got "soon"'
      )
    })
  })

  describe('resolveConfig', () => {
    it('returns the defaults with no layers', () => {
      expect(resolveConfig()).toEqual({ ...DEFAULT_LLM_CONFIG, groq: { ...DEFAULT_LLM_CONFIG.groq, apiKey: undefined } })
    })

    it('takes each key from the highest-priority layer that sets it', () => {
      const config = resolveConfig(
        { timeoutMs: 1000 },
        { timeoutMs: 2000, maxTokens: 50 },
        { maxTokens: 99, breaker: { cooldownMs: 5000 } }
      )

      expect(config.timeoutMs).toBe(1000)
      expect(config.maxTokens).toBe(50)
      expect(config.breaker).toEqual({ failureThreshold: 5, cooldownMs: 5000, halfOpenSuccesses: 1 })
    })

    it('skips null layers', () => {
      expect(resolveConfig(null, { provider: 'ollama' }).provider).toBe('ollama')
    })

    it('rejects values below their minimum', () => {
      expect(() => resolveConfig({ breaker: { failureThreshold: 0 } })).toThrow(
        'Invalid config "breaker.failureThreshold": must be at least 1, got 0'
      )
      expect(() => resolveConfig({ retry: { maxRetries: -1 } })).toThrow(
        'Invalid config "retry.maxRetries": must be at least 0, got -1'
      )
    })
  })

  describe('loadLLMConfig', () => {
    it('applies overrides > env > file > defaults', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ provider: 'ollama', timeoutMs: 9000, maxTokens: 256, temperature: 0.1 })
      )

      const config = await loadLLMConfig(
        { temperature: 0.9 },
        { configFile: configPath, env: { LLM_TIMEOUT_MS: '4000', LLM_TEMPERATURE: '0.5' } }
      )

      expect(config.provider).toBe('ollama')
      expect(config.timeoutMs).toBe(4000)
      expect(config.maxTokens).toBe(256)
      expect(config.temperature).toBe(0.9)
    })

    it('falls back to defaults when no file exists', async () => {
      const config = await loadLLMConfig({}, { configFile: configPath, env: {} })

      expect(config.provider).toBe('groq')
      expect(config.groq.model).toBe('llama3-70b-8192')
      expect(config.cache).toEqual({ ttlSeconds: 600, maxEntries: 100 })
    })
  })

  describe('redactConfig', () => {
    it('masks the API key', () => {
      const config = resolveConfig({ groq: { apiKey: 'test-secret' } })

      expect(redactConfig(config).groq.apiKey).toBe('test…')
    })

    it('leaves a missing key undefined', () => {
      expect(redactConfig(resolveConfig()).groq.apiKey).toBeUndefined()
    })
  })
})
