import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { silentLogger } from '../logger'
import type { CLIArgs } from './args'
import { CommandError, cmdConfig, cmdReply, cmdSentiment, cmdStatus } from './commands'

function createArgs(overrides: Partial<CLIArgs> = {}): CLIArgs {
  return {
    command: 'reply',
    text: '',
    provider: 'mock',
    model: undefined,
    configFile: join(tmpdir(), 'exit-llm-missing-config.json'),
    systemPrompt: undefined,
    temperature: undefined,
    maxTokens: undefined,
    quiet: true,
    verbose: false,
    ...overrides
  }
}

describe('CLI commands', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reply prints the assistant reply', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    await cmdReply(createArgs({ text: 'What could we improve?' }), silentLogger)

    expect(log).toHaveBeenCalledWith(
      'Thank you for these suggestions. Which of these improvements do you think would have the biggest positive impact?'
    )
  })

  it('reply requires a message', async () => {
    await expect(cmdReply(createArgs({ text: '  ' }), silentLogger)).rejects.toThrow(CommandError)
  })

  it('sentiment prints the score with two decimals', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    await cmdSentiment(createArgs({ command: 'sentiment', text: 'I enjoyed the work' }), silentLogger)

    expect(log).toHaveBeenCalledWith('0.25')
  })

  it('status logs the circuit state', async () => {
    const lines: string[] = []
    const logger = {
      ...silentLogger,
      log: (msg: string) => {
        lines.push(msg)
      }
    }

    await cmdStatus(createArgs({ command: 'status' }), logger)

    expect(lines).toEqual([
      'Provider:      mock (mock-interviewer)',
      'Circuit:       CLOSED',
      'Failures:      0'
    ])
  })

  it('config prints the resolved configuration', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    await cmdConfig(createArgs({ command: 'config', model: 'llama3-8b-8192' }))

    const printed = JSON.parse(String(log.mock.lastCall?.[0]))
    expect(printed.provider).toBe('mock')
    expect(printed.groq.model).toBe('llama3-8b-8192')
  })
})
