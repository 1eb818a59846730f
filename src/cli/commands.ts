/**
 * CLI Commands
 *
 * Each command builds the client through the factory, so the CLI exercises
 * exactly the stack the interview service uses.
 */

import { type LLMConfig, loadLLMConfig, redactConfig } from '../config'
import { LLMClientFactory } from '../factory'
import type { Logger } from '../logger'
import type { CLIArgs } from './args'

export class CommandError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CommandError'
  }
}

async function resolveCliConfig(args: CLIArgs): Promise<LLMConfig> {
  const config = await loadLLMConfig({ provider: args.provider }, { configFile: args.configFile })
  if (!args.model) return config
  return config.provider === 'ollama'
    ? { ...config, ollama: { ...config.ollama, model: args.model } }
    : { ...config, groq: { ...config.groq, model: args.model } }
}

export async function cmdReply(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.text.trim()) throw new CommandError('A message is required')

  const factory = new LLMClientFactory(await resolveCliConfig(args), { logger })
  const client = factory.defaultClient()
  logger.verbose(`Provider: ${client.providerName} (${client.model})`)

  const result = await client.generateReply([{ role: 'user', content: args.text }], {
    systemPrompt: args.systemPrompt,
    temperature: args.temperature,
    maxTokens: args.maxTokens
  })

  if (!result.ok) {
    throw new CommandError(`Assistant unavailable (${result.error.type}): ${result.error.message}`)
  }
  console.log(result.value)
}

export async function cmdSentiment(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.text.trim()) throw new CommandError('Text is required')

  const factory = new LLMClientFactory(await resolveCliConfig(args), { logger })
  const score = await factory.defaultClient().analyzeSentiment(args.text)
  console.log(score.toFixed(2))
}

export async function cmdStatus(args: CLIArgs, logger: Logger): Promise<void> {
  const factory = new LLMClientFactory(await resolveCliConfig(args), { logger })
  const client = factory.defaultClient()
  const status = client.getCircuitStatus()

  logger.log(`Provider:      ${client.providerName} (${client.model})`)
  logger.log(`Circuit:       ${status.state}`)
  logger.log(`Failures:      ${status.failureCount}`)
  if (status.cooldownRemainingMs > 0) {
    logger.log(`Cool-down:     ${Math.ceil(status.cooldownRemainingMs / 1000)}s remaining`)
  }
}

export async function cmdConfig(args: CLIArgs): Promise<void> {
  const config = await resolveCliConfig(args)
  console.log(JSON.stringify(redactConfig(config), null, 2))
}
