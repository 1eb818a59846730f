#!/usr/bin/env -S npx tsx
/**
 * Exit-interview LLM CLI
 *
 * Talks to the configured provider through the resilient client.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig, cmdReply, cmdSentiment, cmdStatus } from './cli/commands'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'reply':
        await cmdReply(args, logger)
        break

      case 'sentiment':
        await cmdSentiment(args, logger)
        break

      case 'status':
        await cmdStatus(args, logger)
        break

      case 'config':
        await cmdConfig(args)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'exit-llm --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
