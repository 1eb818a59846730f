/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, InvalidArgumentError } from 'commander'
import { VERSION } from '../index'
import { isProviderName, type ProviderName } from '../types'

export type CommandName = 'reply' | 'sentiment' | 'status' | 'config' | 'help'

export interface CLIArgs {
  command: CommandName
  /** Message or text words joined with spaces */
  text: string
  provider: ProviderName | undefined
  model: string | undefined
  configFile: string | undefined
  systemPrompt: string | undefined
  temperature: number | undefined
  maxTokens: number | undefined
  quiet: boolean
  verbose: boolean
}

const DESCRIPTION = `Call the exit-interview language model through the retrying, circuit-breaking, cached client.

Examples:
  $ exit-llm reply "I am leaving because of a lack of growth"
  $ exit-llm reply --provider ollama --system "You are an HR interviewer" "Hello"
  $ exit-llm sentiment "My manager was helpful but the workload was terrible"
  $ exit-llm status`

function parseProviderOption(value: string): ProviderName {
  const normalized = value.toLowerCase()
  if (!isProviderName(normalized)) {
    throw new InvalidArgumentError('Expected one of: groq, ollama, mock.')
  }
  return normalized
}

function parseNumberOption(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.')
  }
  return parsed
}

function parseIntegerOption(value: string): number {
  const parsed = parseNumberOption(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

function createProgram(): Command {
  const program = new Command()
    .name('exit-llm')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('-p, --provider <name>', 'Provider: groq, ollama, mock (or set LLM_PROVIDER)', parseProviderOption)
    .option('-m, --model <model>', 'Model identifier (overrides the provider default)')
    .option('--config-file <path>', 'Config file path (or set EXIT_LLM_CONFIG)')

  // ============ REPLY ============
  program
    .command('reply')
    .description('Generate the assistant reply to a user message')
    .argument('<message...>', 'User message')
    .option('-s, --system <prompt>', 'System prompt placed before the message')
    .option('-t, --temperature <num>', 'Sampling temperature', parseNumberOption)
    .option('--max-tokens <num>', 'Maximum tokens to generate', parseIntegerOption)

  // ============ SENTIMENT ============
  program
    .command('sentiment')
    .description('Score the sentiment of a text between -1.0 and 1.0')
    .argument('<text...>', 'Text to score')

  // ============ STATUS ============
  program.command('status').description('Show the circuit breaker state of the provider')

  // ============ CONFIG ============
  program.command('config').description('Print the resolved configuration (API key masked)')

  return program
}

function buildCLIArgs(
  command: CommandName,
  words: readonly string[],
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command,
    text: words.join(' '),
    provider: typeof opts.provider === 'string' && isProviderName(opts.provider) ? opts.provider : undefined,
    model: typeof opts.model === 'string' ? opts.model : undefined,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    systemPrompt: typeof opts.system === 'string' ? opts.system : undefined,
    temperature: typeof opts.temperature === 'number' ? opts.temperature : undefined,
    maxTokens: typeof opts.maxTokens === 'number' ? opts.maxTokens : undefined,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true
  }
}

function isCommandName(name: string): name is CommandName {
  return name === 'reply' || name === 'sentiment' || name === 'status' || name === 'config'
}

function attachActions(program: Command, onParsed: (args: CLIArgs) => void): void {
  // Use optsWithGlobals() to include global options from parent program
  for (const cmd of program.commands) {
    const name = cmd.name()
    if (!isCommandName(name)) continue
    cmd.action((words: unknown) => {
      const list = Array.isArray(words) ? words.filter((w): w is string => typeof w === 'string') : []
      onParsed(buildCLIArgs(name, list, cmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[]): CLIArgs {
  const program = createProgram()
  program.exitOverride()
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} })

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and invalid arguments
    return result ?? buildCLIArgs('help', [], {})
  }

  return result ?? buildCLIArgs('help', [], {})
}
