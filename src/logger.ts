/**
 * Logger
 *
 * Console logging shared by the client stack and the CLI.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      if (!quiet) console.warn(`  ! ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}

const noop = (): void => {}

/** Library default: components log nothing unless given a logger. */
export const silentLogger: Logger = {
  log: noop,
  verbose: noop,
  success: noop,
  warn: noop,
  error: noop
}
