/**
 * Logger
 *
 * Console reporting shared by the cache backends and the CLI.
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
      if (!quiet) console.error(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}

/**
 * Default logger for cache backends: warnings and errors only.
 */
export const defaultLogger: Logger = createLogger(false, false)

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  log: () => {},
  verbose: () => {},
  success: () => {},
  warn: () => {},
  error: () => {}
}
