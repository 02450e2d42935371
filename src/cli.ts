#!/usr/bin/env node
/**
 * Extraction Cache CLI
 *
 * Maintenance commands for a configured result cache.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdCleanup } from './cli/commands/cleanup'
import { cmdClear } from './cli/commands/clear'
import { cmdKey } from './cli/commands/key'
import { cmdStats } from './cli/commands/stats'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'stats':
        await cmdStats(args, logger)
        break

      case 'cleanup':
        await cmdCleanup(args, logger)
        break

      case 'clear':
        await cmdClear(args, logger)
        break

      case 'key':
        await cmdKey(args, logger)
        break

      case 'help':
        logger.error("Unknown command. Run 'extraction-cache --help' for usage.")
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

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
