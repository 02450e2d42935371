/**
 * Cleanup Command
 *
 * Remove expired entries from the configured cache.
 */

import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { withCache } from '../helpers'

export async function cmdCleanup(args: CLIArgs, logger: Logger): Promise<number> {
  return withCache(args, logger, async (cache) => {
    const removed = await cache.cleanupExpired()
    logger.success(`Removed ${removed} expired ${removed === 1 ? 'entry' : 'entries'}`)
    return removed
  })
}
