/**
 * Clear Command
 *
 * Remove every entry from the configured cache.
 */

import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { withCache } from '../helpers'

export async function cmdClear(args: CLIArgs, logger: Logger): Promise<number> {
  return withCache(args, logger, async (cache) => {
    const removed = await cache.clear()
    logger.success(`Cleared ${removed} ${removed === 1 ? 'entry' : 'entries'}`)
    return removed
  })
}
