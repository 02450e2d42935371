/**
 * Stats Command
 *
 * Show what the configured cache holds.
 */

import { describeCacheConfig } from '../../cache/factory'
import type { CacheStats } from '../../cache/types'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { formatPercent, formatTtl, withCache } from '../helpers'

function describeLimit(stats: CacheStats): string {
  switch (stats.backend) {
    case 'memory':
    case 'sqlite':
      return `${stats.maxSize} entries`
    case 'file':
      return 'unbounded'
  }
}

/**
 * Execute the stats command.
 */
export async function cmdStats(args: CLIArgs, logger: Logger): Promise<void> {
  await withCache(args, logger, async (cache, config) => {
    const stats = await cache.stats()

    if (args.json) {
      console.log(JSON.stringify(stats, null, 2))
      return
    }

    logger.log(`\nCache: ${describeCacheConfig(config)}`)
    logger.log(`   Entries: ${stats.size}`)
    logger.log(`   Limit: ${describeLimit(stats)}`)
    logger.log(`   Default TTL: ${formatTtl(stats.ttlSeconds)}`)
    logger.verbose(
      `hits ${stats.hits}, misses ${stats.misses}, evictions ${stats.evictions}, ` +
        `hit rate ${formatPercent(stats.hitRate)}`
    )
  })
}
