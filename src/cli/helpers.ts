/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { type CacheConfig, createResultCache, describeCacheConfig } from '../cache/factory'
import type { ResultCache } from '../cache/types'
import type { Logger } from '../logger'
import type { CLIArgs } from './args'
import { loadCacheConfig } from './config'

// ============================================================================
// Formatting
// ============================================================================

export function formatTtl(ttlSeconds: number | null): string {
  return ttlSeconds === null ? 'none' : `${ttlSeconds}s`
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`
}

// ============================================================================
// Cache Access
// ============================================================================

/**
 * Open the configured cache, run the command body, and close the cache
 * whether or not the body succeeds.
 */
export async function withCache<R>(
  args: CLIArgs,
  logger: Logger,
  run: (cache: ResultCache, config: CacheConfig) => Promise<R>
): Promise<R> {
  const config = loadCacheConfig(process.env, args.cache)
  logger.verbose(`Opening ${describeCacheConfig(config)}`)

  const cache = createResultCache(config, { logger })
  try {
    return await run(cache, config)
  } finally {
    await cache.close()
  }
}
