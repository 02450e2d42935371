/**
 * Result cache factory
 *
 * Maps a backend name from configuration to a concrete cache.
 */

import type { Logger } from '../logger'
import { FilesystemCache } from './filesystem'
import { MemoryCache } from './memory'
import { SqliteCache } from './sqlite'
import type { ResultCache } from './types'

export type CacheConfig =
  | {
      readonly backend: 'memory'
      readonly maxSize?: number | undefined
      readonly ttlSeconds?: number | null | undefined
    }
  | {
      readonly backend: 'file'
      readonly directory: string
      readonly ttlSeconds?: number | null | undefined
    }
  | {
      readonly backend: 'sqlite'
      readonly path: string
      readonly maxSize?: number | undefined
      readonly ttlSeconds?: number | null | undefined
    }

/**
 * Create a result cache for a configuration.
 *
 * Durable backends open their storage immediately.
 * @throws CacheError if the directory or database cannot be opened
 */
export function createResultCache(
  config: CacheConfig,
  options: { logger?: Logger | undefined } = {}
): ResultCache {
  switch (config.backend) {
    case 'memory':
      return new MemoryCache({ ...config, logger: options.logger })
    case 'file':
      return new FilesystemCache({ ...config, logger: options.logger })
    case 'sqlite':
      return new SqliteCache({ ...config, logger: options.logger })
  }
}

/**
 * Human-readable location of a configured cache.
 */
export function describeCacheConfig(config: CacheConfig): string {
  switch (config.backend) {
    case 'memory':
      return 'memory'
    case 'file':
      return `file:${config.directory}`
    case 'sqlite':
      return `sqlite:${config.path}`
  }
}
