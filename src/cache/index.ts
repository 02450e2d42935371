/**
 * Cache Module
 *
 * Pluggable result caching to avoid repeating extraction calls.
 */

export { createEntry, isExpired } from './entry'
export { CacheError, type CacheOperation } from './errors'
export { type CacheConfig, createResultCache, describeCacheConfig } from './factory'
export { FilesystemCache, type FilesystemCacheOptions } from './filesystem'
export { MemoryCache, type MemoryCacheOptions } from './memory'
export { SqliteCache, type SqliteCacheOptions } from './sqlite'
export {
  type CacheBackend,
  type CacheEntry,
  type CacheStats,
  DEFAULT_MAX_SIZE,
  type FilesystemCacheStats,
  type MemoryCacheStats,
  type ResultCache,
  type SqliteCacheStats
} from './types'
