/**
 * Result Cache Types
 *
 * One contract, three backends: MemoryCache (LRU, process lifetime),
 * FilesystemCache (one JSON file per key) and SqliteCache (single database).
 * Callers only ever see ResultCache.
 */

import type { Fingerprint } from '../fingerprint'
import type { Logger } from '../logger'

/**
 * A stored result with its bookkeeping.
 */
export interface CacheEntry<T = unknown> {
  readonly value: T
  /** Epoch milliseconds at insertion */
  readonly createdAt: number
  /** Seconds until expiry, or null for never */
  readonly ttlSeconds: number | null
}

export type CacheBackend = 'memory' | 'file' | 'sqlite'

interface BaseCacheStats {
  readonly size: number
  readonly hits: number
  readonly misses: number
  readonly evictions: number
  /** hits / (hits + misses), 0 before the first lookup */
  readonly hitRate: number
  /** Default TTL applied by set() */
  readonly ttlSeconds: number | null
}

export interface MemoryCacheStats extends BaseCacheStats {
  readonly backend: 'memory'
  readonly maxSize: number
}

export interface FilesystemCacheStats extends BaseCacheStats {
  readonly backend: 'file'
  readonly directory: string
}

export interface SqliteCacheStats extends BaseCacheStats {
  readonly backend: 'sqlite'
  readonly path: string
  readonly maxSize: number
}

export type CacheStats = MemoryCacheStats | FilesystemCacheStats | SqliteCacheStats

/**
 * Pluggable cache for extraction results.
 *
 * After construction no method rejects on a storage failure: those are
 * logged and surface as misses, `false` or `0`. Invalid arguments are caller
 * errors: set() rejects with a CacheError for a negative or non-finite TTL.
 */
export interface ResultCache<T = unknown> {
  /**
   * Look up a result.
   * @returns The stored entry, or null if not found or expired
   */
  get(key: Fingerprint): Promise<CacheEntry<T> | null>

  /**
   * Store a result, replacing any previous entry for the key.
   * @param ttlSeconds - Overrides the backend default; null never expires
   * @throws CacheError (operation 'config') for a negative or non-finite TTL
   */
  set(key: Fingerprint, value: T, ttlSeconds?: number | null): Promise<void>

  /**
   * Remove one entry.
   * @returns Whether an entry was present
   */
  delete(key: Fingerprint): Promise<boolean>

  /**
   * Remove every entry. Hit and miss counters are kept.
   * @returns Number of entries removed
   */
  clear(): Promise<number>

  /**
   * Remove every expired entry.
   * @returns Number of entries removed
   */
  cleanupExpired(): Promise<number>

  stats(): Promise<CacheStats>

  /**
   * Release held resources. The instance must not be used afterwards.
   */
  close(): Promise<void>
}

export interface BaseCacheOptions {
  /** Default TTL in seconds; null (the default) never expires */
  readonly ttlSeconds?: number | null | undefined
  /** Receives warnings for degraded operations */
  readonly logger?: Logger | undefined
}

/**
 * Default entry ceiling for the bounded backends
 */
export const DEFAULT_MAX_SIZE = 1000
