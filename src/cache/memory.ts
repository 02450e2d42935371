/**
 * In-Memory Result Cache
 *
 * Bounded, process-lifetime store. Recency and eviction come from lru-cache;
 * expiry is checked on read against each entry's own TTL.
 */

import { LRUCache } from 'lru-cache'
import type { Fingerprint } from '../fingerprint'
import { defaultLogger, type Logger } from '../logger'
import { createEntry, isExpired, validateMaxSize, validateTtl } from './entry'
import {
  type BaseCacheOptions,
  type CacheEntry,
  DEFAULT_MAX_SIZE,
  type MemoryCacheStats,
  type ResultCache
} from './types'

export interface MemoryCacheOptions extends BaseCacheOptions {
  /** Entry ceiling; the least recently used entry is evicted beyond it */
  readonly maxSize?: number | undefined
}

/**
 * LRU cache with per-entry TTL.
 *
 * Every method body runs synchronously, so calls on one instance never
 * interleave even when their promises are awaited concurrently.
 *
 * Values are stored by reference, not copied: mutating a value after set(),
 * or one returned from get(), changes the cached entry. The durable backends
 * return fresh copies on every read.
 *
 * @example
 * ```ts
 * const cache = new MemoryCache<Invoice>({ maxSize: 100, ttlSeconds: 3600 })
 * await cache.set(key, invoice)
 * const hit = await cache.get(key)
 * ```
 */
export class MemoryCache<T = unknown> implements ResultCache<T> {
  private readonly entries: LRUCache<string, CacheEntry<T>>
  private readonly maxSize: number
  private readonly ttlSeconds: number | null
  private readonly logger: Logger
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: MemoryCacheOptions = {}) {
    this.maxSize = validateMaxSize(options.maxSize ?? DEFAULT_MAX_SIZE)
    this.ttlSeconds = validateTtl(options.ttlSeconds ?? null)
    this.logger = options.logger ?? defaultLogger
    this.entries = new LRUCache<string, CacheEntry<T>>({
      max: this.maxSize,
      dispose: (_entry, key, reason) => {
        if (reason === 'evict') {
          this.evictions++
          this.logger.verbose(`memory cache evicted ${key}`)
        }
      }
    })
  }

  async get(key: Fingerprint): Promise<CacheEntry<T> | null> {
    const id = key.toString()
    const entry = this.entries.peek(id)

    if (entry === undefined) {
      this.misses++
      return null
    }

    if (isExpired(entry)) {
      this.entries.delete(id)
      this.misses++
      return null
    }

    // get() rather than peek() marks the entry most recently used
    this.entries.get(id)
    this.hits++
    return entry
  }

  async set(key: Fingerprint, value: T, ttlSeconds?: number | null): Promise<void> {
    const ttl = ttlSeconds === undefined ? this.ttlSeconds : validateTtl(ttlSeconds)
    this.entries.set(key.toString(), createEntry(value, ttl))
  }

  async delete(key: Fingerprint): Promise<boolean> {
    return this.entries.delete(key.toString())
  }

  async cleanupExpired(): Promise<number> {
    const now = Date.now()
    const expired: string[] = []
    // entries() does not touch recency
    for (const [id, entry] of this.entries.entries()) {
      if (isExpired(entry, now)) expired.push(id)
    }
    for (const id of expired) {
      this.entries.delete(id)
    }
    return expired.length
  }

  async clear(): Promise<number> {
    const count = this.entries.size
    this.entries.clear()
    return count
  }

  async stats(): Promise<MemoryCacheStats> {
    const lookups = this.hits + this.misses
    return {
      backend: 'memory',
      size: this.entries.size,
      maxSize: this.maxSize,
      ttlSeconds: this.ttlSeconds,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups
    }
  }

  async close(): Promise<void> {
    this.entries.clear()
  }
}
