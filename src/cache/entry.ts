/**
 * Cache Entries
 *
 * Expiry rule, TTL validation and the persisted record shared by the durable
 * backends.
 */

import { z } from 'zod'
import { CacheError } from './errors'
import type { CacheEntry } from './types'

/**
 * An entry is expired once more than ttlSeconds have elapsed since insertion.
 * Entries without a TTL never expire.
 */
export function isExpired(
  entry: Pick<CacheEntry, 'createdAt' | 'ttlSeconds'>,
  now: number = Date.now()
): boolean {
  if (entry.ttlSeconds === null) return false
  return now - entry.createdAt > entry.ttlSeconds * 1000
}

export function createEntry<T>(
  value: T,
  ttlSeconds: number | null,
  now: number = Date.now()
): CacheEntry<T> {
  return { value, createdAt: now, ttlSeconds }
}

/**
 * Validate a TTL given to a constructor or set().
 * @throws CacheError for negative or non-finite values
 */
export function validateTtl(ttlSeconds: number | null): number | null {
  if (ttlSeconds === null) return null
  if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
    throw new CacheError(`TTL must be a non-negative number of seconds, got ${ttlSeconds}`, {
      operation: 'config',
      details: { ttlSeconds }
    })
  }
  return ttlSeconds
}

/**
 * Validate an entry ceiling.
 * @throws CacheError unless maxSize is a positive integer
 */
export function validateMaxSize(maxSize: number): number {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new CacheError(`maxSize must be a positive integer, got ${maxSize}`, {
      operation: 'config',
      details: { maxSize }
    })
  }
  return maxSize
}

/**
 * On-disk record written by FilesystemCache.
 */
export const persistedEntrySchema = z.object({
  key: z.string(),
  value: z.unknown().refine((value) => value !== undefined, 'value is required'),
  createdAt: z.number().finite(),
  ttlSeconds: z.number().nonnegative().nullable()
})

export type PersistedEntry = z.infer<typeof persistedEntrySchema>

/**
 * Parse a persisted record, returning null for anything malformed.
 */
export function parsePersistedEntry(raw: string): PersistedEntry | null {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return null
  }
  const result = persistedEntrySchema.safeParse(json)
  return result.success ? result.data : null
}
