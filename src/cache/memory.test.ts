import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createKey, createLoggerSpy } from '../test-support'
import { CacheError } from './errors'
import { MemoryCache } from './memory'

describe('MemoryCache', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date('2025-01-01T00:00:00.000Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('get/set/delete', () => {
    it('counts a miss for an absent key', async () => {
      const cache = new MemoryCache()
      expect(await cache.get(createKey('doc'))).toBeNull()
      expect((await cache.stats()).misses).toBe(1)
    })

    it('returns the stored entry and counts a hit', async () => {
      const cache = new MemoryCache()
      const key = createKey('doc')

      await cache.set(key, { data: 123 })
      const entry = await cache.get(key)

      expect(entry).toEqual({
        value: { data: 123 },
        createdAt: Date.parse('2025-01-01T00:00:00.000Z'),
        ttlSeconds: null
      })
      expect((await cache.stats()).hits).toBe(1)
    })

    it('finds entries through an equal fingerprint built separately', async () => {
      const cache = new MemoryCache<string>()
      await cache.set(createKey('doc', { provider: 'Gemini' }), 'value')
      expect((await cache.get(createKey('doc', { provider: 'gemini' })))?.value).toBe('value')
    })

    it('distinguishes a cached null from a miss', async () => {
      const cache = new MemoryCache<string | null>()
      await cache.set(createKey('doc'), null)
      const entry = await cache.get(createKey('doc'))
      expect(entry).not.toBeNull()
      expect(entry?.value).toBeNull()
    })

    it('overwrites an existing entry', async () => {
      const cache = new MemoryCache<string>()
      await cache.set(createKey('doc'), 'first')
      await cache.set(createKey('doc'), 'second')

      expect((await cache.get(createKey('doc')))?.value).toBe('second')
      expect((await cache.stats()).size).toBe(1)
    })

    it('reports whether delete removed anything', async () => {
      const cache = new MemoryCache()
      await cache.set(createKey('doc'), 1)

      expect(await cache.delete(createKey('doc'))).toBe(true)
      expect(await cache.delete(createKey('doc'))).toBe(false)
      expect(await cache.get(createKey('doc'))).toBeNull()
    })
  })

  describe('LRU eviction', () => {
    it('evicts the least recently used entry', async () => {
      const cache = new MemoryCache<number>({ maxSize: 2 })

      await cache.set(createKey('1'), 1)
      await cache.set(createKey('2'), 2)
      await cache.get(createKey('1'))
      await cache.set(createKey('3'), 3)

      expect((await cache.get(createKey('1')))?.value).toBe(1)
      expect((await cache.get(createKey('3')))?.value).toBe(3)
      expect(await cache.get(createKey('2'))).toBeNull()
    })

    it('evicts in insertion order when nothing was read', async () => {
      const cache = new MemoryCache<number>({ maxSize: 2 })

      await cache.set(createKey('1'), 1)
      await cache.set(createKey('2'), 2)
      await cache.set(createKey('3'), 3)

      expect(await cache.get(createKey('1'))).toBeNull()
      expect((await cache.get(createKey('2')))?.value).toBe(2)
    })

    it('counts evictions separately from misses', async () => {
      const cache = new MemoryCache<number>({ maxSize: 1 })

      await cache.set(createKey('1'), 1)
      await cache.set(createKey('2'), 2)
      await cache.set(createKey('2'), 22)

      const stats = await cache.stats()
      expect(stats.evictions).toBe(1)
      expect(stats.misses).toBe(0)
      expect(stats.size).toBe(1)
    })

    it('logs evictions at verbose level', async () => {
      const logger = createLoggerSpy()
      const cache = new MemoryCache<number>({ maxSize: 1, logger })

      await cache.set(createKey('1'), 1)
      await cache.set(createKey('2'), 2)

      expect(logger.verbose).toHaveBeenCalledWith('memory cache evicted 1:p:s:g')
    })
  })

  describe('expiry', () => {
    it('expires entries once the TTL has elapsed', async () => {
      const cache = new MemoryCache<number>({ ttlSeconds: 0.1 })
      await cache.set(createKey('1'), 1)

      expect((await cache.get(createKey('1')))?.value).toBe(1)

      vi.setSystemTime(Date.now() + 150)
      expect(await cache.get(createKey('1'))).toBeNull()

      const stats = await cache.stats()
      expect(stats.size).toBe(0)
      expect(stats.hits).toBe(1)
      expect(stats.misses).toBe(1)
    })

    it('keeps an entry at exactly its TTL', async () => {
      const cache = new MemoryCache<number>({ ttlSeconds: 1 })
      await cache.set(createKey('1'), 1)

      vi.setSystemTime(Date.now() + 1000)
      expect((await cache.get(createKey('1')))?.value).toBe(1)
    })

    it('lets set override the default TTL', async () => {
      const cache = new MemoryCache<number>({ ttlSeconds: 1 })
      await cache.set(createKey('forever'), 1, null)
      await cache.set(createKey('long'), 2, 60)
      await cache.set(createKey('default'), 3)

      vi.setSystemTime(Date.now() + 5000)

      expect((await cache.get(createKey('forever')))?.value).toBe(1)
      expect((await cache.get(createKey('long')))?.value).toBe(2)
      expect(await cache.get(createKey('default'))).toBeNull()
    })

    it('rejects a negative TTL on set', async () => {
      const cache = new MemoryCache()
      await expect(cache.set(createKey('1'), 1, -1)).rejects.toThrow(CacheError)
    })

    it('shares stored values by reference', async () => {
      const cache = new MemoryCache<{ items: string[] }>()
      const value = { items: ['a'] }
      await cache.set(createKey('doc'), value)

      value.items.push('b')
      const entry = await cache.get(createKey('doc'))
      entry?.value.items.push('c')

      expect(entry?.value).toBe(value)
      expect((await cache.get(createKey('doc')))?.value.items).toEqual(['a', 'b', 'c'])
    })
  })

  describe('cleanupExpired', () => {
    it('removes only expired entries and returns the count', async () => {
      const cache = new MemoryCache<number>()
      await cache.set(createKey('a'), 1, 10)
      await cache.set(createKey('b'), 2, 10)
      await cache.set(createKey('c'), 3)

      vi.setSystemTime(Date.now() + 11_000)

      expect(await cache.cleanupExpired()).toBe(2)
      expect((await cache.stats()).size).toBe(1)
      expect(await cache.cleanupExpired()).toBe(0)
    })

    it('does not change the recency order of survivors', async () => {
      const cache = new MemoryCache<number>({ maxSize: 3 })
      await cache.set(createKey('1'), 1, 10)
      await cache.set(createKey('2'), 2)
      await cache.set(createKey('3'), 3)
      await cache.get(createKey('2'))

      vi.setSystemTime(Date.now() + 11_000)
      expect(await cache.cleanupExpired()).toBe(1)

      await cache.set(createKey('4'), 4)
      await cache.set(createKey('5'), 5)

      expect(await cache.get(createKey('3'))).toBeNull()
      expect((await cache.get(createKey('2')))?.value).toBe(2)
    })
  })

  describe('clear', () => {
    it('returns the number of removed entries and keeps counters', async () => {
      const cache = new MemoryCache<number>()
      await cache.set(createKey('1'), 1)
      await cache.set(createKey('2'), 2)
      await cache.get(createKey('1'))
      await cache.get(createKey('missing'))

      expect(await cache.clear()).toBe(2)

      const stats = await cache.stats()
      expect(stats.size).toBe(0)
      expect(stats.hits).toBe(1)
      expect(stats.misses).toBe(1)
    })

    it('returns 0 on an empty cache', async () => {
      const cache = new MemoryCache()
      expect(await cache.clear()).toBe(0)
      expect(await cache.get(createKey('1'))).toBeNull()
    })
  })

  describe('stats', () => {
    it('reports configuration and a zero hit rate before any lookup', async () => {
      const cache = new MemoryCache({ maxSize: 10, ttlSeconds: 60 })
      expect(await cache.stats()).toEqual({
        backend: 'memory',
        size: 0,
        maxSize: 10,
        ttlSeconds: 60,
        hits: 0,
        misses: 0,
        evictions: 0,
        hitRate: 0
      })
    })

    it('derives the hit rate from hits and misses', async () => {
      const cache = new MemoryCache<number>()
      await cache.set(createKey('1'), 1)
      await cache.get(createKey('1'))
      await cache.get(createKey('1'))
      await cache.get(createKey('1'))
      await cache.get(createKey('2'))

      expect((await cache.stats()).hitRate).toBe(0.75)
    })
  })

  describe('configuration', () => {
    it('rejects a maxSize below 1', () => {
      expect(() => new MemoryCache({ maxSize: 0 })).toThrow(CacheError)
      expect(() => new MemoryCache({ maxSize: 1.5 })).toThrow(CacheError)
    })

    it('rejects a negative default TTL', () => {
      expect(() => new MemoryCache({ ttlSeconds: -5 })).toThrow(CacheError)
    })
  })

  describe('concurrent callers', () => {
    it('keeps counts consistent when operations are awaited together', async () => {
      const cache = new MemoryCache<number>({ maxSize: 50 })
      const keys = Array.from({ length: 100 }, (_, i) => createKey(`k${i}`))

      await Promise.all(keys.map((key, i) => cache.set(key, i)))
      const results = await Promise.all(keys.map((key) => cache.get(key)))

      const hits = results.filter((entry) => entry !== null)
      expect(hits).toHaveLength(50)
      const newest = Array.from({ length: 50 }, (_, i) => i + 50)
      expect(hits.map((entry) => entry?.value)).toEqual(newest)

      const stats = await cache.stats()
      expect(stats).toMatchObject({ size: 50, hits: 50, misses: 50, evictions: 50 })
    })
  })
})
