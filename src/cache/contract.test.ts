/**
 * Behaviour every ResultCache backend shares.
 */

import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Fingerprint } from '../fingerprint'
import { silentLogger } from '../logger'
import { createKey, createTempDir, sleep } from '../test-support'
import { CacheError } from './errors'
import { type CacheConfig, createResultCache } from './factory'
import type { ResultCache } from './types'

type Backend = CacheConfig['backend']

const backends: Backend[] = ['memory', 'file', 'sqlite']

function configFor(backend: Backend, dir: string, ttlSeconds: number | null = null): CacheConfig {
  switch (backend) {
    case 'memory':
      return { backend, ttlSeconds }
    case 'file':
      return { backend, directory: join(dir, 'entries'), ttlSeconds }
    case 'sqlite':
      return { backend, path: join(dir, 'cache.db'), ttlSeconds }
  }
}

describe.each(backends)('ResultCache contract (%s)', (backend) => {
  let dir: string
  let cleanup: () => void
  const opened: ResultCache[] = []

  function open(ttlSeconds: number | null = null): ResultCache {
    const cache = createResultCache(configFor(backend, dir, ttlSeconds), { logger: silentLogger })
    opened.push(cache)
    return cache
  }

  beforeEach(() => {
    ;({ dir, cleanup } = createTempDir(`contract-${backend}`))
  })

  afterEach(async () => {
    for (const cache of opened.splice(0)) {
      await cache.close()
    }
    cleanup()
  })

  it('returns a value unchanged right after set', async () => {
    const cache = open()
    const value = { total: 1500, lines: [{ sku: 'A-1', qty: 2 }], paid: false, note: null }

    await cache.set(createKey('doc'), value)

    expect((await cache.get(createKey('doc')))?.value).toEqual(value)
  })

  it('round-trips the invoice scenario key', async () => {
    const cache = open()
    const key = Fingerprint.parse('abc123:def456:ghi789:gemini')

    await cache.set(key, { invoice_number: 'INV-001' })

    expect(key.toString()).toBe('abc123:def456:ghi789:gemini')
    expect((await cache.get(key))?.value).toEqual({ invoice_number: 'INV-001' })
  })

  it('expires entries after their TTL', async () => {
    const cache = open(0.1)
    await cache.set(createKey('doc'), 'value')

    expect((await cache.get(createKey('doc')))?.value).toBe('value')

    await sleep(150)
    expect(await cache.get(createKey('doc'))).toBeNull()
  })

  it('returns 0 when clearing an empty cache', async () => {
    const cache = open()
    expect(await cache.clear()).toBe(0)
    expect(await cache.get(createKey('doc'))).toBeNull()
  })

  it('keeps keys with different models apart', async () => {
    const cache = open()
    await cache.set(createKey('doc', { model: 'small' }), 'small')
    await cache.set(createKey('doc', { model: 'large' }), 'large')

    expect((await cache.get(createKey('doc', { model: 'small' })))?.value).toBe('small')
    expect((await cache.get(createKey('doc', { model: 'large' })))?.value).toBe('large')
    expect(await cache.get(createKey('doc'))).toBeNull()
  })

  it('keeps a colon in the provider apart from a provider and model', async () => {
    const cache = open()
    await cache.set(createKey('doc', { provider: 'ollama:llama3' }), 'merged')

    expect(await cache.get(createKey('doc', { provider: 'ollama', model: 'llama3' }))).toBeNull()
    await cache.set(createKey('doc', { provider: 'ollama', model: 'llama3:8b' }), 'tagged')
    const tagged = await cache.get(createKey('doc', { provider: 'ollama', model: 'llama3:8b' }))
    expect(tagged?.value).toBe('tagged')
  })

  it('rejects a negative TTL on set', async () => {
    const cache = open()
    await expect(cache.set(createKey('doc'), 1, -1)).rejects.toThrow(CacheError)
    await expect(cache.set(createKey('doc'), 1, Number.NaN)).rejects.toThrow(CacheError)
    expect(await cache.get(createKey('doc'))).toBeNull()
  })

  it('tracks hits, misses and hit rate', async () => {
    const cache = open()
    await cache.set(createKey('doc'), 1)
    await cache.get(createKey('doc'))
    await cache.get(createKey('other'))

    const stats = await cache.stats()
    expect(stats.backend).toBe(backend)
    expect(stats).toMatchObject({ size: 1, hits: 1, misses: 1, hitRate: 0.5 })
  })

  it('reports delete, cleanup and clear counts', async () => {
    const cache = open()
    await cache.set(createKey('expiring'), 1, 0.05)
    await cache.set(createKey('kept'), 2)
    await cache.set(createKey('deleted'), 3)

    expect(await cache.delete(createKey('deleted'))).toBe(true)
    await sleep(100)
    expect(await cache.cleanupExpired()).toBe(1)
    expect(await cache.clear()).toBe(1)
  })

  if (backend !== 'memory') {
    it('survives a new instance on the same location', async () => {
      const first = open()
      await first.set(createKey('doc'), { foo: 'bar' })
      await first.close()

      const second = open()
      expect((await second.get(createKey('doc')))?.value).toEqual({ foo: 'bar' })
    })
  }
})
