/**
 * Filesystem Result Cache
 *
 * Stores each result as a JSON file named after the SHA256 of its
 * fingerprint. Entries survive restarts and can be inspected by hand.
 */

import { randomUUID } from 'node:crypto'
import { mkdirSync } from 'node:fs'
import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { type Fingerprint, sha256Hex } from '../fingerprint'
import { defaultLogger, type Logger } from '../logger'
import { isExpired, type PersistedEntry, parsePersistedEntry, validateTtl } from './entry'
import { CacheError, describeError } from './errors'
import type { BaseCacheOptions, CacheEntry, FilesystemCacheStats, ResultCache } from './types'

const ENTRY_SUFFIX = '.json'
const TEMP_SUFFIX = '.tmp'

export interface FilesystemCacheOptions extends BaseCacheOptions {
  /** Directory holding the entry files; created if missing */
  readonly directory: string
}

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(directory: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'extraction-cache')
  if (directory.startsWith(realCacheDir)) {
    throw new CacheError(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${directory}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/extraction-cache/`,
      { operation: 'open', details: { directory } }
    )
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * File-per-entry cache.
 *
 * Directory structure:
 * ```
 * <directory>/
 * ├── 3a7bd3e2...json
 * └── 9f86d081...json
 * ```
 *
 * Writes go to a temporary file in the same directory and are renamed into
 * place, so readers only ever see complete records. Expired files stay on
 * disk (and in `size`) until cleanupExpired().
 */
export class FilesystemCache implements ResultCache<unknown> {
  readonly directory: string
  private readonly ttlSeconds: number | null
  private readonly logger: Logger
  private hits = 0
  private misses = 0

  /**
   * @throws CacheError if the directory cannot be created
   */
  constructor(options: FilesystemCacheOptions) {
    this.directory = resolve(options.directory)
    this.ttlSeconds = validateTtl(options.ttlSeconds ?? null)
    this.logger = options.logger ?? defaultLogger
    guardAgainstUserCache(this.directory)

    try {
      mkdirSync(this.directory, { recursive: true })
    } catch (error) {
      throw new CacheError(
        `Cannot create cache directory ${this.directory}: ${describeError(error)}`,
        { operation: 'open', details: { directory: this.directory }, cause: error }
      )
    }
  }

  async get(key: Fingerprint): Promise<CacheEntry | null> {
    const path = this.getEntryPath(key)

    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Cannot read cache entry ${path}: ${describeError(error)}`)
      }
      this.misses++
      return null
    }

    const record = parsePersistedEntry(raw)
    if (record === null) {
      this.logger.warn(`Discarding corrupt cache entry ${path}`)
      await this.removeFile(path)
      this.misses++
      return null
    }

    if (record.key !== key.toString() || isExpired(record)) {
      this.misses++
      return null
    }

    this.hits++
    return { value: record.value, createdAt: record.createdAt, ttlSeconds: record.ttlSeconds }
  }

  async set(key: Fingerprint, value: unknown, ttlSeconds?: number | null): Promise<void> {
    const ttl = ttlSeconds === undefined ? this.ttlSeconds : validateTtl(ttlSeconds)
    if (value === undefined) {
      this.logger.warn(`Not caching undefined value for ${key.toString()}`)
      return
    }

    const path = this.getEntryPath(key)
    const tempPath = `${path}.${process.pid}.${randomUUID()}${TEMP_SUFFIX}`
    const record: PersistedEntry = {
      key: key.toString(),
      value,
      createdAt: Date.now(),
      ttlSeconds: ttl
    }

    try {
      const body = JSON.stringify(record, null, 2)
      await mkdir(this.directory, { recursive: true })
      await writeFile(tempPath, body)
      await rename(tempPath, path)
    } catch (error) {
      this.logger.warn(`Cannot write cache entry ${path}: ${describeError(error)}`)
      await this.removeFile(tempPath)
    }
  }

  async delete(key: Fingerprint): Promise<boolean> {
    return this.removeFile(this.getEntryPath(key))
  }

  async cleanupExpired(): Promise<number> {
    const now = Date.now()
    let removed = 0

    for (const name of await this.listFiles()) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue
      const path = join(this.directory, name)

      let raw: string
      try {
        raw = await readFile(path, 'utf-8')
      } catch (error) {
        if (!isNotFound(error)) {
          this.logger.warn(`Cannot read cache entry ${path}: ${describeError(error)}`)
        }
        continue
      }

      const record = parsePersistedEntry(raw)
      if ((record === null || isExpired(record, now)) && (await this.removeFile(path))) {
        removed++
      }
    }

    return removed
  }

  async clear(): Promise<number> {
    let removed = 0
    for (const name of await this.listFiles()) {
      const isEntry = name.endsWith(ENTRY_SUFFIX)
      if (!isEntry && !name.endsWith(TEMP_SUFFIX)) continue
      const deleted = await this.removeFile(join(this.directory, name))
      if (deleted && isEntry) removed++
    }
    return removed
  }

  async stats(): Promise<FilesystemCacheStats> {
    const files = await this.listFiles()
    const lookups = this.hits + this.misses
    return {
      backend: 'file',
      directory: this.directory,
      size: files.filter((name) => name.endsWith(ENTRY_SUFFIX)).length,
      ttlSeconds: this.ttlSeconds,
      hits: this.hits,
      misses: this.misses,
      evictions: 0,
      hitRate: lookups === 0 ? 0 : this.hits / lookups
    }
  }

  async close(): Promise<void> {}

  /**
   * Path of the entry file for a fingerprint.
   */
  getEntryPath(key: Fingerprint): string {
    return join(this.directory, `${sha256Hex(key.toString())}${ENTRY_SUFFIX}`)
  }

  private async listFiles(): Promise<string[]> {
    try {
      return await readdir(this.directory)
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Cannot list cache directory ${this.directory}: ${describeError(error)}`)
      }
      return []
    }
  }

  private async removeFile(path: string): Promise<boolean> {
    try {
      await unlink(path)
      return true
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Cannot remove cache file ${path}: ${describeError(error)}`)
      }
      return false
    }
  }
}
