/**
 * SQLite Result Cache
 *
 * Durable, size-bounded store in a single database file. Several instances
 * (and processes) can share one file: WAL journaling lets readers proceed
 * while SQLite serializes the writers.
 */

import { mkdirSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import Database from 'better-sqlite3'
import type { Fingerprint } from '../fingerprint'
import { defaultLogger, type Logger } from '../logger'
import { isExpired, validateMaxSize, validateTtl } from './entry'
import { CacheError, type CacheOperation, describeError } from './errors'
import {
  type BaseCacheOptions,
  type CacheEntry,
  DEFAULT_MAX_SIZE,
  type ResultCache,
  type SqliteCacheStats
} from './types'

const DEFAULT_BUSY_TIMEOUT_MS = 5000

export interface SqliteCacheOptions extends BaseCacheOptions {
  /** Database file; parent directories are created. ':memory:' for a private database. */
  readonly path: string
  /** Row ceiling; rows with the oldest last_access are evicted beyond it */
  readonly maxSize?: number | undefined
  /** How long a writer waits for a lock held by another connection */
  readonly busyTimeoutMs?: number | undefined
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cache (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    ttl REAL,
    last_access REAL NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_cache_last_access ON cache (last_access);
`

// Strictly after every access already recorded, so recency stays ordered
// when several operations land in the same millisecond.
const NEXT_ACCESS = 'MAX(@now, (SELECT COALESCE(MAX(last_access), 0) + 0.001 FROM cache))'

interface CacheRow {
  value: string
  created_at: number
  ttl: number | null
}

function prepareStatements(db: Database.Database) {
  return {
    select: db.prepare<[string], CacheRow>(
      'SELECT value, created_at, ttl FROM cache WHERE key = ?'
    ),
    touch: db.prepare<{ key: string; now: number }>(
      `UPDATE cache SET last_access = ${NEXT_ACCESS} WHERE key = @key`
    ),
    upsert: db.prepare<{ key: string; value: string; now: number; ttl: number | null }>(
      `INSERT OR REPLACE INTO cache (key, value, created_at, ttl, last_access)
       VALUES (@key, @value, @now, @ttl, ${NEXT_ACCESS})`
    ),
    count: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM cache'),
    evictOldest: db.prepare<[number]>(
      'DELETE FROM cache WHERE key IN (SELECT key FROM cache ORDER BY last_access ASC LIMIT ?)'
    ),
    // created_at guards against removing a row another connection replaced meanwhile
    deleteSeen: db.prepare<[string, number]>('DELETE FROM cache WHERE key = ? AND created_at = ?'),
    deleteKey: db.prepare<[string]>('DELETE FROM cache WHERE key = ?'),
    deleteAll: db.prepare('DELETE FROM cache'),
    deleteExpired: db.prepare<[number]>(
      'DELETE FROM cache WHERE ttl IS NOT NULL AND ? - created_at > ttl * 1000'
    )
  }
}

type Statements = ReturnType<typeof prepareStatements>

/**
 * Open the database and create the schema.
 * @throws CacheError if the file cannot be created or opened
 */
function openStore(
  path: string,
  busyTimeoutMs: number
): { db: Database.Database; statements: Statements } {
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true })
    }
    const db = new Database(path, { timeout: busyTimeoutMs })
    db.pragma('journal_mode = WAL')
    db.exec(SCHEMA)
    return { db, statements: prepareStatements(db) }
  } catch (error) {
    throw new CacheError(`Cannot open cache database ${path}: ${describeError(error)}`, {
      operation: 'open',
      details: { path },
      cause: error
    })
  }
}

/**
 * SQLite-backed cache with LRU eviction by last access.
 *
 * Table `cache`: key, value (JSON text), created_at (epoch ms), ttl (seconds),
 * last_access (epoch ms).
 *
 * @example
 * ```ts
 * const cache = new SqliteCache({ path: '.cache/results.db', maxSize: 1000, ttlSeconds: 86400 })
 * await cache.set(key, { invoice_number: 'INV-001' })
 * await cache.close()
 * ```
 */
export class SqliteCache implements ResultCache<unknown> {
  readonly path: string
  private readonly db: Database.Database
  private readonly statements: Statements
  private readonly maxSize: number
  private readonly ttlSeconds: number | null
  private readonly logger: Logger
  private hits = 0
  private misses = 0
  private evictions = 0

  /**
   * The database file and table exist once the constructor returns.
   * @throws CacheError if the database cannot be opened
   */
  constructor(options: SqliteCacheOptions) {
    this.path = options.path === ':memory:' ? options.path : resolve(options.path)
    this.maxSize = validateMaxSize(options.maxSize ?? DEFAULT_MAX_SIZE)
    this.ttlSeconds = validateTtl(options.ttlSeconds ?? null)
    this.logger = options.logger ?? defaultLogger

    const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS
    const { db, statements } = openStore(this.path, busyTimeoutMs)
    this.db = db
    this.statements = statements
  }

  async get(key: Fingerprint): Promise<CacheEntry | null> {
    const id = key.toString()
    const entry = this.guard<CacheEntry | null>('get', null, () => {
      const row = this.statements.select.get(id)
      if (row === undefined) return null

      const now = Date.now()
      if (isExpired({ createdAt: row.created_at, ttlSeconds: row.ttl }, now)) {
        this.statements.deleteSeen.run(id, row.created_at)
        return null
      }

      let value: unknown
      try {
        value = JSON.parse(row.value)
      } catch {
        this.logger.warn(`Discarding undecodable cache row ${id}`)
        this.statements.deleteSeen.run(id, row.created_at)
        return null
      }

      this.statements.touch.run({ key: id, now })
      return { value, createdAt: row.created_at, ttlSeconds: row.ttl }
    })

    if (entry === null) {
      this.misses++
    } else {
      this.hits++
    }
    return entry
  }

  async set(key: Fingerprint, value: unknown, ttlSeconds?: number | null): Promise<void> {
    const ttl = ttlSeconds === undefined ? this.ttlSeconds : validateTtl(ttlSeconds)
    if (value === undefined) {
      this.logger.warn(`Not caching undefined value for ${key.toString()}`)
      return
    }

    this.guard<void>('set', undefined, () => {
      const write = this.db.transaction((json: string) => {
        this.statements.upsert.run({ key: key.toString(), value: json, now: Date.now(), ttl })
        const excess = (this.statements.count.get()?.count ?? 0) - this.maxSize
        return excess > 0 ? this.statements.evictOldest.run(excess).changes : 0
      })
      const evicted = write.immediate(JSON.stringify(value))
      this.evictions += evicted
      if (evicted > 0) {
        this.logger.verbose(`sqlite cache evicted ${evicted} least recently used rows`)
      }
    })
  }

  async delete(key: Fingerprint): Promise<boolean> {
    return this.guard('delete', false, () => {
      return this.statements.deleteKey.run(key.toString()).changes > 0
    })
  }

  async clear(): Promise<number> {
    return this.guard('clear', 0, () => this.statements.deleteAll.run().changes)
  }

  async cleanupExpired(): Promise<number> {
    return this.guard('cleanup', 0, () => this.statements.deleteExpired.run(Date.now()).changes)
  }

  async stats(): Promise<SqliteCacheStats> {
    const size = this.guard('stats', 0, () => this.statements.count.get()?.count ?? 0)
    const lookups = this.hits + this.misses
    return {
      backend: 'sqlite',
      path: this.path,
      size,
      maxSize: this.maxSize,
      ttlSeconds: this.ttlSeconds,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close()
    }
  }

  /**
   * Run a database operation, logging failures and returning the fallback.
   */
  private guard<R>(operation: CacheOperation, fallback: R, run: () => R): R {
    try {
      return run()
    } catch (error) {
      this.logger.warn(`SQLite cache ${operation} failed on ${this.path}: ${describeError(error)}`)
      return fallback
    }
  }
}
