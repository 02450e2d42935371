/**
 * Cached Extractor
 *
 * Wraps an extractor with a ResultCache. A repeated request (same document
 * bytes, prompt, schema, provider and model) is answered from the cache
 * without calling the provider.
 *
 * The cache is strictly optional: a failing or slow cache is logged and
 * treated as a miss, and the wrapped extractor always gets to run.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { describeError } from '../cache/errors'
import type { ResultCache } from '../cache/types'
import { deriveFingerprint, type Fingerprint } from '../fingerprint'
import { defaultLogger, type Logger } from '../logger'
import type { Result } from '../types/common'
import type { ExtractionRequest, Extractor } from './types'

const DEFAULT_CACHE_TIMEOUT_MS = 2000

export type CacheOutcome = 'hit' | 'miss' | 'error'

export interface CacheEvent {
  readonly outcome: CacheOutcome
  readonly key: Fingerprint
  /** Time spent on the cache lookup */
  readonly durationMs: number
}

export interface CachedExtractorOptions<T> {
  readonly cache: ResultCache
  /** Validates cached values before they are returned */
  readonly resultSchema: ZodType<T, ZodTypeDef, unknown>
  /** TTL for stored results; the cache's default when omitted */
  readonly ttlSeconds?: number | null | undefined
  /** Cache calls slower than this count as failures */
  readonly cacheTimeoutMs?: number | undefined
  readonly logger?: Logger | undefined
  readonly onCacheEvent?: ((event: CacheEvent) => void) | undefined
}

type Lookup<T> =
  | { readonly hit: true; readonly value: T }
  | { readonly hit: false; readonly outcome: 'miss' | 'error' }

/**
 * Settle with the promise, or reject once timeoutMs has passed.
 */
async function withTimeout<R>(promise: Promise<R>, timeoutMs: number, label: string): Promise<R> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`cache ${label} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Extractor that consults a cache first.
 *
 * @example
 * ```ts
 * const cached = new CachedExtractor(geminiExtractor, {
 *   cache: new SqliteCache({ path: '.cache/extractions.db' }),
 *   resultSchema: invoiceSchema,
 *   ttlSeconds: 86400
 * })
 *
 * // First call reaches the provider, the second is served from the cache
 * await cached.extract({ document: pdfBytes, prompt: 'Extract all invoice details', schema })
 * await cached.extract({ document: pdfBytes, prompt: 'Extract all invoice details', schema })
 * ```
 */
export class CachedExtractor<T> implements Extractor<T> {
  private readonly cache: ResultCache
  private readonly resultSchema: ZodType<T, ZodTypeDef, unknown>
  private readonly ttlSeconds: number | null | undefined
  private readonly cacheTimeoutMs: number
  private readonly logger: Logger
  private readonly onCacheEvent: ((event: CacheEvent) => void) | undefined
  private outcome: CacheOutcome | null = null

  constructor(
    private readonly extractor: Extractor<T>,
    options: CachedExtractorOptions<T>
  ) {
    this.cache = options.cache
    this.resultSchema = options.resultSchema
    this.ttlSeconds = options.ttlSeconds
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? DEFAULT_CACHE_TIMEOUT_MS
    this.logger = options.logger ?? defaultLogger
    this.onCacheEvent = options.onCacheEvent
  }

  get provider(): string {
    return this.extractor.provider
  }

  get model(): string | undefined {
    return this.extractor.model
  }

  /**
   * Cache outcome of the most recent extract() call, null before the first.
   */
  get lastOutcome(): CacheOutcome | null {
    return this.outcome
  }

  /**
   * Fingerprint a request the way extract() does.
   */
  fingerprint(request: ExtractionRequest): Fingerprint {
    return deriveFingerprint({
      document: request.document,
      prompt: request.prompt,
      schema: request.schema,
      provider: this.extractor.provider,
      model: this.extractor.model
    })
  }

  async extract(request: ExtractionRequest): Promise<Result<T>> {
    const key = this.fingerprint(request)

    const started = Date.now()
    const lookup = await this.lookup(key)
    const outcome = lookup.hit ? 'hit' : lookup.outcome
    this.outcome = outcome
    this.logger.verbose(`cache ${outcome} for ${key.toString()}`)
    this.onCacheEvent?.({ outcome, key, durationMs: Date.now() - started })

    if (lookup.hit) {
      return { ok: true, value: lookup.value }
    }

    const result = await this.extractor.extract(request)
    if (result.ok) {
      await this.store(key, result.value)
    }
    return result
  }

  private async lookup(key: Fingerprint): Promise<Lookup<T>> {
    let value: unknown
    try {
      const entry = await withTimeout(this.cache.get(key), this.cacheTimeoutMs, 'get')
      if (entry === null) return { hit: false, outcome: 'miss' }
      value = entry.value
    } catch (error) {
      this.logger.warn(`Cache lookup failed, extracting instead: ${describeError(error)}`)
      return { hit: false, outcome: 'error' }
    }

    const parsed = this.resultSchema.safeParse(value)
    if (!parsed.success) {
      this.logger.warn(`Cached result for ${key.toString()} does not match the result schema`)
      await this.discard(key)
      return { hit: false, outcome: 'miss' }
    }
    return { hit: true, value: parsed.data }
  }

  private async store(key: Fingerprint, value: T): Promise<void> {
    try {
      await withTimeout(this.cache.set(key, value, this.ttlSeconds), this.cacheTimeoutMs, 'set')
    } catch (error) {
      this.logger.warn(`Cannot cache result for ${key.toString()}: ${describeError(error)}`)
    }
  }

  private async discard(key: Fingerprint): Promise<void> {
    try {
      await withTimeout(this.cache.delete(key), this.cacheTimeoutMs, 'delete')
    } catch (error) {
      this.logger.warn(`Cannot remove cached result for ${key.toString()}: ${describeError(error)}`)
    }
  }
}
