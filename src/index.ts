/**
 * Extraction Cache Library
 *
 * Content-addressable caching for document-extraction results.
 *
 * Design principle: callers only see the ResultCache contract. Fingerprints
 * are pure functions of the request; backends own storage, expiry and
 * eviction.
 *
 * @license AGPL-3.0
 */

// Cache module
export {
  type CacheBackend,
  type CacheConfig,
  type CacheEntry,
  CacheError,
  type CacheOperation,
  type CacheStats,
  createEntry,
  createResultCache,
  DEFAULT_MAX_SIZE,
  describeCacheConfig,
  FilesystemCache,
  type FilesystemCacheOptions,
  type FilesystemCacheStats,
  isExpired,
  MemoryCache,
  type MemoryCacheOptions,
  type MemoryCacheStats,
  type ResultCache,
  SqliteCache,
  type SqliteCacheOptions,
  type SqliteCacheStats
} from './cache/index'
// Extractor module
export {
  type CacheEvent,
  CachedExtractor,
  type CachedExtractorOptions,
  type CacheOutcome,
  type ExtractionRequest,
  type Extractor
} from './extractor/index'
// Fingerprint module
export {
  canonicalize,
  deriveFingerprint,
  deriveFingerprintFromFile,
  Fingerprint,
  type FingerprintComponents,
  type FingerprintInput,
  sha256Hex
} from './fingerprint/index'
// Logging
export { createLogger, defaultLogger, type Logger, silentLogger } from './logger'
// Types
export type { ApiError, ApiErrorType, Result } from './types/common'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
