/**
 * Extractor Module
 *
 * Extractor contract and the caching wrapper around it.
 */

export {
  type CacheEvent,
  CachedExtractor,
  type CachedExtractorOptions,
  type CacheOutcome
} from './cached'
export type { ExtractionRequest, Extractor } from './types'
