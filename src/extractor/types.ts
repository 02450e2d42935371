/**
 * Extractor Types
 */

import type { Result } from '../types/common'

/**
 * One document-extraction call.
 */
export interface ExtractionRequest {
  /** Raw document bytes, or its text */
  readonly document: Uint8Array | string
  /** Extraction instruction */
  readonly prompt: string
  /** Description of the expected output shape */
  readonly schema: unknown
}

/**
 * Anything that turns a document into a structured result by calling a provider.
 */
export interface Extractor<T> {
  /** Provider identifier: 'gemini', 'openai', 'anthropic' */
  readonly provider: string
  readonly model?: string | undefined
  extract(request: ExtractionRequest): Promise<Result<T>>
}
