/**
 * Fingerprint Types
 */

/**
 * The five components that identify an extraction request.
 */
export interface FingerprintComponents {
  /** SHA256 of the document bytes */
  readonly contentHash: string
  /** SHA256 of the prompt text */
  readonly promptHash: string
  /** SHA256 of the canonical schema JSON */
  readonly schemaHash: string
  /** Provider identifier: 'gemini', 'openai', 'anthropic' */
  readonly provider: string
  /** Model identifier, empty when the provider default is used */
  readonly model?: string | undefined
}

/**
 * Raw inputs of an extraction request, before hashing.
 */
export interface FingerprintInput {
  /** Document bytes. Strings are hashed as UTF-8. */
  readonly document: Uint8Array | string
  /** Extraction instruction sent to the provider */
  readonly prompt: string
  /** Description of the expected output shape (any JSON-like structure) */
  readonly schema: unknown
  readonly provider: string
  readonly model?: string | undefined
}
