/**
 * Extraction Fingerprints
 *
 * Deterministic cache keys for document-extraction requests. Each input is
 * hashed on its own so component boundaries can never blur together.
 */

import { readFile } from 'node:fs/promises'
import { CacheError } from '../cache/errors'
import { canonicalize, sha256Hex } from './canonical'
import type { FingerprintComponents, FingerprintInput } from './types'

const DELIMITER = ':'

// Provider and model are free text; '%' and ':' are percent-encoded so the
// delimiter only ever separates components.
function encodeSegment(segment: string): string {
  return segment.replace(/%/g, '%25').replace(/:/g, '%3A')
}

function decodeSegment(segment: string): string {
  return segment.replace(/%(25|3A)/gi, (_, code: string) => (code === '25' ? '%' : ':'))
}

/**
 * Immutable identity of an extraction request.
 *
 * Canonical form: `contentHash:promptHash:schemaHash:provider[:model]`.
 * The model segment is left off when no model was given. A `:` inside the
 * provider or model is written as `%3A` (and `%` as `%25`).
 */
export class Fingerprint implements FingerprintComponents {
  readonly contentHash: string
  readonly promptHash: string
  readonly schemaHash: string
  readonly provider: string
  readonly model: string

  constructor(components: FingerprintComponents) {
    this.contentHash = components.contentHash
    this.promptHash = components.promptHash
    this.schemaHash = components.schemaHash
    this.provider = components.provider.toLowerCase()
    this.model = (components.model ?? '').toLowerCase()
    Object.freeze(this)
  }

  /**
   * Rebuild a fingerprint from its canonical string.
   */
  static parse(text: string): Fingerprint {
    const parts = text.split(DELIMITER)
    const [contentHash, promptHash, schemaHash, provider, model] = parts
    if (
      (parts.length !== 4 && parts.length !== 5) ||
      !contentHash ||
      !promptHash ||
      !schemaHash ||
      !provider
    ) {
      throw new CacheError(`Not a fingerprint: "${text}"`, {
        operation: 'parse',
        details: { text }
      })
    }
    return new Fingerprint({
      contentHash,
      promptHash,
      schemaHash,
      provider: decodeSegment(provider),
      model: model === undefined ? undefined : decodeSegment(model)
    })
  }

  equals(other: FingerprintComponents): boolean {
    return (
      this.contentHash === other.contentHash &&
      this.promptHash === other.promptHash &&
      this.schemaHash === other.schemaHash &&
      this.provider === other.provider.toLowerCase() &&
      this.model === (other.model ?? '').toLowerCase()
    )
  }

  /**
   * 32-bit hash of the canonical string. Equal fingerprints hash identically.
   */
  hashCode(): number {
    let hash = 0
    const text = this.toString()
    for (let i = 0; i < text.length; i++) {
      hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0
    }
    return hash
  }

  toString(): string {
    const parts = [
      this.contentHash,
      this.promptHash,
      this.schemaHash,
      encodeSegment(this.provider)
    ]
    if (this.model) parts.push(encodeSegment(this.model))
    return parts.join(DELIMITER)
  }

  toJSON(): string {
    return this.toString()
  }
}

/**
 * Derive the fingerprint of an extraction request.
 *
 * @example
 * ```ts
 * const key = deriveFingerprint({
 *   document: pdfBytes,
 *   prompt: 'Extract all invoice details',
 *   schema: { type: 'object', properties: { total: { type: 'number' } } },
 *   provider: 'Gemini',
 *   model: 'gemini-2.5-flash'
 * })
 * key.toString()
 * // '<sha256>:<sha256>:<sha256>:gemini:gemini-2.5-flash'
 * ```
 */
export function deriveFingerprint(input: FingerprintInput): Fingerprint {
  return new Fingerprint({
    contentHash: sha256Hex(input.document),
    promptHash: sha256Hex(input.prompt),
    schemaHash: sha256Hex(canonicalize(input.schema)),
    provider: input.provider,
    model: input.model
  })
}

/**
 * Derive a fingerprint from a document on disk.
 * Only the file's bytes enter the key, never its path.
 */
export async function deriveFingerprintFromFile(
  filePath: string,
  input: Omit<FingerprintInput, 'document'>
): Promise<Fingerprint> {
  const bytes = await readFile(filePath)
  return deriveFingerprint({ ...input, document: new Uint8Array(bytes) })
}
