/**
 * Canonical Serialization
 *
 * Order-independent JSON for hashing schema descriptions.
 */

import { createHash } from 'node:crypto'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }

  const source = toSerializable(value)
  if (source !== value) {
    return sortKeys(source)
  }

  const sorted: Record<string, unknown> = {}
  const keys = Object.keys(value).sort()
  for (const key of keys) {
    sorted[key] = sortKeys(Reflect.get(value, key))
  }
  return sorted
}

/**
 * Objects with a toJSON method (Date, zod-to-json wrappers) serialize through it.
 */
function toSerializable(value: object): unknown {
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON()
    return json
  }
  return value
}

/**
 * Serialize a value to JSON with object keys sorted at every level.
 *
 * Logically identical schemas built in a different key order produce the same
 * string. `undefined` at the top level serializes as `null`.
 *
 * @example
 * ```ts
 * canonicalize({ b: 1, a: { d: 2, c: 3 } })
 * // '{"a":{"c":3,"d":2},"b":1}'
 * ```
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null'
}

/**
 * SHA256 hex digest of bytes or UTF-8 text.
 */
export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex')
}
