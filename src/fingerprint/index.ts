/**
 * Fingerprint Module
 *
 * Stable cache keys derived from extraction inputs.
 */

export { canonicalize, sha256Hex } from './canonical'
export { deriveFingerprint, deriveFingerprintFromFile, Fingerprint } from './fingerprint'
export type { FingerprintComponents, FingerprintInput } from './types'
