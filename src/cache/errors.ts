/**
 * Cache Errors
 */

export type CacheOperation =
  | 'open'
  | 'get'
  | 'set'
  | 'delete'
  | 'clear'
  | 'cleanup'
  | 'stats'
  | 'parse'
  | 'config'

/**
 * Raised when a cache cannot be constructed or its configuration is invalid.
 *
 * Once a backend is open, its operations never reject with this error: they
 * log and degrade to a miss instead.
 */
export class CacheError extends Error {
  readonly operation: CacheOperation
  readonly details: Readonly<Record<string, unknown>>

  constructor(
    message: string,
    options: {
      operation: CacheOperation
      details?: Record<string, unknown> | undefined
      cause?: unknown
    }
  ) {
    super(message, { cause: options.cause })
    this.name = 'CacheError'
    this.operation = options.operation
    this.details = options.details ?? {}
  }
}

/**
 * Render an unknown thrown value for log output.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
