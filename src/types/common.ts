/**
 * Common Types
 *
 * Result type returned by extractors and the provider calls behind them.
 */

export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'network'
  | 'invalid_response'
  | 'invalid_request'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }
