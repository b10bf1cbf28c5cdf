/**
 * Common types for the commune resolver
 */

/**
 * Error codes for recoverable strategy failures
 */
export type ErrorCode =
  | 'SIGNAL_UNAVAILABLE'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'INVALID_RESPONSE'
  | 'CANCELLED'
  | 'STRATEGY_ERROR';

/**
 * Structured error produced at a strategy boundary. Never thrown across the cascade.
 */
export interface MatcherError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: {
    provider?: string;
    requestId?: string;
    timeoutMs?: number;
    [key: string]: unknown;
  };
}

/**
 * Typed outcome of a fallible step
 */
export type Outcome<T, E = MatcherError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function success<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function failure<E>(error: E): Outcome<never, E> {
  return { ok: false, error };
}
