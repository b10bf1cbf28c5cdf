/**
 * Error handling and mapping for the commune resolver
 */

import type { ErrorCode, MatcherError } from './types.js';
import { logger } from './logger.js';

/**
 * Raised when the gazetteer cannot be built because reference data is empty or missing.
 * This is the only failure that keeps the resolver from becoming ready.
 */
export class DataUnavailableError extends Error {
  readonly code = 'DATA_UNAVAILABLE';
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DataUnavailableError';
    this.details = details;
  }
}

/**
 * Why an in-flight provider call was aborted
 */
export type AbortReason = 'timeout' | 'cancelled';

/**
 * Create a structured matcher error
 *
 * @param code - Error code
 * @param message - Human-readable error message
 * @param details - Additional error details
 */
export function createMatcherError(
  code: ErrorCode,
  message: string,
  details?: MatcherError['details']
): MatcherError {
  const retryable = code === 'PROVIDER_TIMEOUT' || code === 'PROVIDER_ERROR';

  return {
    code,
    message,
    retryable,
    details,
  };
}

/**
 * Error for a capability that is not configured in this process
 */
export function createSignalUnavailableError(
  provider: string,
  reason: string
): MatcherError {
  return createMatcherError('SIGNAL_UNAVAILABLE', `${provider} is unavailable: ${reason}`, {
    provider,
  });
}

/**
 * Type guard for structured matcher errors
 */
export function isMatcherError(value: unknown): value is MatcherError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

/**
 * Map a failure from an embedding or LLM provider call onto a matcher error
 *
 * @param error - Whatever the provider call rejected with
 * @param provider - Provider label used in logs and details
 * @param abortReason - Set when the call was aborted by its deadline or by the caller
 * @param timeoutMs - Deadline applied to the call
 * @param requestId - Optional request ID for tracking
 */
export function handleProviderError(
  error: unknown,
  provider: string,
  abortReason?: AbortReason,
  timeoutMs?: number,
  requestId?: string
): MatcherError {
  if (isMatcherError(error)) {
    return error;
  }

  if (abortReason === 'cancelled') {
    logger.debug('Provider call cancelled by caller', { provider, requestId });
    return createMatcherError('CANCELLED', `${provider} call was cancelled`, {
      provider,
      requestId,
    });
  }

  if (abortReason === 'timeout') {
    logger.warn('Provider call timed out', { provider, timeoutMs, requestId });
    return createMatcherError(
      'PROVIDER_TIMEOUT',
      `${provider} did not answer within ${timeoutMs}ms`,
      { provider, timeoutMs, requestId }
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  const upstreamStatus =
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
      ? error.status
      : undefined;

  logger.warn('Provider call failed', {
    provider,
    error: message,
    upstreamStatus,
    requestId,
  });

  return createMatcherError('PROVIDER_ERROR', `${provider} call failed: ${message}`, {
    provider,
    requestId,
    ...(upstreamStatus !== undefined ? { upstreamStatus } : {}),
  });
}
