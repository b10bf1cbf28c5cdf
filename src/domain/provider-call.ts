/**
 * Deadline and cancellation handling for outbound provider calls
 */

import type { Outcome } from './types.js';
import { failure, success } from './types.js';
import { handleProviderError, type AbortReason } from './error-handler.js';
import { logger } from './logger.js';
import { getRequestId } from './request-context.js';

export interface ProviderCallOptions {
  /** Provider label for logs and error details */
  provider: string;
  /** Deadline for the call in milliseconds */
  timeoutMs: number;
  /** Caller's signal; aborting it aborts only this call */
  signal?: AbortSignal;
}

/**
 * Run one provider call under its own AbortController, linked to the caller's signal
 * and aborted when the deadline passes. The call settles as soon as the controller
 * aborts, even if the provider ignores the signal.
 *
 * Never rejects: failures come back as a MatcherError.
 */
export async function callProvider<T>(
  options: ProviderCallOptions,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<Outcome<T>> {
  const { provider, timeoutMs, signal } = options;
  const requestId = getRequestId();
  const startTime = Date.now();

  if (signal?.aborted) {
    return failure(handleProviderError(undefined, provider, 'cancelled', timeoutMs, requestId));
  }

  const controller = new AbortController();
  let abortReason: AbortReason | undefined;

  const timeoutId = setTimeout(() => {
    abortReason = 'timeout';
    controller.abort();
  }, timeoutMs);

  const onCallerAbort = () => {
    if (!abortReason) {
      abortReason = 'cancelled';
    }
    controller.abort();
  };
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const value = await new Promise<T>((resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`${provider} call aborted`)),
        { once: true }
      );
      fn(controller.signal).then(resolve, reject);
    });

    logger.logProviderCall(provider, 'success', Date.now() - startTime, requestId);
    return success(value);
  } catch (error) {
    const matcherError = handleProviderError(error, provider, abortReason, timeoutMs, requestId);
    logger.logProviderCall(provider, 'error', Date.now() - startTime, requestId, matcherError.code);
    return failure(matcherError);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}
