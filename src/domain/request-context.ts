/**
 * Request context
 * Propagates a requestId through every async step of one match call using AsyncLocalStorage
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  /** Generation the call reads from, attached to every log line written inside it */
  generationId?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with request context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the current requestId, or undefined outside a match call
 */
export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}
