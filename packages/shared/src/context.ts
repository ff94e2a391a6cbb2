/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the document currently being processed
 * across API requests and ingestion batches.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  batchId?: string;
  documentName?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a child context that inherits the current one.
 */
export async function runWithContextAsync<T>(
  context: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const merged: RequestContext = {
    ...parent,
    ...context,
    correlationId: context.correlationId || parent?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(merged, fn);
}

export { asyncLocalStorage };
