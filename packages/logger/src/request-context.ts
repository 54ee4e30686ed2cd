/**
 * @fileoverview Request context management using AsyncLocalStorage.
 *
 * One CLI invocation or command run is one "request"; its id is propagated
 * through every await without being passed around explicitly.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Request context structure
 */
export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a new request ID (UUID v4).
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Get the active request context, if any.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Get the active request ID, if any.
 *
 * @example
 * ```typescript
 * const requestId = getRequestId();
 * logger.info('Fetching bars', { request_id: requestId });
 * ```
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Run a function inside a new request context.
 *
 * @param fn - Function to execute
 * @param requestId - Request ID to use; a new one is generated when omitted
 * @param additionalContext - Extra fields stored alongside the request ID
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   await command.execute(['MSFT'], {});
 * }, undefined, { command: 'technical' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    request_id: requestId || generateRequestId(),
    ...additionalContext,
  };

  return requestContextStorage.run(context, fn);
}
