/**
 * @fileoverview Request context management using AsyncLocalStorage.
 *
 * Gives every CLI invocation and every refresh job its own request id so
 * that log lines from one cycle can be correlated.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Current request id, or undefined outside of a request context.
 *
 * @example
 * ```typescript
 * logger.info('Committing schedule', { request_id: getRequestId() });
 * ```
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` within a new request context. The id propagates through every
 * async continuation started inside `fn`.
 *
 * @param fn - Function to execute within the context
 * @param requestId - Id to use; a new UUID is generated when omitted
 * @param additionalContext - Extra fields stored alongside the id
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

/**
 * Merges fields into the current context.
 *
 * @returns false when called outside of a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}

/**
 * Request context for CLI commands.
 *
 * @example
 * ```typescript
 * await withCLIRequestContext('cli:status', { at: '2025-01-02T15:00:00Z' })(async () => {
 *   await statusCommand.execute(args, options);
 * });
 * ```
 */
export function withCLIRequestContext(operation: string, args?: Record<string, unknown>) {
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    return withRequestContext(() => fn(), generateRequestId(), {
      context: 'cli',
      operation,
      ...args,
    });
  };
}

/**
 * Request context for background jobs such as the daily refresh.
 *
 * @example
 * ```typescript
 * await withJobRequestContext('calendar-refresh', { trigger: 'schedule' })(() =>
 *   orchestrator.runRefreshCycle()
 * );
 * ```
 */
export function withJobRequestContext(jobName: string, metadata?: Record<string, unknown>) {
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    return withRequestContext(() => fn(), generateRequestId(), {
      context: 'job',
      job_name: jobName,
      ...metadata,
    });
  };
}
