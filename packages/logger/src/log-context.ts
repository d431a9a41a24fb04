/**
 * @fileoverview Log context propagation using AsyncLocalStorage.
 *
 * Each analysis cycle, backfill or server request runs inside its own context
 * so every log line it produces carries the same `cycle_id`.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Fields carried through a logical operation.
 */
export interface LogContext {
  /** Unique identifier of the operation (UUID v4 unless supplied) */
  cycle_id: string;

  [key: string]: unknown;
}

const contextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Generate a new context identifier (UUID v4).
 */
export function generateContextId(): string {
  return randomUUID();
}

/**
 * Get the active log context, or undefined outside of one.
 */
export function getLogContext(): LogContext | undefined {
  return contextStorage.getStore();
}

/**
 * Get the `cycle_id` of the active context.
 *
 * @example
 * ```typescript
 * await withLogContext(async () => {
 *   logger.info('cycle started', { cycle_id: getContextId() });
 * });
 * ```
 */
export function getContextId(): string | undefined {
  return contextStorage.getStore()?.cycle_id;
}

/**
 * Run a function inside a new log context. The id propagates through every
 * await made by the function.
 *
 * @param fn - Function to execute
 * @param contextId - Identifier to use; a new one is generated when omitted
 * @param additionalContext - Extra fields stored alongside the id
 *
 * @example
 * ```typescript
 * await withLogContext(() => service.backfill(), undefined, { operation: 'backfill' });
 * ```
 */
export async function withLogContext<T>(
  fn: () => Promise<T> | T,
  contextId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: LogContext = {
    ...additionalContext,
    cycle_id: contextId ?? generateContextId(),
  };

  return contextStorage.run(context, fn);
}

/**
 * Synchronous variant of {@link withLogContext}. Analysis cycles are pure
 * computation and use this one.
 */
export function withLogContextSync<T>(
  fn: () => T,
  contextId?: string,
  additionalContext?: Record<string, unknown>
): T {
  const context: LogContext = {
    ...additionalContext,
    cycle_id: contextId ?? generateContextId(),
  };

  return contextStorage.run(context, fn);
}

/**
 * Merge fields into the active context.
 *
 * @returns false when called outside of a context
 */
export function setLogContext(fields: Record<string, unknown>): boolean {
  const context = contextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
