/**
 * @fileoverview Logging Context - AsyncLocalStorage for automatic context propagation
 *
 * Carries the installer run id, the current install state and the remote
 * method being called through async call chains, so every log line emitted
 * inside a run or a call is tagged without threading ids through each function.
 */

import { AsyncLocalStorage } from 'async_hooks';

// =============================================================================
// Types
// =============================================================================

export interface LoggingContext {
  runId?: string;
  state?: string;
  method?: string;
}

// =============================================================================
// AsyncLocalStorage Instance
// =============================================================================

const loggingContext = new AsyncLocalStorage<LoggingContext>();

// =============================================================================
// Public API
// =============================================================================

/**
 * Run a function with the specified logging context.
 * All logs within the function (including async operations) will inherit this context.
 *
 * @example
 * withLoggingContext({ runId: 'run_1a2b' }, () => {
 *   logger.info('This log will have runId attached');
 * });
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Get the current logging context.
 * Returns an empty object outside of a withLoggingContext block.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}

/**
 * Update the current logging context in place.
 * Only works inside a withLoggingContext block.
 */
export function updateLoggingContext(updates: Partial<LoggingContext>): void {
  const store = loggingContext.getStore();
  if (store) {
    Object.assign(store, updates);
  }
}
