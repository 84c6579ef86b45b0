/**
 * @fileoverview Logging Context - AsyncLocalStorage for automatic context propagation
 *
 * Carries the tool name and call id of the request being served through the
 * bridge's async call chain, so engine traffic logs can be tied to a call.
 */

import { AsyncLocalStorage } from 'async_hooks';

// =============================================================================
// Types
// =============================================================================

export interface LoggingContext {
  toolName?: string;
  callId?: string;
  [key: string]: unknown;
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
 * withLoggingContext({ toolName: 'analyze_position' }, () => {
 *   logger.info('This log will have toolName attached');
 * });
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  // Merge with parent context if exists
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Get the current logging context.
 * Returns an empty object if called outside of a withLoggingContext block.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}
