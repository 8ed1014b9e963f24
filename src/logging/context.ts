// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Request Correlation via AsyncLocalStorage
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  requestId?: string;
  path?: string;
}

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run `fn` with a logging context; every log line written inside it
 * (including from awaited work) carries these fields.
 */
export function runWithContext<T>(context: LoggingContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getLoggingContext(): LoggingContext {
  return storage.getStore() ?? {};
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}
