import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped log context
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  recordId?: number;
  [key: string]: unknown;
}

/**
 * Carries the log context across async operations without explicit parameter passing
 */
export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Add fields (caller identity, record id) to the current request's log context
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
