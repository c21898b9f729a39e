/**
 * Session Context
 *
 * Uses Node.js `AsyncLocalStorage` to tag everything that runs inside one
 * host callback with the session that is handling it. Host callbacks are
 * synchronous, so `run()` scopes exactly one dispatch.
 *
 * The logger reads it automatically so every log line includes `sessionId`.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface SessionContext {
  /** Identifier of the orchestrator session handling the callback. */
  sessionId: string;
}

/**
 * Singleton AsyncLocalStorage instance shared across the process.
 */
export const sessionContext = new AsyncLocalStorage<SessionContext>();

/**
 * Get the current session context, or `undefined` when called outside a
 * host callback (module load, CLI tools).
 */
export function getSessionContext(): SessionContext | undefined {
  return sessionContext.getStore();
}

export function runInSession<T>(sessionId: string, fn: () => T): T {
  return sessionContext.run({ sessionId }, fn);
}
