/**
 * Structured Logger (pino-backed)
 *
 * Every log line is a JSON object containing:
 *   - `level`    : pino numeric level
 *   - `time`     : epoch ms
 *   - `service`  : the tag passed to `createLogger`
 *   - `sessionId`: auto-injected from AsyncLocalStorage (inside a host callback)
 *   - `msg`      : human-readable message
 *   - …any extra fields from the payload object
 *
 * `fatal` means "operation abandoned", never "process terminated".
 *
 * Output can be piped through `pino-pretty` for human-readable formatting.
 */

import pino from 'pino';
import { getEnv, resolveLogLevel } from '../config/env';
import { getSessionContext } from './sessionContext';

// ─────────────────────────────────────────────────────────────────────────────
// Root pino instance
// ─────────────────────────────────────────────────────────────────────────────

const rootLogger = pino({
  level: resolveLogLevel(getEnv()),
  mixin() {
    const ctx = getSessionContext();
    return ctx ? { sessionId: ctx.sessionId } : {};
  },
  serializers: pino.stdSerializers,
});

// ─────────────────────────────────────────────────────────────────────────────
// Public interface
// ─────────────────────────────────────────────────────────────────────────────

export type LogPayload = Record<string, unknown>;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  fatal(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
}

/**
 * Create a child logger scoped to a specific module.
 *
 *   const logger = createLogger('votingAdapter');
 *   logger.warn({ mode, key, value }, 'dropping malformed option');
 */
export function createLogger(prefix: string): Logger {
  const child = rootLogger.child({ service: prefix });

  function log(level: LogLevel, payload: LogPayload | string, message?: string): void {
    if (typeof payload === 'string') {
      child[level](payload);
    } else {
      child[level](payload, message ?? '');
    }
  }

  return {
    fatal: (p, m) => log('fatal', p, m),
    error: (p, m) => log('error', p, m),
    warn: (p, m) => log('warn', p, m),
    info: (p, m) => log('info', p, m),
    debug: (p, m) => log('debug', p, m),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
