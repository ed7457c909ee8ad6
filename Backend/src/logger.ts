// src/logger.ts
import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
export const log = pino({
  level,
  base: undefined, // keeps logs small (no pid/hostname)
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof log;

/** Per-module child logger: `moduleLog("fanout").warn(...)`. */
export function moduleLog(mod: string): Logger {
  return log.child({ mod });
}
