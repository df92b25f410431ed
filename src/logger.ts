/**
 * Structured logger: pino writing JSON lines to stdout.
 *
 * Levels are emitted as labels ("info", not 30) and timestamps as ISO 8601.
 */

import { pino, type DestinationStream, type LoggerOptions } from 'pino';
import type { Logger } from './types.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Writes to stdout unless a destination stream is given. */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: undefined,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const root = destination ? pino(options, destination) : pino(options);
  return {
    info: (msg: string) => root.info(msg),
    warn: (msg: string) => root.warn(msg),
    error: (msg: string) => root.error(msg),
    debug: (msg: string) => root.debug(msg),
  };
}
