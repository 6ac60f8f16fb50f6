/**
 * Pino logger factory.
 *
 * Records go to stdout in the CLI, so logs are always written to stderr (fd 2).
 * Core components never read the environment; callers pass the level.
 */

import type { Logger } from 'pino';
import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? 'info',
      base: { app: 'harvester', ...(options.name ? { component: options.name } : {}) },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * For tests and unconfigured components - keeps the Logger type, emits nothing
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
