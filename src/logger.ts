/**
 * Structured Logging
 *
 * JSON line logging on top of pino. One root logger is created at startup
 * from LOG_LEVEL and handed to every component, which derives a child
 * carrying its module name:
 *
 * ```json
 * {"level":"info","time":"2024-01-15T10:30:00.000Z","service":"api-scaffold","module":"features","msg":"Authentication enabled, including protected routes"}
 * ```
 *
 * @example
 * ```typescript
 * import { createLogger } from './logger';
 *
 * const logger = createLogger({ level: config.logging.level });
 * const log = logger.child({ module: 'storage' });
 * log.info({ path }, 'Opening database');
 * ```
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config';
import { PROJECT_NAME } from './metadata';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Value of the `service` field on every line (default: package name) */
  name?: string;
  /** Where lines go (default: stdout) */
  destination?: DestinationStream;
}

/**
 * Creates the application's root logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name = PROJECT_NAME, destination } = options;

  const pinoOptions = {
    level,
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

/**
 * Logger that discards everything. Used by tests and as a default for
 * components constructed without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
