import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly for component loggers.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ signal: 'interrupt' }, 'Shutdown requested');
 *   logger.error({ err: error }, 'Operation failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * The leveled logging capability a shutdown run reports through.
 * Message first; trailing arguments are structured fields or positional values.
 */
export interface ShutdownLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
