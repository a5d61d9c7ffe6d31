import pino from 'pino';
import type { Logger } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized.
 *
 * Used by the composition root to report configuration it could not load; it cannot rely on that
 * configuration, so it always writes to stderr at `SHUTDOWN_LOG_LEVEL` when that is a pino level,
 * otherwise at `info`.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const requested = process.env['SHUTDOWN_LOG_LEVEL']?.toLowerCase();
    const level = requested && (requested === 'silent' || requested in pino.levels.values) ? requested : 'info';

    _bootstrapLogger = pino(
      {
        level,
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
