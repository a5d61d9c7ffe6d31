import pino from 'pino';
import { inject, injectable } from 'tsyringe';
import type { ILoggerFactory, Logger } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';

const STREAM_FD = { stdout: 1, stderr: 2 } as const;

/**
 * Create the root pino logger instance.
 *
 * - Sync output, so lines written during shutdown are flushed before the process exits
 * - JSON format for machine parsing
 * - Redaction of credential-bearing fields
 */
export function createRootLogger(config: ValidatedConfig): Logger {
  const stream: keyof typeof STREAM_FD = config.logging.stream;
  return pino(
    {
      level: config.logging.level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: STREAM_FD[stream], sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
@injectable()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
