/**
 * Redaction configuration for pino.
 *
 * Close failures often carry the client's connection options; keep credentials out of the log.
 */
export const REDACTION_CONFIG = {
  paths: [
    'password',
    'secret',
    'token',
    'connectionString',
    '*.password',
    '*.secret',
    '*.token',
    '*.connectionString',
    'err.config.password',
    'err.config.connectionString',
    'err.options.password',
  ] as string[],
  censor: '[REDACTED]',
};
