import type { Logger, ShutdownLogger } from './types.js';

type Level = keyof ShutdownLogger;

/**
 * Adapts pino to the message-first ShutdownLogger capability.
 *
 * Old-style call: logger.error(message, data?)
 * Pino call:      logger.error({ ...data }, message)
 *
 * - no args: message only
 * - one plain object: its fields are merged into the line
 * - one Error: logged under `err`
 * - anything else: positional values under `args`
 */
export class PinoShutdownLogger implements ShutdownLogger {
  constructor(private readonly pino: Logger) {}

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: Level, message: string, args: readonly unknown[]): void {
    const data = toFields(args);
    if (data) {
      this.pino[level](data, message);
    } else {
      this.pino[level](message);
    }
  }
}

function toFields(args: readonly unknown[]): Record<string, unknown> | undefined {
  if (args.length === 0) return undefined;
  if (args.length === 1) {
    const [only] = args;
    if (only instanceof Error) return { err: only };
    if (isPlainObject(only)) return only;
  }
  return { args: [...args] };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
