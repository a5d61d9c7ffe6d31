import { inject, injectable } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ShutdownLogger } from '../core/logging/types.js';
import type { SignalSource, TerminationSignal } from '../runtime/ports/signal-source.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { Closeable } from './ports/closeable.js';
import { closeResources } from './close-resources.js';

/**
 * Value delivered once the close sequence has run.
 */
export type ShutdownCompleted = Readonly<{
  readonly kind: 'shutdown_completed';
  readonly signal: TerminationSignal;
}>;

/**
 * Shutdown orchestrator.
 *
 * Both operations wait for a termination signal, then close the given resources in order:
 * `handle` hands control back through the returned promise, `handleAndTerminate` exits the
 * process with a success status. Each call owns one signal watch and is single-use; running two
 * calls at once over the same resources is not supported.
 */
@injectable()
export class GracefulShutdown {
  constructor(
    @inject(DI.Runtime.SignalSource)
    private readonly signals: SignalSource,
    @inject(DI.Runtime.ProcessTerminator)
    private readonly terminator: ProcessTerminator
  ) {}

  /**
   * The returned promise is the one-shot completion notification: it settles exactly once, after
   * the last resource, and awaiting it again yields the same value. Close failures are only logged.
   */
  async handle(logger: ShutdownLogger, ...resources: readonly Closeable[]): Promise<ShutdownCompleted> {
    const signal = await this.waitAndClose(logger, resources);
    return { kind: 'shutdown_completed', signal };
  }

  async handleAndTerminate(logger: ShutdownLogger, ...resources: readonly Closeable[]): Promise<never> {
    await this.waitAndClose(logger, resources);
    return this.terminator.terminate({ kind: 'success' });
  }

  private async waitAndClose(logger: ShutdownLogger, resources: readonly Closeable[]): Promise<TerminationSignal> {
    const watch = this.signals.watch();
    try {
      const signal = await watch.received;
      logger.warn(`system call receipt -> ${signal}`, { signal });
      await closeResources(logger, resources);
      logger.warn('system was terminated by a system call');
      return signal;
    } finally {
      watch.stop();
    }
  }
}
