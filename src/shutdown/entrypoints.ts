import { container, initializeContainer, type ContainerInitOptions } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { ShutdownLogger } from '../core/logging/types.js';
import type { Closeable } from './ports/closeable.js';
import type { GracefulShutdown, ShutdownCompleted } from './graceful-shutdown.js';

// Callers of the entry points get real OS listeners and a real exit, whatever NODE_ENV says.
// Test wiring is opted into by initializing the container first.
const PRODUCTION_WIRING: ContainerInitOptions = { runtimeMode: { kind: 'production' } };

/**
 * Resolve the orchestrator from the container, initializing it on first use.
 */
export function resolveGracefulShutdown(options: ContainerInitOptions = PRODUCTION_WIRING): GracefulShutdown {
  initializeContainer(options);
  return container.resolve<GracefulShutdown>(DI.Shutdown.Orchestrator);
}

/**
 * The pino-backed ShutdownLogger configured from `SHUTDOWN_LOG_LEVEL` / `SHUTDOWN_LOG_STREAM`.
 */
export function defaultShutdownLogger(options: ContainerInitOptions = PRODUCTION_WIRING): ShutdownLogger {
  initializeContainer(options);
  return container.resolve<ShutdownLogger>(DI.Logging.ShutdownLogger);
}

/**
 * Wait for SIGINT, SIGTERM or SIGQUIT, close `resources` in order, then resolve.
 *
 * @example
 * const done = await handle(logger, pool, broker);
 * console.log(`stopped by ${done.signal}`);
 */
export function handle(logger: ShutdownLogger, ...resources: readonly Closeable[]): Promise<ShutdownCompleted> {
  return resolveGracefulShutdown().handle(logger, ...resources);
}

/**
 * Same sequence as `handle`, then exit the process with status 0.
 */
export function handleAndTerminate(logger: ShutdownLogger, ...resources: readonly Closeable[]): Promise<never> {
  return resolveGracefulShutdown().handleAndTerminate(logger, ...resources);
}
