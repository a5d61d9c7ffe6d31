// Required for tsyringe DI decorators
import 'reflect-metadata';

// Shutdown operations
export { handle, handleAndTerminate, resolveGracefulShutdown, defaultShutdownLogger } from './shutdown/entrypoints.js';
export { GracefulShutdown } from './shutdown/graceful-shutdown.js';
export type { ShutdownCompleted } from './shutdown/graceful-shutdown.js';
export { ProcessSignalWatcher, DEFAULT_TERMINATION_SIGNALS } from './shutdown/signal-watcher.js';
export { closeResource, closeResources } from './shutdown/close-resources.js';
export { closeableFrom, closeableFromCallback } from './shutdown/closeables.js';
export type { NodeCallback } from './shutdown/closeables.js';
export type { Closeable } from './shutdown/ports/closeable.js';

// Runtime ports and adapters
export type { ProcessSignal, ProcessSignals, Unsubscribe } from './runtime/ports/process-signals.js';
export { TERMINATION_SIGNAL_NAMES } from './runtime/ports/signal-source.js';
export type {
  SignalSource,
  SignalWatch,
  TerminationSignal,
  TerminationProcessSignal,
} from './runtime/ports/signal-source.js';
export type { ExitCode, ProcessTerminator } from './runtime/ports/process-terminator.js';
export { NodeProcessSignals } from './runtime/adapters/node-process-signals.js';
export { InMemoryProcessSignals } from './runtime/adapters/in-memory-process-signals.js';
export { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
export { ThrowingProcessTerminator } from './runtime/adapters/throwing-process-terminator.js';

// Logging
export type { ShutdownLogger, Logger, LogLevel } from './core/logging/index.js';
export { PinoShutdownLogger } from './core/logging/index.js';

// Errors
export type { AppError, ResourceCloseFailureError, ConfigInvalidError } from './errors/index.js';
export { formatAppError } from './errors/index.js';

// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
