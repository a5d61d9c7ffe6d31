import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { SignalSource } from '../runtime/ports/signal-source.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { InMemoryProcessSignals } from '../runtime/adapters/in-memory-process-signals.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { PinoShutdownLogger } from '../core/logging/pino-shutdown-logger.js';
import type { ILoggerFactory, ShutdownLogger } from '../core/logging/types.js';
import { ProcessSignalWatcher } from '../shutdown/signal-watcher.js';
import { GracefulShutdown } from '../shutdown/graceful-shutdown.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  // Tests may pre-register their own ports; only fill in what is missing.
  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const signals: ProcessSignals =
      policy.kind === 'no_signal_handlers' ? new InMemoryProcessSignals() : new NodeProcessSignals();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }

  container.register<SignalSource>(DI.Runtime.SignalSource, {
    useFactory: instanceCachingFactory(
      (c) => new ProcessSignalWatcher(c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals))
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Allow tests to inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return;

  // Loaded on first resolve. Only the pino logger factory depends on it, so the shutdown
  // operations themselves never read the environment.
  container.register<ValidatedConfig>(DI.Config.App, {
    useFactory: instanceCachingFactory((c) => {
      const configResult = loadConfig({ env: process.env });

      if (configResult.isErr()) {
        createBootstrapLogger('container').fatal(formatAppError(configResult.error));
        const terminator: ProcessTerminator = c.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
        return terminator.terminate({ kind: 'failure' });
      }

      return configResult.value;
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });

  if (!container.isRegistered(DI.Logging.ShutdownLogger)) {
    container.register<ShutdownLogger>(DI.Logging.ShutdownLogger, {
      useFactory: instanceCachingFactory(
        (c) => new PinoShutdownLogger(c.resolve<ILoggerFactory>(DI.Logging.Factory).create('graceful-shutdown'))
      ),
    });
  }

  container.register(DI.Shutdown.Orchestrator, {
    useFactory: instanceCachingFactory((c) => c.resolve(GracefulShutdown)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 * Idempotent: calls after the first return immediately.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig();
  registerServices();
  initialized = true;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
