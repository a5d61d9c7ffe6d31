/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (real vs in-memory signal handling) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Termination signal watcher */
    SignalSource: Symbol('Runtime.SignalSource'),
    /** Process terminator (wait-and-terminate and composition root only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Pino logger factory */
    Factory: Symbol('Logging.Factory'),
    /** Default ShutdownLogger backed by pino */
    ShutdownLogger: Symbol('Logging.ShutdownLogger'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SHUTDOWN
  // ═══════════════════════════════════════════════════════════════════
  Shutdown: {
    /** Shutdown orchestrator */
    Orchestrator: Symbol('Shutdown.Orchestrator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;
