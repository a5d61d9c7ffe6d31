/**
 * Identity of the termination signal that started a shutdown.
 */
export type TerminationSignal = 'interrupt' | 'terminate' | 'quit';

export type TerminationProcessSignal = 'SIGINT' | 'SIGTERM' | 'SIGQUIT';

export const TERMINATION_SIGNAL_NAMES: Readonly<Record<TerminationProcessSignal, TerminationSignal>> = {
  SIGINT: 'interrupt',
  SIGTERM: 'terminate',
  SIGQUIT: 'quit',
};

/**
 * A single armed watch. `received` settles once, with the first signal delivered after `watch()`.
 * `stop()` removes every listener the watch installed; signals arriving before it are absorbed.
 */
export interface SignalWatch {
  readonly received: Promise<TerminationSignal>;
  stop(): void;
}

/**
 * Port for waiting on termination signals.
 */
export interface SignalSource {
  watch(): SignalWatch;
}
