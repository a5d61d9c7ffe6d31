import type { ProcessSignals, Unsubscribe } from '../runtime/ports/process-signals.js';
import {
  TERMINATION_SIGNAL_NAMES,
  type SignalSource,
  type SignalWatch,
  type TerminationProcessSignal,
  type TerminationSignal,
} from '../runtime/ports/signal-source.js';

/** Signals a shutdown waits on. Duplicates in a caller-supplied list are dropped. */
export const DEFAULT_TERMINATION_SIGNALS: readonly TerminationProcessSignal[] = ['SIGTERM', 'SIGQUIT', 'SIGINT'];

/**
 * Waits for the first termination signal.
 *
 * Each `watch()` registers one listener per distinct signal and delivers at most once. Listeners
 * stay installed until `stop()` so a second Ctrl+C during cleanup is absorbed rather than killing
 * the process with Node's default handler.
 */
export class ProcessSignalWatcher implements SignalSource {
  private readonly signals: readonly TerminationProcessSignal[];

  constructor(
    private readonly processSignals: ProcessSignals,
    signals: readonly TerminationProcessSignal[] = DEFAULT_TERMINATION_SIGNALS
  ) {
    this.signals = [...new Set(signals)];
  }

  watch(): SignalWatch {
    const unsubscribes: Unsubscribe[] = [];
    let delivered = false;
    let stopped = false;

    const received = new Promise<TerminationSignal>((resolve) => {
      for (const signal of this.signals) {
        unsubscribes.push(
          this.processSignals.on(signal, () => {
            if (delivered) return;
            delivered = true;
            resolve(TERMINATION_SIGNAL_NAMES[signal]);
          })
        );
      }
    });

    return {
      received,
      stop: () => {
        if (stopped) return;
        stopped = true;
        for (const unsubscribe of unsubscribes) {
          unsubscribe();
        }
      },
    };
  }
}
