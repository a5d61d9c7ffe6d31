import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Wraps handlers to ignore the signal name Node passes to listeners.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void): Unsubscribe {
    const listener = (): void => {
      handler();
    };
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
