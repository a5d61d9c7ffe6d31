import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * In-memory ProcessSignals implementation.
 * Nothing is installed on `process`; signals are delivered by calling `emit`.
 */
export class InMemoryProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ProcessSignal, Set<() => void>>();

  on(signal: ProcessSignal, handler: () => void): Unsubscribe {
    // Wrap so the same function registered twice still counts as two registrations.
    const registration = (): void => handler();
    let forSignal = this.handlers.get(signal);
    if (!forSignal) {
      forSignal = new Set();
      this.handlers.set(signal, forSignal);
    }
    forSignal.add(registration);
    return () => {
      forSignal.delete(registration);
    };
  }

  emit(signal: ProcessSignal): void {
    const forSignal = this.handlers.get(signal);
    if (!forSignal) return;
    for (const handler of [...forSignal]) {
      handler();
    }
  }

  listenerCount(signal: ProcessSignal): number {
    return this.handlers.get(signal)?.size ?? 0;
  }
}
