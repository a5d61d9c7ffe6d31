/**
 * Port for registering process signal handlers.
 * This abstracts Node's `process.on` so signal delivery can be driven deterministically in tests.
 */
export type ProcessSignal = NodeJS.Signals;

export type Unsubscribe = () => void;

export interface ProcessSignals {
  /** Register `handler` for `signal`. The returned function removes exactly this registration. */
  on(signal: ProcessSignal, handler: () => void): Unsubscribe;
}
