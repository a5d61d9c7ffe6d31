/**
 * Whether the process listens for real OS signals.
 * `no_signal_handlers` wires the in-memory signal port instead, so nothing touches `process`.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
