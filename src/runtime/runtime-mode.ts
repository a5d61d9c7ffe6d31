/**
 * Runtime mode of the current process.
 * Decided once at the composition root and injected; services never read env vars to infer it.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' };
