/**
 * Port for terminating the current process.
 * Only the wait-and-terminate shutdown mode and the composition root use it.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
