import type { AppError, ConfigIssue, ConfigInvalidError, ResourceCloseFailureError } from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  resourceCloseFailed: (index: number, cause: unknown): ResourceCloseFailureError => ({
    _tag: 'ResourceCloseFailure',
    index,
    message: describeCause(cause),
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

/**
 * Human-readable description of a thrown value: the message of an Error, a string as-is,
 * anything else as JSON.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  // Errors from another realm (vm contexts, workers) fail `instanceof` but keep their message.
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
