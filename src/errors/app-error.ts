import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * A resource's close operation threw or rejected.
 * Always absorbed by the close loop: logged, never re-raised to the caller of a shutdown operation.
 */
export type ResourceCloseFailureError = Readonly<{
  readonly _tag: 'ResourceCloseFailure';
  /** Position of the resource in the caller-supplied sequence. */
  readonly index: number;
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | ResourceCloseFailureError;

/**
 * Branded type for validated config.
 * Callers can require a validated value without runtime checks.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
