import { ResultAsync } from 'neverthrow';
import type { Closeable } from './ports/closeable.js';
import type { ShutdownLogger } from '../core/logging/types.js';
import type { ResourceCloseFailureError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * Close one resource, turning a throw or a rejection into data.
 */
export function closeResource(resource: Closeable, index: number): ResultAsync<void, ResourceCloseFailureError> {
  return ResultAsync.fromThrowable(
    async (): Promise<void> => {
      await resource.close();
    },
    (cause) => Err.resourceCloseFailed(index, cause)
  )();
}

/**
 * Best-effort close of every resource, strictly one after another in the given order.
 * A failure is logged and the loop moves on; the failures are returned for internal callers.
 */
export async function closeResources(
  logger: ShutdownLogger,
  resources: readonly Closeable[]
): Promise<readonly ResourceCloseFailureError[]> {
  const failures: ResourceCloseFailureError[] = [];

  logger.info('closing resources...');
  for (const [index, resource] of resources.entries()) {
    logger.info(`trying to close resource ${index}`);
    const result = await closeResource(resource, index);
    if (result.isErr()) {
      logger.error(`error on close resource: ${result.error.message}`, { index, err: result.error.cause });
      failures.push(result.error);
    }
  }

  return failures;
}
