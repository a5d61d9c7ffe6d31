import type { Closeable } from './ports/closeable.js';

export type NodeCallback = (error?: Error | null) => void;

/**
 * Wrap a bare release function, e.g. `closeableFrom(() => pool.end())`.
 */
export function closeableFrom(release: () => void | PromiseLike<unknown>): Closeable {
  return { close: release };
}

/**
 * Wrap a callback-style close such as `http.Server.close(cb)`.
 * The callback's error, when present, becomes the close failure.
 */
export function closeableFromCallback(close: (callback: NodeCallback) => void): Closeable {
  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
  };
}
