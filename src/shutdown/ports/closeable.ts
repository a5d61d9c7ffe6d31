/**
 * Anything the shutdown sequence can release: a database pool, a broker client, a file handle.
 *
 * `close` fails by throwing or by returning a promise that rejects; whatever it resolves to is ignored.
 */
export interface Closeable {
  close(): void | PromiseLike<unknown>;
}
