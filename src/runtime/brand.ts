/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary. Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
