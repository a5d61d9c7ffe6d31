/**
 * Exhaustiveness helper for discriminated unions.
 * Use in `switch` statements so adding a union member without handling it fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
