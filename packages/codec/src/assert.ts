/**
 * Compile-time exhaustiveness check for switches over discriminated unions.
 * Adding a variant without handling it fails to type-check at every call site.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
