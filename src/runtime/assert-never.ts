/**
 * Exhaustiveness check for tagged unions: a new variant becomes a compile
 * error at every `switch` that ends in this call.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
