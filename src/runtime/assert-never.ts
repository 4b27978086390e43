/**
 * Exhaustiveness check for `switch` over a tagged union.
 * Adding a member without handling it becomes a compile error here.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
