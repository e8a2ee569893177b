/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: internal precondition check
 * - `unreachable(value?)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Mode = "list" | "double";
 * function width(mode: Mode): number {
 *   switch (mode) {
 *     case "list": return 0;
 *     case "double": return 8;
 *     default: return unreachable(mode); // Type error if Mode is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(
  condition: boolean,
  message?: string,
): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 * At runtime, throws if somehow reached.
 */
export function unreachable(value?: never): never {
  throw new Error(`Unreachable code reached${value === undefined ? "" : `: ${String(value)}`}`);
}
