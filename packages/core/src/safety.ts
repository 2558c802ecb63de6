/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, fail)`: assert an internal invariant, throwing the error `fail` builds
 * - `unreachable(value)`: mark impossible code paths (exhaustiveness checking)
 */

/**
 * Runtime invariant check.
 *
 * @param fail - Builds the error to throw; called only when the check fails
 */
export function invariant(condition: boolean, fail: () => Error): asserts condition {
  if (!condition) {
    throw fail();
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 */
export function unreachable(value: never, what = "value"): never {
  throw new Error(`Unreachable: unexpected ${what} ${JSON.stringify(value)}`);
}
