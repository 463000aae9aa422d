/**
 * Runtime Safety Primitives
 *
 * @example
 * ```typescript
 * // Invariant — fails fast if condition is false
 * invariant(index === memo.length, "coefficients are computed in order");
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @param condition - The condition that must be true
 * @param message - Error message if the invariant is violated
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}
