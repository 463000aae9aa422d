import { equalityTerms } from "@powser/core";
import type { Series } from "./series.js";

/**
 * The first `count` coefficients.
 */
export function take<A>(series: Series<A>, count: number): A[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`take: count must be a non-negative integer, got ${count}`);
  }
  return Array.from({ length: count }, (_, n) => series.coefficient(n));
}

/**
 * Compares the first `terms` coefficients with the field's equality.
 * Defaults to the `equality.terms` configuration value.
 *
 * @throws RangeError if `terms` is negative or not an integer
 */
export function equalsUpTo<A>(f: Series<A>, g: Series<A>, terms: number = equalityTerms()): boolean {
  if (!Number.isInteger(terms) || terms < 0) {
    throw new RangeError(`equalsUpTo: terms must be a non-negative integer, got ${terms}`);
  }
  for (let n = 0; n < terms; n++) {
    if (!f.field.equals(f.coefficient(n), g.coefficient(n))) {
      return false;
    }
  }
  return true;
}
