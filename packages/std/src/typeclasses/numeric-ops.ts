/**
 * Generic Numeric Operations
 *
 * Derived operations that work for ANY type with a Numeric instance.
 * Computed in the scalar type itself, so exact types stay exact.
 *
 * @example
 * ```typescript
 * import { pow, factorial, numericNumber } from "@powser/std";
 *
 * pow(2, 10, numericNumber); // 1024
 * factorial(5, numericNumber); // 120
 * ```
 */

import type { Numeric } from "./index.js";

/**
 * Raise base to a non-negative integer power by repeated squaring.
 *
 * @throws RangeError if exp is negative or not an integer
 */
export function pow<A>(base: A, exp: number, N: Numeric<A>): A {
  if (exp < 0 || !Number.isInteger(exp)) {
    throw new RangeError("pow: exponent must be a non-negative integer");
  }

  let result = N.one();
  let b = base;
  let e = exp;

  while (e > 0) {
    if (e % 2 === 1) {
      result = N.mul(result, b);
    }
    e = Math.floor(e / 2);
    if (e > 0) {
      b = N.mul(b, b);
    }
  }

  return result;
}

/**
 * n!
 *
 * @throws RangeError if n is negative or not an integer
 */
export function factorial<A>(n: number, N: Numeric<A>): A {
  if (n < 0 || !Number.isInteger(n)) {
    throw new RangeError("factorial: n must be a non-negative integer");
  }
  let acc = N.one();
  for (let k = 2; k <= n; k++) {
    acc = N.mul(acc, N.fromNumber(k));
  }
  return acc;
}
