/**
 * Rational Numbers
 *
 * Exact bigint fractions, the default coefficient field for series whose
 * coefficients must compare exactly. Values are always reduced, with a
 * positive denominator, so structural equality is numeric equality.
 *
 * @example
 * ```typescript
 * const sum = fieldRational.add(rational(1n, 2n), rational(1n, 3n)); // 5/6
 * fieldRational.sqrt(rational(9n, 4n));  // 3/2, exact
 * fieldRational.sqrt(rational(2n));      // 1414213562373/1000000000000
 * ```
 */

import type { Field } from "@powser/std";

/**
 * num/den with den > 0 and gcd(|num|, den) = 1.
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

function normalize(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError("Rational: denominator cannot be zero");
  }
  if (num === 0n) {
    return { num: 0n, den: 1n };
  }
  if (den < 0n) {
    num = -num;
    den = -den;
  }
  const g = gcd(num, den);
  return { num: num / g, den: den / g };
}

/**
 * @throws RangeError if the denominator is zero
 */
export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  const n = typeof num === "number" ? BigInt(Math.trunc(num)) : num;
  const d = typeof den === "number" ? BigInt(Math.trunc(den)) : den;
  return normalize(n, d);
}

/**
 * Shorthand for rational() with number arguments.
 */
export function rat(num: number, den: number = 1): Rational {
  return rational(num, den);
}

/**
 * The exact value of a finite double. Every finite double is a dyadic
 * fraction, so doubling until the value is an integer terminates.
 *
 * @throws RangeError for NaN and infinities
 */
export function fromNumber(n: number): Rational {
  if (!Number.isFinite(n)) {
    throw new RangeError("fromNumber: cannot convert non-finite number");
  }
  let scaled = n;
  let den = 1n;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    den *= 2n;
  }
  return normalize(BigInt(scaled), den);
}

/**
 * May lose precision, or overflow to ±Infinity, for very large parts.
 */
export function toNumber(r: Rational): number {
  return Number(r.num) / Number(r.den);
}

export function toString(r: Rational): string {
  return r.den === 1n ? r.num.toString() : `${r.num}/${r.den}`;
}

export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

export function isZero(r: Rational): boolean {
  return r.num === 0n;
}

// ============================================================================
// Square Roots
// ============================================================================

/**
 * Irrational roots carry a relative error below 1/SQRT_SCALE.
 */
export const SQRT_SCALE = 1_000_000_000_000n;

/**
 * Integer square root (floor) of a non-negative bigint, by Newton's method.
 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) {
    throw new RangeError("isqrt: negative argument");
  }
  if (n < 2n) return n;

  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

/**
 * Exact square root, or undefined unless numerator and denominator are
 * both perfect squares.
 */
export function sqrtExact(r: Rational): Rational | undefined {
  if (r.num < 0n) return undefined;
  const n = isqrt(r.num);
  const d = isqrt(r.den);
  if (n * n !== r.num || d * d !== r.den) return undefined;
  return { num: n, den: d };
}

/**
 * floor(√(num·den)·SQRT_SCALE) / (den·SQRT_SCALE). Positive for every
 * positive r, at any magnitude.
 */
export function sqrtApprox(r: Rational): Rational {
  if (r.num < 0n) {
    throw new RangeError("sqrtApprox: negative argument");
  }
  return normalize(isqrt(r.num * r.den * SQRT_SCALE * SQRT_SCALE), r.den * SQRT_SCALE);
}

// ============================================================================
// Field Instance
// ============================================================================

/**
 * Exact arithmetic throughout; division by zero throws RangeError.
 * `sqrt` is exact for perfect squares and {@link sqrtApprox} otherwise.
 */
export const fieldRational: Field<Rational> = {
  add: (a, b) => normalize(a.num * b.den + b.num * a.den, a.den * b.den),

  sub: (a, b) => normalize(a.num * b.den - b.num * a.den, a.den * b.den),

  mul: (a, b) => normalize(a.num * b.num, a.den * b.den),

  negate: (a) => ({ num: -a.num, den: a.den }),

  abs: (a) => ({ num: a.num < 0n ? -a.num : a.num, den: a.den }),

  signum: (a) => ({ num: a.num < 0n ? -1n : a.num > 0n ? 1n : 0n, den: 1n }),

  fromNumber,

  toNumber,

  zero: () => ({ num: 0n, den: 1n }),

  one: () => ({ num: 1n, den: 1n }),

  div: (a, b) => {
    if (b.num === 0n) {
      throw new RangeError("Rational division by zero");
    }
    return normalize(a.num * b.den, a.den * b.num);
  },

  recip: (a) => {
    if (a.num === 0n) {
      throw new RangeError("Rational reciprocal of zero");
    }
    return normalize(a.den, a.num);
  },

  fromRational: (num, den) => rational(num, den),

  equals,

  notEquals: (a, b) => !equals(a, b),

  display: toString,

  isZero,

  sqrt: (a) => (a.num < 0n ? undefined : (sqrtExact(a) ?? sqrtApprox(a))),
};
