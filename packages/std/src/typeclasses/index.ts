/**
 * Scalar Typeclasses
 *
 * The dictionaries the series engine is generic over, drawing from
 * Haskell's Eq, Num and Fractional. Every operation takes its
 * instance explicitly (dictionary-passing style), so any coefficient
 * type with an instance works: doubles, exact rationals, complex numbers.
 *
 * @example
 * ```typescript
 * import { fieldNumber, factorial } from "@powser/std";
 *
 * fieldNumber.div(1, 4);        // 0.25
 * fieldNumber.div(1, 0);        // throws RangeError
 * fieldNumber.sqrt(-4);         // undefined, no real root
 * factorial(4, fieldNumber);    // 24
 * ```
 */

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

// ============================================================================
// Numeric — Haskell Num, Scala Numeric
// Types supporting basic arithmetic.
// ============================================================================

/**
 * Numeric typeclass - the Ring abstraction: add, sub, mul with identity elements.
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  abs: (a) => Math.abs(a),
  signum: (a) => Math.sign(a),
  fromNumber: (n) => n,
  toNumber: (a) => a,
  zero: () => 0,
  one: () => 1,
};

// ============================================================================
// Fractional — Haskell Fractional
// Types supporting true division.
// ============================================================================

/**
 * Fractional typeclass - types supporting true division.
 *
 * Division by zero must throw rather than produce Infinity or NaN: the
 * series operators rely on it to surface precondition failures.
 */
export interface Fractional<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
  fromRational(num: number, den: number): A;
}

export const fractionalNumber: Fractional<number> = {
  div: (a, b) => {
    if (b === 0) {
      throw new RangeError("Number division by zero");
    }
    return a / b;
  },
  recip: (a) => {
    if (a === 0) {
      throw new RangeError("Number reciprocal of zero");
    }
    return 1 / a;
  },
  fromRational: (num, den) => fractionalNumber.div(num, den),
};

// ============================================================================
// Printable — Rust Display
// Human-readable string representation.
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

export const printableNumber: Printable<number> = {
  display: (a) => String(a),
};

// ============================================================================
// Field — the scalar contract of the series engine
// ============================================================================

/**
 * Everything a coefficient type must provide.
 *
 * `isZero` must be exact: the series operators decide their preconditions
 * (composition, exp, reciprocal, inverse) on it.
 *
 * `sqrt` returns the principal square root, or `undefined` when the
 * scalar domain has none (negative reals, for example).
 */
export interface Field<A> extends Numeric<A>, Fractional<A>, Eq<A>, Printable<A> {
  isZero(a: A): boolean;
  sqrt(a: A): A | undefined;
}

export const fieldNumber: Field<number> = {
  ...numericNumber,
  ...fractionalNumber,
  ...eqNumber,
  ...printableNumber,
  isZero: (a) => a === 0,
  sqrt: (a) => (a < 0 || Number.isNaN(a) ? undefined : Math.sqrt(a)),
};
