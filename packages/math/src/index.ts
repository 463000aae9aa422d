/**
 * @powser/math — Scalar Fields
 *
 * Coefficient types for the series engine, each with a `Field` instance
 * from @powser/std:
 * - **Rational**: exact bigint fractions (`fieldRational`)
 * - **Complex**: double-precision complex numbers (`fieldComplex`)
 *
 * @example
 * ```typescript
 * import { rational, fieldRational, complex, fieldComplex } from "@powser/math";
 *
 * fieldRational.add(rational(1n, 2n), rational(1n, 3n)); // 5/6
 * fieldComplex.sqrt(complex(-1));                       // i
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Rational Numbers
// ============================================================================

export {
  // Type
  type Rational,
  // Constructors
  rational,
  rat,
  fromNumber as rationalFromNumber,
  // Typeclass instance
  fieldRational,
  // Operations
  toNumber as rationalToNumber,
  toString as rationalToString,
  equals as rationalEquals,
  isZero as rationalIsZero,
  isqrt,
  sqrtExact as rationalSqrtExact,
  sqrtApprox as rationalSqrtApprox,
  SQRT_SCALE,
} from "./types/rational.js";

// ============================================================================
// Complex Numbers
// ============================================================================

export {
  // Type
  type Complex,
  // Constructor
  complex,
  // Typeclass instance
  fieldComplex,
  // Operations
  magnitude,
  phase,
  principalSqrt,
  equals as complexEquals,
  toString as complexToString,
  // Constants
  I,
} from "./types/complex.js";
