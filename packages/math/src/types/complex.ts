/**
 * Complex Numbers
 *
 * Complex number arithmetic with real and imaginary parts.
 * Every value has a principal square root, so series over complex
 * coefficients can take square roots of negative constant terms.
 *
 * @example
 * ```typescript
 * const prod = fieldComplex.mul(complex(3, 4), I); // -4 + 3i
 * fieldComplex.sqrt(complex(-4)); // 2i
 * ```
 */

import type { Field } from "@powser/std";

/**
 * Complex number with real and imaginary parts.
 */
export interface Complex {
  readonly re: number;
  readonly im: number;
}

/**
 * Create a complex number from real and imaginary parts.
 *
 * @param re - Real part
 * @param im - Imaginary part (default: 0)
 */
export function complex(re: number, im: number = 0): Complex {
  return { re, im };
}

/**
 * Magnitude (absolute value) of a complex number.
 * |z| = sqrt(re² + im²)
 */
export function magnitude(z: Complex): number {
  return Math.hypot(z.re, z.im);
}

/**
 * Phase angle (argument) of a complex number.
 * arg(z) = atan2(im, re)
 */
export function phase(z: Complex): number {
  return Math.atan2(z.im, z.re);
}

/**
 * Check if two complex numbers are equal within tolerance.
 */
export function equals(a: Complex, b: Complex, epsilon: number = 1e-10): boolean {
  return Math.abs(a.re - b.re) < epsilon && Math.abs(a.im - b.im) < epsilon;
}

/**
 * Format a complex number as a string.
 */
export function toString(z: Complex): string {
  if (Math.abs(z.im) < 1e-15) {
    return z.re.toString();
  }
  if (Math.abs(z.re) < 1e-15) {
    return `${z.im}i`;
  }
  if (z.im < 0) {
    return `${z.re} - ${Math.abs(z.im)}i`;
  }
  return `${z.re} + ${z.im}i`;
}

/**
 * Principal square root: sqrt(|z|) * (cos(arg/2) + i*sin(arg/2)).
 * Real inputs take the exact real path so sqrt(4) is 2 + 0i, not a
 * rounded polar result; negative reals give a purely imaginary root.
 */
export function principalSqrt(z: Complex): Complex {
  if (z.im === 0) {
    return z.re >= 0 ? { re: Math.sqrt(z.re), im: 0 } : { re: 0, im: Math.sqrt(-z.re) };
  }
  const sqrtMag = Math.sqrt(magnitude(z));
  const arg = phase(z);
  return {
    re: sqrtMag * Math.cos(arg / 2),
    im: sqrtMag * Math.sin(arg / 2),
  };
}

/**
 * Field instance for Complex numbers.
 *
 * `equals` and `isZero` are exact here (no tolerance): the series engine
 * decides preconditions on them. {@link equals} compares within a tolerance.
 */
export const fieldComplex: Field<Complex> = {
  add: (a, b) => ({ re: a.re + b.re, im: a.im + b.im }),

  sub: (a, b) => ({ re: a.re - b.re, im: a.im - b.im }),

  mul: (a, b) => ({
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  }),

  negate: (a) => ({ re: -a.re, im: -a.im }),

  abs: (a) => ({ re: magnitude(a), im: 0 }),

  signum: (a) => {
    const mag = magnitude(a);
    if (mag === 0) return { re: 0, im: 0 };
    return { re: a.re / mag, im: a.im / mag };
  },

  fromNumber: (n) => ({ re: n, im: 0 }),

  toNumber: (a) => {
    if (Math.abs(a.im) > 1e-10) {
      throw new RangeError("Cannot convert complex with non-zero imaginary part to number");
    }
    return a.re;
  },

  zero: () => ({ re: 0, im: 0 }),

  one: () => ({ re: 1, im: 0 }),

  div: (a, b) => {
    const denom = b.re * b.re + b.im * b.im;
    if (denom === 0) {
      throw new RangeError("Complex division by zero");
    }
    return {
      re: (a.re * b.re + a.im * b.im) / denom,
      im: (a.im * b.re - a.re * b.im) / denom,
    };
  },

  recip: (a) => {
    const denom = a.re * a.re + a.im * a.im;
    if (denom === 0) {
      throw new RangeError("Complex reciprocal of zero");
    }
    return {
      re: a.re / denom,
      im: -a.im / denom,
    };
  },

  fromRational: (num, den) => {
    if (den === 0) {
      throw new RangeError("Complex division by zero");
    }
    return { re: num / den, im: 0 };
  },

  equals: (a, b) => a.re === b.re && a.im === b.im,

  notEquals: (a, b) => a.re !== b.re || a.im !== b.im,

  display: (a) => toString(a),

  isZero: (a) => a.re === 0 && a.im === 0,

  sqrt: principalSqrt,
};

/**
 * Imaginary unit constant: i = 0 + 1i
 */
export const I: Complex = { re: 0, im: 1 };
