/**
 * Standard Series
 *
 * Taylor expansions at zero. The transcendental ones are defined the way
 * they are derived by hand: as the integral of a differential equation the
 * function satisfies, closed over the series itself with Series.recursive.
 *
 * Every function takes the coefficient field, so the same definitions give
 * exact rational coefficients or floating-point ones.
 *
 * @example
 * ```typescript
 * import { fieldRational } from "@powser/math";
 *
 * take(tanSeries(fieldRational), 6).map(rationalToString);
 * // ["0", "1", "0", "1/3", "0", "2/15"]
 * ```
 */

import type { Field } from "@powser/std";
import { addScalar, integrate, monomial, negate, one, subtract } from "./elementary.js";
import { multiply, reciprocal, sqrt } from "./derived.js";
import { Series } from "./series.js";

// ============================================================================
// Coefficient Sequences
// ============================================================================

/**
 * c/(1 − x) = c + c·x + c·x² + …
 */
export function constantSeries<A>(field: Field<A>, c: A): Series<A> {
  return Series.fromRule(field, () => c, { label: "constantSeries" });
}

/**
 * c/(1 + x) = c − c·x + c·x² − …
 */
export function alternatingConstantSeries<A>(field: Field<A>, c: A): Series<A> {
  const negated = field.negate(c);
  return Series.fromRule(field, (n) => (n % 2 === 0 ? c : negated), {
    label: "alternatingConstantSeries",
  });
}

/**
 * Σ n·xⁿ
 */
export function naturals<A>(field: Field<A>): Series<A> {
  return Series.fromRule(field, (n) => field.fromNumber(n), { label: "naturals" });
}

/**
 * −ln(1 − x) = Σ xⁿ/n
 */
export function harmonic<A>(field: Field<A>): Series<A> {
  return Series.fromRule(field, (n) => (n === 0 ? field.zero() : field.recip(field.fromNumber(n))), {
    label: "harmonic",
  });
}

/**
 * ln(1 + x) = Σ (−1)ⁿ⁺¹·xⁿ/n
 */
export function alternatingHarmonic<A>(field: Field<A>): Series<A> {
  return Series.fromRule(
    field,
    (n) => {
      if (n === 0) return field.zero();
      const term = field.recip(field.fromNumber(n));
      return n % 2 === 1 ? term : field.negate(term);
    },
    { label: "alternatingHarmonic" }
  );
}

// ============================================================================
// Exponential and Trigonometric
// ============================================================================

/** y′ = y, y(0) = 1 */
export function expSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(field, (self) => integrate(self, field.one()), { label: "exp" });
}

/** y″ = −y, y(0) = 0, y′(0) = 1 */
export function sinSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(
    field,
    (self) => integrate(integrate(negate(self), field.one()), field.zero()),
    { label: "sin" }
  );
}

/** y″ = −y, y(0) = 1, y′(0) = 0 */
export function cosSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(
    field,
    (self) => integrate(integrate(negate(self), field.zero()), field.one()),
    { label: "cos" }
  );
}

/** y′ = 1 + y², y(0) = 0 */
export function tanSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(
    field,
    (self) => integrate(addScalar(multiply(self, self), field.one()), field.zero()),
    { label: "tan" }
  );
}

/** y′ = y·tan, y(0) = 1 */
export function secSeries<A>(field: Field<A>): Series<A> {
  const tan = tanSeries(field);
  return Series.recursive(field, (self) => integrate(multiply(self, tan), field.one()), {
    label: "sec",
  });
}

/** y′ = 1/√(1 − x²) */
export function arcsinSeries<A>(field: Field<A>): Series<A> {
  const derivative = reciprocal(sqrt(subtract(one(field), monomial(field, 2))));
  return labelled(integrate(derivative, field.zero()), "arcsin");
}

/** y′ = 1/(1 + x²) */
export function arctanSeries<A>(field: Field<A>): Series<A> {
  const derivative = reciprocal(addScalar(monomial(field, 2), field.one()));
  return labelled(integrate(derivative, field.zero()), "arctan");
}

// ============================================================================
// Hyperbolic
// ============================================================================

/** y″ = y, y(0) = 0, y′(0) = 1 */
export function sinhSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(field, (self) => integrate(integrate(self, field.one()), field.zero()), {
    label: "sinh",
  });
}

/** y″ = y, y(0) = 1, y′(0) = 0 */
export function coshSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(field, (self) => integrate(integrate(self, field.zero()), field.one()), {
    label: "cosh",
  });
}

/** y′ = 1 − y², y(0) = 0 */
export function tanhSeries<A>(field: Field<A>): Series<A> {
  return Series.recursive(
    field,
    (self) => integrate(addScalar(negate(multiply(self, self)), field.one()), field.zero()),
    { label: "tanh" }
  );
}

/** y′ = −y·tanh, y(0) = 1 */
export function sechSeries<A>(field: Field<A>): Series<A> {
  const tanh = tanhSeries(field);
  return Series.recursive(field, (self) => integrate(negate(multiply(self, tanh)), field.one()), {
    label: "sech",
  });
}

/** y′ = 1/√(1 + x²) */
export function arcsinhSeries<A>(field: Field<A>): Series<A> {
  const derivative = reciprocal(sqrt(addScalar(monomial(field, 2), field.one())));
  return labelled(integrate(derivative, field.zero()), "arcsinh");
}

/** y′ = 1/(1 − x²) */
export function arctanhSeries<A>(field: Field<A>): Series<A> {
  const derivative = reciprocal(subtract(one(field), monomial(field, 2)));
  return labelled(integrate(derivative, field.zero()), "arctanh");
}

function labelled<A>(series: Series<A>, label: string): Series<A> {
  return Series.deferred(series.field, () => series, { label });
}
