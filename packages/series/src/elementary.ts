/**
 * Elementary Operators
 *
 * Termwise operators. Each coefficient of the result reads a fixed number of
 * operand coefficients and none of its own, so none of these can cycle.
 */

import type { Field } from "@powser/std";
import { Series } from "./series.js";

// ============================================================================
// Constants
// ============================================================================

export function zero<A>(field: Field<A>): Series<A> {
  return Series.fromArray(field, [], { label: "0" });
}

/**
 * The constant polynomial c.
 */
export function constant<A>(field: Field<A>, c: A): Series<A> {
  return Series.fromArray(field, [c], { label: field.display(c) });
}

export function one<A>(field: Field<A>): Series<A> {
  return constant(field, field.one());
}

/**
 * c·xⁿ
 */
export function monomial<A>(field: Field<A>, n: number, coefficient: A = field.one()): Series<A> {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Monomial degree must be a non-negative integer, got ${n}`);
  }
  return Series.fromRule(field, (k) => (k === n ? coefficient : field.zero()), {
    label: n === 0 ? field.display(coefficient) : `${field.display(coefficient)}x^${n}`,
  });
}

/**
 * The identity series x.
 */
export function x<A>(field: Field<A>): Series<A> {
  return Series.fromArray(field, [field.zero(), field.one()], { label: "x" });
}

// ============================================================================
// Operators
// ============================================================================

/**
 * x·F
 */
export function shiftByX<A>(f: Series<A>): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => (n === 0 ? F.zero() : f.coefficient(n - 1)), { label: "shiftByX" });
}

/**
 * F + k
 */
export function addScalar<A>(f: Series<A>, k: A): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => (n === 0 ? F.add(f.head(), k) : f.coefficient(n)), {
    label: "addScalar",
  });
}

/**
 * k·F
 */
export function scale<A>(f: Series<A>, k: A): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => F.mul(k, f.coefficient(n)), { label: "scale" });
}

export function add<A>(f: Series<A>, g: Series<A>): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => F.add(f.coefficient(n), g.coefficient(n)), { label: "add" });
}

export function negate<A>(f: Series<A>): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => F.negate(f.coefficient(n)), { label: "negate" });
}

export function subtract<A>(f: Series<A>, g: Series<A>): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => F.sub(f.coefficient(n), g.coefficient(n)), { label: "subtract" });
}

/**
 * F′, with coefficient n = (n + 1)·F(n + 1).
 */
export function differentiate<A>(f: Series<A>): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => F.mul(F.fromNumber(n + 1), f.coefficient(n + 1)), {
    label: "differentiate",
  });
}

/**
 * ∫F with the given constant of integration. Coefficient 0 is the constant
 * and never reads F, which is what lets `integrate` close a recursive
 * definition.
 */
export function integrate<A>(f: Series<A>, c: A): Series<A> {
  const F = f.field;
  return Series.fromRule(F, (n) => (n === 0 ? c : F.div(f.coefficient(n - 1), F.fromNumber(n))), {
    label: "integrate",
  });
}
