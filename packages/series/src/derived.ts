/**
 * Recursive Operators
 *
 * Operators whose coefficient n is defined through the result itself, or
 * through the same operator applied to tails of the operands. Every
 * definition reads only lower-indexed coefficients of the series being
 * defined, so evaluation terminates for each requested index.
 *
 * Preconditions are checked when the operator is applied, by reading the
 * operand's constant (or first-order) coefficient and nothing beyond it.
 *
 * @example
 * ```typescript
 * import { fieldRational, rat } from "@powser/math";
 *
 * const f = Series.fromArray(fieldRational, [rat(1), rat(-1)]);
 * take(reciprocal(f), 4); // 1, 1, 1, 1
 * ```
 */

import {
  add,
  addScalar,
  differentiate,
  integrate,
  one,
  scale,
  shiftByX,
} from "./elementary.js";
import {
  requireNonzeroConstant,
  requireNonzeroLinear,
  requirePrincipalRoot,
  requireZeroConstant,
} from "./preconditions.js";
import { Series } from "./series.js";

/**
 * F·G = f0·g0 + x·(f0·G1 + g0·F1 + x·(F1·G1)), where F1 and G1 are the tails.
 */
export function multiply<A>(f: Series<A>, g: Series<A>): Series<A> {
  const F = f.field;
  let rest: Series<A> | undefined;

  return Series.fromRule(
    F,
    (n) => {
      const f0 = f.head();
      const g0 = g.head();
      if (n === 0) return F.mul(f0, g0);

      rest ??= add(
        add(scale(g.tail(), f0), scale(f.tail(), g0)),
        shiftByX(multiply(f.tail(), g.tail()))
      );
      return rest.coefficient(n - 1);
    },
    { label: "multiply" }
  );
}

/**
 * F(G) = f0 + x·(G1·F1(G)). G must have a zero constant term.
 *
 * @throws ZeroConstantRequiredError
 */
export function compose<A>(f: Series<A>, g: Series<A>): Series<A> {
  requireZeroConstant(g, "compose");
  let rest: Series<A> | undefined;

  return Series.fromRule(
    f.field,
    (n) => {
      if (n === 0) return f.head();
      rest ??= multiply(g.tail(), compose(f.tail(), g));
      return rest.coefficient(n - 1);
    },
    { label: "compose" }
  );
}

/**
 * E = exp(F), from E′ = E·F′ and E(0) = 1. F must have a zero constant term.
 *
 * @throws ZeroConstantRequiredError
 */
export function exp<A>(f: Series<A>): Series<A> {
  requireZeroConstant(f, "exp");
  const F = f.field;
  return Series.recursive(F, (self) => integrate(multiply(self, differentiate(f)), F.one()), {
    label: "exp",
  });
}

/**
 * R = 1/F = r0·(1 − x·(F1·R)), with r0 = 1/f0.
 *
 * @throws NonzeroConstantRequiredError
 */
export function reciprocal<A>(f: Series<A>): Series<A> {
  const F = f.field;
  const r0 = F.recip(requireNonzeroConstant(f, "reciprocal"));
  return Series.recursive(
    F,
    (self) => addScalar(scale(shiftByX(multiply(f.tail(), self)), F.negate(r0)), r0),
    { label: "reciprocal" }
  );
}

/**
 * The compositional inverse I, with F(I) = x.
 *
 * Writing F = x·F1 and I = x·I1, I1 = r·(1 − x·I1²·F2(I)) where r = 1/F(1)
 * and F2 is the tail of F1. F2(I) only needs the coefficients of I already
 * cached, and is built the first time one of its coefficients is read.
 *
 * @throws ZeroConstantRequiredError
 * @throws DegenerateInverseError
 */
export function inverse<A>(f: Series<A>): Series<A> {
  requireZeroConstant(f, "inverse");
  const F = f.field;
  const r = F.recip(requireNonzeroLinear(f, "inverse"));
  const f2 = f.tail().tail();

  return Series.recursive(
    F,
    (self) => {
      const i1 = self.tail();
      const inner = Series.deferred(F, () => compose(f2, self));
      const i1Body = addScalar(scale(shiftByX(multiply(multiply(i1, i1), inner)), F.negate(r)), r);
      return shiftByX(i1Body);
    },
    { label: "inverse" }
  );
}

/**
 * The principal square root S = s0 + x·(F1 / (s0 + S)), with s0 = √f0.
 *
 * @throws NonzeroConstantRequiredError when f0 is zero
 * @throws NoPrincipalRootError when f0 has no square root in the field
 */
export function sqrt<A>(f: Series<A>): Series<A> {
  const F = f.field;
  const s0 = requirePrincipalRoot(f, "sqrt");

  return Series.recursive(
    F,
    (self) => {
      const denominator = Series.deferred(F, () => reciprocal(addScalar(self, s0)));
      return addScalar(shiftByX(multiply(f.tail(), denominator)), s0);
    },
    { label: "sqrt" }
  );
}

/**
 * ln(1 + F) = ∫ F′/(1 + F). F must have a zero constant term.
 *
 * @throws ZeroConstantRequiredError
 */
export function log1p<A>(f: Series<A>): Series<A> {
  requireZeroConstant(f, "log1p");
  const F = f.field;
  return integrate(divide(differentiate(f), addScalar(f, F.one())), F.zero());
}

/**
 * F/G = F·(1/G).
 *
 * @throws NonzeroConstantRequiredError
 */
export function divide<A>(f: Series<A>, g: Series<A>): Series<A> {
  return multiply(f, reciprocal(g));
}

/**
 * Fᵏ for a non-negative integer k, by repeated squaring.
 */
export function power<A>(f: Series<A>, k: number): Series<A> {
  if (!Number.isInteger(k) || k < 0) {
    throw new RangeError(`Series power must be a non-negative integer, got ${k}`);
  }

  let result = one(f.field);
  let base = f;
  let remaining = k;
  let first = true;

  while (remaining > 0) {
    if (remaining % 2 === 1) {
      result = first ? base : multiply(result, base);
      first = false;
    }
    remaining = Math.floor(remaining / 2);
    if (remaining > 0) {
      base = multiply(base, base);
    }
  }

  return result;
}
