/**
 * @powser/series — Lazy Formal Power Series
 *
 * Infinite coefficient sequences evaluated on demand, with the classic
 * recursive operators (multiply, compose, exp, reciprocal, inverse, sqrt,
 * log1p) defined over the series they produce.
 *
 * @example
 * ```typescript
 * import { Series, exp, take } from "@powser/series";
 * import { fieldRational, rat, rationalToString } from "@powser/math";
 *
 * const x = Series.fromArray(fieldRational, [rat(0), rat(1)]);
 * take(exp(x), 5).map(rationalToString); // ["1", "1", "1/2", "1/6", "1/24"]
 * ```
 */

// Container
export { Series, type CoefficientRule, type SeriesOptions } from "./series.js";

// Errors
export {
  SeriesError,
  ZeroConstantRequiredError,
  NonzeroConstantRequiredError,
  NoPrincipalRootError,
  DegenerateInverseError,
  EvaluationCycleError,
  type SeriesErrorKind,
} from "./errors.js";

// Elementary operators and constants
export {
  zero,
  constant,
  one,
  monomial,
  x,
  shiftByX,
  addScalar,
  scale,
  add,
  negate,
  subtract,
  differentiate,
  integrate,
} from "./elementary.js";

// Recursive operators
export {
  multiply,
  compose,
  exp,
  reciprocal,
  inverse,
  sqrt,
  log1p,
  divide,
  power,
} from "./derived.js";

// Reading and comparison
export { take, equalsUpTo } from "./compare.js";

// Standard series
export * from "./library.js";
