import { fieldRational, rat, rationalToString, type Rational } from "@powser/math";
import { Series, take } from "../src/index.js";

export const Q = fieldRational;

/** A rational polynomial from integer coefficients. */
export function poly(...coefficients: number[]): Series<Rational> {
  return Series.fromArray(Q, coefficients.map((c) => rat(c)));
}

/** The first `count` coefficients, rendered. */
export function show(series: Series<Rational>, count: number): string[] {
  return take(series, count).map(rationalToString);
}
