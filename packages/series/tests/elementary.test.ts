/**
 * Tests for the termwise operators and constant series
 */

import { describe, it, expect } from "vitest";
import { rat } from "@powser/math";
import {
  Series,
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
  equalsUpTo,
} from "../src/index.js";
import { Q, poly, show } from "./helpers.js";

describe("constants", () => {
  it("zero, one and x", () => {
    expect(show(zero(Q), 3)).toEqual(["0", "0", "0"]);
    expect(show(one(Q), 3)).toEqual(["1", "0", "0"]);
    expect(show(x(Q), 3)).toEqual(["0", "1", "0"]);
  });

  it("constant", () => {
    const c = constant(Q, rat(3, 4));
    expect(show(c, 2)).toEqual(["3/4", "0"]);
    expect(c.label).toBe("3/4");
  });

  it("monomial", () => {
    const m = monomial(Q, 3, rat(2));
    expect(show(m, 5)).toEqual(["0", "0", "0", "2", "0"]);
    expect(m.label).toBe("2x^3");
    expect(show(monomial(Q, 1), 3)).toEqual(["0", "1", "0"]);
    expect(() => monomial(Q, -1)).toThrow(RangeError);
  });
});

describe("termwise operators", () => {
  it("shiftByX", () => {
    expect(show(shiftByX(poly(1, 2)), 4)).toEqual(["0", "1", "2", "0"]);
  });

  it("addScalar only changes the constant term", () => {
    expect(show(addScalar(poly(1, 2), rat(5)), 3)).toEqual(["6", "2", "0"]);
  });

  it("scale", () => {
    expect(show(scale(poly(1, 2, 3), rat(1, 2)), 4)).toEqual(["1/2", "1", "3/2", "0"]);
  });

  it("add, subtract and negate", () => {
    expect(show(add(poly(1, 2), poly(3, 0, 4)), 4)).toEqual(["4", "2", "4", "0"]);
    expect(show(subtract(poly(5, 1), poly(2, 3)), 3)).toEqual(["3", "-2", "0"]);
    expect(show(negate(poly(1, -2)), 3)).toEqual(["-1", "2", "0"]);
  });

  it("does not mutate its operands", () => {
    const f = poly(1, 2);
    add(f, f).coefficient(3);
    expect(show(f, 3)).toEqual(["1", "2", "0"]);
  });
});

describe("calculus", () => {
  it("differentiate", () => {
    expect(show(differentiate(poly(5, 3, 4, 2)), 4)).toEqual(["3", "8", "6", "0"]);
  });

  it("integrate", () => {
    expect(show(integrate(poly(3, 8, 6), rat(5)), 5)).toEqual(["5", "3", "4", "2", "0"]);
  });

  it("integrate knows its constant without reading the operand", () => {
    const untouchable = Series.fromRule(Q, () => {
      throw new Error("operand was read");
    });
    expect(show(integrate(untouchable, rat(7)), 1)).toEqual(["7"]);
  });

  it("differentiate undoes integrate", () => {
    const f = Series.fromRule(Q, (n) => rat(n * n - 3, n + 1));
    expect(equalsUpTo(differentiate(integrate(f, rat(9))), f, 8)).toBe(true);
  });
});
