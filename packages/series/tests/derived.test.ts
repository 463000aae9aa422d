/**
 * Tests for the recursive operators
 */

import { describe, it, expect, afterEach } from "vitest";
import { config, setDiagnosticWriter } from "@powser/core";
import { fieldNumber, pow, factorial } from "@powser/std";
import { complex, fieldComplex, rat, rational } from "@powser/math";
import {
  Series,
  multiply,
  compose,
  exp,
  reciprocal,
  inverse,
  sqrt,
  log1p,
  divide,
  power,
  addScalar,
  x,
  SeriesError,
  ZeroConstantRequiredError,
  NonzeroConstantRequiredError,
  NoPrincipalRootError,
  DegenerateInverseError,
} from "../src/index.js";
import { Q, poly, show } from "./helpers.js";

afterEach(() => {
  setDiagnosticWriter(undefined);
  config.reset();
});

describe("multiply", () => {
  it("multiplies polynomials", () => {
    expect(show(multiply(poly(1, 2), poly(3, 4)), 4)).toEqual(["3", "10", "8", "0"]);
    expect(show(multiply(poly(1, 1), poly(1, 1)), 4)).toEqual(["1", "2", "1", "0"]);
  });

  it("multiplies infinite series", () => {
    const geometric = Series.fromRule(Q, () => rat(1));
    expect(show(multiply(geometric, geometric), 5)).toEqual(["1", "2", "3", "4", "5"]);
  });
});

describe("compose", () => {
  it("substitutes a polynomial into a polynomial", () => {
    // 1 + 2(x + x²) + 3(x + x²)²
    expect(show(compose(poly(1, 2, 3), poly(0, 1, 1)), 6)).toEqual(["1", "2", "5", "6", "3", "0"]);
  });

  it("rejects a nonzero inner constant before reading any further coefficient", () => {
    const requested: number[] = [];
    const g = Series.fromRule(Q, (n) => {
      requested.push(n);
      return rat(n + 1);
    });

    expect(() => compose(poly(1, 1), g)).toThrow(ZeroConstantRequiredError);
    expect(requested).toEqual([0]);
  });
});

describe("exp", () => {
  it("exp(x) has coefficients 1/n!", () => {
    expect(show(exp(x(Q)), 7)).toEqual(["1", "1", "1/2", "1/6", "1/24", "1/120", "1/720"]);
  });

  it("exp(2x) has coefficients 2ⁿ/n!", () => {
    const expected = Series.fromRule(Q, (n) => Q.div(pow(rat(2), n, Q), factorial(n, Q)));
    expect(show(exp(poly(0, 2)), 9)).toEqual(show(expected, 9));
    expect(show(exp(poly(0, 2)), 6)).toEqual(["1", "2", "2", "4/3", "2/3", "4/15"]);
  });

  it("requires a zero constant term", () => {
    expect(() => exp(poly(1))).toThrow("exp requires a series with zero constant term, got 1");
  });

  it("computes each coefficient of the result once", () => {
    const e = exp(x(Q));
    const first = e.coefficient(5);
    expect(e.coefficient(5)).toBe(first);
    expect(e.cached).toBe(6);
  });
});

describe("reciprocal", () => {
  it("1/(1 − x) is the geometric series", () => {
    expect(show(reciprocal(poly(1, -1)), 6)).toEqual(["1", "1", "1", "1", "1", "1"]);
  });

  it("1/(1 − x)² counts up", () => {
    expect(show(reciprocal(poly(1, -2, 1)), 5)).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("inverts a constant", () => {
    expect(show(reciprocal(poly(2)), 3)).toEqual(["1/2", "0", "0"]);
  });

  it("requires a nonzero constant term", () => {
    expect(() => reciprocal(poly(0, 1))).toThrow(
      "reciprocal requires a series with nonzero constant term"
    );
  });
});

describe("inverse", () => {
  it("inverts x + x²", () => {
    expect(show(inverse(poly(0, 1, 1)), 7)).toEqual(["0", "1", "-1", "2", "-5", "14", "-42"]);
  });

  it("inverts a linear series", () => {
    expect(show(inverse(poly(0, 2)), 4)).toEqual(["0", "1/2", "0", "0"]);
  });

  it("inverts exp(x) − 1 to ln(1 + x)", () => {
    const expm1 = addScalar(exp(x(Q)), rat(-1));
    expect(show(inverse(expm1), 6)).toEqual(["0", "1", "-1/2", "1/3", "-1/4", "1/5"]);
  });

  it("requires a zero constant term", () => {
    expect(() => inverse(poly(1, 1))).toThrow(ZeroConstantRequiredError);
  });

  it("requires a nonzero first-order coefficient", () => {
    expect(() => inverse(poly(0, 0, 1))).toThrow(DegenerateInverseError);
    expect(() => inverse(poly(0, 0, 1))).toThrow("inverse requires a nonzero first-order coefficient");
  });
});

describe("sqrt", () => {
  it("squares back to a constant", () => {
    const root = sqrt(poly(4));
    expect(show(root, 4)).toEqual(["2", "0", "0", "0"]);
    expect(show(multiply(root, root), 5)).toEqual(["4", "0", "0", "0", "0"]);
  });

  it("expands √(1 + x) binomially", () => {
    expect(show(sqrt(poly(1, 1)), 6)).toEqual(["1", "1/2", "-1/8", "1/16", "-5/128", "7/256"]);
  });

  it("requires a nonzero constant term", () => {
    expect(() => sqrt(poly(0, 1))).toThrow(NonzeroConstantRequiredError);
  });

  it("has no root of a negative rational", () => {
    expect(() => sqrt(poly(-4))).toThrow(
      "sqrt: constant term -4 has no principal square root in this field"
    );
    expect(() => sqrt(Series.fromArray(fieldNumber, [-1]))).toThrow(NoPrincipalRootError);
  });

  it("takes the principal complex root of a negative constant", () => {
    const root = sqrt(Series.fromArray(fieldComplex, [complex(-4)]));
    expect(root.head()).toEqual({ re: 0, im: 2 });
    expect(fieldComplex.isZero(root.coefficient(1))).toBe(true);
  });

  it("keeps a tiny rational constant nonzero", () => {
    const root = sqrt(Series.fromArray(Q, [rational(1n, 10n ** 25n), rat(1)]));
    const s0 = root.head();
    expect(s0.num > 0n).toBe(true);
    expect(root.coefficient(1)).toEqual(Q.recip(Q.add(s0, s0)));
  });

  it("roots a rational constant beyond the double range", () => {
    const root = sqrt(Series.fromArray(Q, [rational(10n ** 400n + 1n)]));
    expect(root.head()).toEqual({ num: 10n ** 200n, den: 1n });
    expect(root.coefficient(1)).toEqual({ num: 0n, den: 1n });
  });

  it("uses the floating-point root over numbers", () => {
    expect(sqrt(Series.fromArray(fieldNumber, [2])).head()).toBe(Math.SQRT2);
  });
});

describe("log1p", () => {
  it("log1p(x) is the alternating harmonic series", () => {
    expect(show(log1p(x(Q)), 5)).toEqual(["0", "1", "-1/2", "1/3", "-1/4"]);
  });

  it("requires a zero constant term", () => {
    expect(() => log1p(poly(1, 1))).toThrow(ZeroConstantRequiredError);
  });
});

describe("divide", () => {
  it("(1 + x)/(1 − x)", () => {
    expect(show(divide(poly(1, 1), poly(1, -1)), 4)).toEqual(["1", "2", "2", "2"]);
  });

  it("reports a zero-constant divisor through reciprocal", () => {
    let caught: unknown;
    try {
      divide(poly(1), poly(0, 1));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NonzeroConstantRequiredError);
    expect(caught).toMatchObject({ kind: "nonzero-constant-required", operation: "reciprocal" });
  });
});

describe("power", () => {
  it("expands binomials", () => {
    expect(show(power(poly(1, 1), 0), 2)).toEqual(["1", "0"]);
    expect(show(power(poly(1, 1), 2), 4)).toEqual(["1", "2", "1", "0"]);
    expect(show(power(poly(1, 1), 3), 5)).toEqual(["1", "3", "3", "1", "0"]);
    expect(show(power(poly(1, 1), 5), 7)).toEqual(["1", "5", "10", "10", "5", "1", "0"]);
  });

  it("rejects negative and fractional exponents", () => {
    expect(() => power(poly(1, 1), -1)).toThrow(RangeError);
    expect(() => power(poly(1, 1), 1.5)).toThrow(RangeError);
  });
});

describe("precondition diagnostics", () => {
  it("prints the failure when debug is enabled", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));
    config.set({ debug: true });

    expect(() => exp(Series.fromArray(Q, [rat(1)], { label: "F" }))).toThrow(SeriesError);
    expect(lines).toEqual([
      "error[precondition]: exp requires a series with zero constant term, got 1\n   = note: operand: F",
    ]);
  });

  it("stays silent otherwise", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));

    expect(() => exp(poly(1))).toThrow(SeriesError);
    expect(lines).toEqual([]);
  });
});
