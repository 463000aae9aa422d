import { describe, it, expect } from "vitest";
import { fieldNumber, numericNumber, fractionalNumber, pow, factorial } from "../src/index.js";

describe("fieldNumber", () => {
  it("does ring arithmetic", () => {
    expect(fieldNumber.add(2, 3)).toBe(5);
    expect(fieldNumber.sub(2, 3)).toBe(-1);
    expect(fieldNumber.mul(2, 3)).toBe(6);
    expect(fieldNumber.negate(4)).toBe(-4);
    expect(fieldNumber.zero()).toBe(0);
    expect(fieldNumber.one()).toBe(1);
  });

  it("divides and refuses zero divisors", () => {
    expect(fieldNumber.div(1, 4)).toBe(0.25);
    expect(fieldNumber.recip(8)).toBe(0.125);
    expect(() => fieldNumber.div(1, 0)).toThrow(RangeError);
    expect(() => fieldNumber.recip(0)).toThrow("Number reciprocal of zero");
    expect(() => fractionalNumber.fromRational(1, 0)).toThrow(RangeError);
  });

  it("tests zero exactly", () => {
    expect(fieldNumber.isZero(0)).toBe(true);
    expect(fieldNumber.isZero(-0)).toBe(true);
    expect(fieldNumber.isZero(1e-300)).toBe(false);
  });

  it("has real principal roots only", () => {
    expect(fieldNumber.sqrt(9)).toBe(3);
    expect(fieldNumber.sqrt(0)).toBe(0);
    expect(fieldNumber.sqrt(-1)).toBeUndefined();
    expect(fieldNumber.sqrt(NaN)).toBeUndefined();
  });

  it("displays values", () => {
    expect(fieldNumber.display(0.5)).toBe("0.5");
  });
});

describe("numeric operations", () => {
  it("raises to integer powers", () => {
    expect(pow(2, 10, numericNumber)).toBe(1024);
    expect(pow(7, 0, numericNumber)).toBe(1);
    expect(pow(3, 5, numericNumber)).toBe(243);
    expect(() => pow(2, -1, numericNumber)).toThrow(RangeError);
    expect(() => pow(2, 0.5, numericNumber)).toThrow(RangeError);
  });

  it("computes factorials", () => {
    expect(factorial(0, numericNumber)).toBe(1);
    expect(factorial(5, numericNumber)).toBe(120);
    expect(() => factorial(1.5, numericNumber)).toThrow(RangeError);
  });
});
