import { describe, it, expect } from "vitest";
import { BigDecOps, bigDecimal } from "../src/index.js";

const {
  fromString,
  isDecimalText,
  toString,
  toNumber,
  toFixed,
  add,
  sub,
  mul,
  divide,
  divWithScale,
  pow,
  round,
  roundSignificant,
  precisionOf,
  compare,
  equals,
  isInteger,
  integerPart,
  signum,
  ZERO,
  ONE,
} = BigDecOps;

describe("BigDecimal", () => {
  describe("parsing", () => {
    it("parses plain decimals", () => {
      expect(fromString("123.456")).toEqual({ unscaled: 123456n, scale: 3 });
      expect(fromString("-0.001")).toEqual({ unscaled: -1n, scale: 3 });
      expect(fromString(".5")).toEqual({ unscaled: 5n, scale: 1 });
    });

    it("parses scientific notation", () => {
      expect(fromString("2e3")).toEqual({ unscaled: 2n, scale: -3 });
      expect(toString(fromString("1.5e-3"))).toBe("0.0015");
    });

    it("rejects malformed literals", () => {
      expect(() => fromString("1.2.3")).toThrow(SyntaxError);
      expect(() => fromString("abc")).toThrow(SyntaxError);
    });

    it("recognizes decimal text", () => {
      expect(isDecimalText(" -3.5 ")).toBe(true);
      expect(isDecimalText("2e3")).toBe(true);
      expect(isDecimalText("1.2.3")).toBe(false);
      expect(isDecimalText("abc")).toBe(false);
    });

    it("converts from numbers", () => {
      expect(toString(bigDecimal(0.1))).toBe("0.1");
      expect(() => bigDecimal(Number.NaN)).toThrow(RangeError);
    });
  });

  describe("formatting", () => {
    it("prints plain notation without trailing zeros", () => {
      expect(toString({ unscaled: 12000n, scale: 3 })).toBe("12");
      expect(toString({ unscaled: 12n, scale: -2 })).toBe("1200");
      expect(toString(ZERO)).toBe("0");
    });

    it("pads to a fixed number of places", () => {
      expect(toFixed(bigDecimal("1.005"), 2)).toBe("1.01");
      expect(toFixed(bigDecimal("3"), 2)).toBe("3.00");
    });

    it("converts to number", () => {
      expect(toNumber(bigDecimal("-2.25"))).toBe(-2.25);
    });
  });

  describe("arithmetic", () => {
    it("adds and subtracts exactly", () => {
      expect(toString(add(bigDecimal("0.1"), bigDecimal("0.2")))).toBe("0.3");
      expect(toString(sub(bigDecimal("1"), bigDecimal("0.001")))).toBe("0.999");
    });

    it("multiplies exactly", () => {
      expect(toString(mul(bigDecimal("1.5"), bigDecimal("-0.2")))).toBe("-0.3");
    });

    it("divides to significant digits with half-up rounding", () => {
      expect(toString(divide(ONE, bigDecimal(3), 5))).toBe("0.33333");
      expect(toString(divide(bigDecimal(2), bigDecimal(3), 5))).toBe("0.66667");
      expect(toString(divide(bigDecimal(10), bigDecimal(4), 10))).toBe("2.5");
      expect(toString(divide(bigDecimal(-1), bigDecimal(8), 2))).toBe("-0.13");
    });

    it("divides to a fixed scale by truncation", () => {
      expect(toString(divWithScale(bigDecimal(2), bigDecimal(3), 3))).toBe("0.666");
    });

    it("throws on division by zero", () => {
      expect(() => divide(ONE, ZERO, 10)).toThrow(RangeError);
    });

    it("raises to integer powers", () => {
      expect(toString(pow(bigDecimal("1.1"), 2))).toBe("1.21");
      expect(toString(pow(bigDecimal(7), 0))).toBe("1");
      expect(() => pow(ONE, -1)).toThrow(RangeError);
    });
  });

  describe("rounding", () => {
    it("supports half-up and half-even", () => {
      expect(toString(round(bigDecimal("2.5"), 0, "halfUp"))).toBe("3");
      expect(toString(round(bigDecimal("2.5"), 0, "round"))).toBe("2");
      expect(toString(round(bigDecimal("-2.5"), 0, "halfUp"))).toBe("-3");
      expect(toString(round(bigDecimal("-2.7"), 0, "down"))).toBe("-2");
    });

    it("rounds to significant digits", () => {
      expect(toString(roundSignificant(bigDecimal("123456"), 3))).toBe("123000");
      expect(toString(roundSignificant(bigDecimal("0.00123456"), 2))).toBe("0.0012");
      expect(precisionOf(bigDecimal("0.00120"))).toBe(3);
    });
  });

  describe("comparison", () => {
    it("compares across scales", () => {
      expect(equals(bigDecimal("1.50"), bigDecimal("1.5"))).toBe(true);
      expect(compare(bigDecimal("-1"), bigDecimal("0.5"))).toBe(-1);
      expect(signum(bigDecimal("-0.3"))).toBe(-1);
    });

    it("detects integers", () => {
      expect(isInteger(bigDecimal("4.000"))).toBe(true);
      expect(isInteger(bigDecimal("4.01"))).toBe(false);
      expect(integerPart(bigDecimal("-7.9"))).toBe(-7n);
    });
  });
});
