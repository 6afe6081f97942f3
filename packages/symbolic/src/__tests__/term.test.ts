import { describe, it, expect } from "vitest";
import { UnsupportedOperationError } from "@symcalc/core";
import { BigDecOps } from "@symcalc/math";
import {
  ZERO_TERM,
  exponentOf,
  freeVariableOf,
  isZeroTerm,
  numeric,
  parenthesize,
  renderTerm,
  stripParens,
  symbolic,
  termSign,
  termToNumber,
} from "../term.js";

const num = (text: string) => numeric(BigDecOps.fromString(text));

describe("Term", () => {
  describe("renderTerm", () => {
    it("prints numbers without trailing zeros", () => {
      expect(renderTerm(num("2.50"))).toBe("2.5");
    });

    it("rounds to significant digits on request", () => {
      expect(renderTerm(num("3.14159265358979"), 5)).toBe("3.1416");
      expect(renderTerm(num("1234.5"), 10)).toBe("1234.5");
    });

    it("prints symbolic text verbatim", () => {
      expect(renderTerm(symbolic("(2x)"))).toBe("(2x)");
      expect(renderTerm(symbolic(""))).toBe("0");
    });
  });

  describe("termSign", () => {
    it("reads the sign of numbers", () => {
      expect(termSign(num("-2"))).toBe(-1);
      expect(termSign(ZERO_TERM)).toBe(0);
      expect(termSign(num("0.1"))).toBe(1);
    });

    it("looks for a leading minus inside outer parentheses", () => {
      expect(termSign(symbolic("((-x))"))).toBe(-1);
      expect(termSign(symbolic("x-1"))).toBe(1);
    });
  });

  describe("freeVariableOf", () => {
    it("skips called names and numbers", () => {
      expect(freeVariableOf(symbolic("(2x+sin(y))"))).toBe("x");
      expect(freeVariableOf(symbolic("sin(y)"))).toBe("y");
      expect(freeVariableOf(symbolic("2e5+t"))).toBe("t");
    });

    it("is undefined for numbers", () => {
      expect(freeVariableOf(num("3"))).toBeUndefined();
    });
  });

  describe("exponentOf", () => {
    it("reads the operand after the top-level ^", () => {
      expect(exponentOf(symbolic("x^2"))).toBe("2");
      expect(exponentOf(symbolic("(x^(n+1))"))).toBe("(n+1)");
      expect(exponentOf(symbolic("(x+1)^3*y"))).toBe("3");
    });

    it("defaults to 1", () => {
      expect(exponentOf(symbolic("x"))).toBe("1");
      expect(exponentOf(symbolic("(x^2)+1"))).toBe("1");
    });
  });

  describe("parentheses", () => {
    it("strips only redundant pairs", () => {
      expect(stripParens("((x+1))")).toBe("x+1");
      expect(stripParens("(a)+(b)")).toBe("(a)+(b)");
    });

    it("wraps once", () => {
      expect(parenthesize("x")).toBe("(x)");
      expect(parenthesize("(x)")).toBe("(x)");
      expect(parenthesize("(a)(b)")).toBe("((a)(b))");
    });
  });

  it("tests zero within an epsilon", () => {
    expect(isZeroTerm(num("0.00000001"), 1e-7)).toBe(true);
    expect(isZeroTerm(num("0.001"), 1e-7)).toBe(false);
    expect(isZeroTerm(symbolic("()"))).toBe(true);
  });

  it("converts only numbers to JavaScript numbers", () => {
    expect(termToNumber(num("-1.5"))).toBe(-1.5);
    expect(() => termToNumber(symbolic("x"))).toThrow(UnsupportedOperationError);
  });
});
