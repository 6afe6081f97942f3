/**
 * Tests for the Session facade
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  BigDecOps,
  DefinitionError,
  ParseError,
  SingularMatrixError,
  UnknownIdentifierError,
  UnsupportedOperationError,
  Session,
} from "../src/index.js";

let session: Session;

beforeEach(() => {
  session = new Session({ precision: 10, angleMode: "radians", debug: false });
});

const show = (text: string, bindings: Record<string, number> = {}) =>
  session.render(session.evaluate(text, bindings));

describe("Session", () => {
  describe("evaluate", () => {
    it("evaluates arithmetic", () => {
      expect(show("2+3*4")).toBe("14");
      expect(show("(2+3)*4")).toBe("20");
    });

    it("evaluates empty input to zero", () => {
      expect(show("")).toBe("0");
      expect(show("   ")).toBe("0");
    });

    it("accepts a parsed tree", () => {
      expect(session.render(session.evaluate(session.parse("6/4")))).toBe("1.5");
    });

    it("binds variables for one request", () => {
      expect(show("2x+1", { x: 3 })).toBe("7");
      expect(show("2x+1")).toBe("2x+1");
    });

    it("accepts decimal text and decimals as bindings", () => {
      expect(session.render(session.evaluate("x*2", { x: "0.25" }))).toBe("0.5");
      expect(session.render(session.evaluate("x+1", { x: BigDecOps.fromString("1.5") }))).toBe(
        "2.5"
      );
    });

    it("simplifies symbolic results", () => {
      expect(show("x-(-2)")).toBe("x+2");
      expect(show("x-x")).toBe("0");
    });

    it("substitutes constants", () => {
      expect(show("pi")).toBe("3.141592654");
      expect(show("ln(e)")).toBe("1");
    });

    it("leaves constants alone when substitution is off", () => {
      const plain = new Session({ substituteConstants: false });
      expect(plain.render(plain.evaluate("pi"))).toBe("pi");
    });

    it("rejects binding text that is not a number", () => {
      expect(() => session.evaluate("x+1", { x: "abc" })).toThrow(ParseError);
      expect(() => session.evaluate("x+1", { x: Number.NaN })).toThrow(
        UnsupportedOperationError
      );
    });

    it("keeps constants by name in symbolic results", () => {
      expect(show("pi+x")).toBe("pi+x");
      expect(show("ln(e)+x")).toBe("ln(e)+x");
    });

    it("re-evaluates symbolic results with constants to the same value", () => {
      const text = show("e^(50x)");
      expect(text).toBe("e^(50x)");
      expect(show(text, { x: 1 })).toBe(show("e^(50x)", { x: 1 }));
    });

    it("prefers a caller binding over a constant", () => {
      expect(show("e+x", { e: 1 })).toBe("x+1");
    });

    it("sums series", () => {
      expect(show("sum(1/2^n)")).toBe("2");
      expect(show("sum(n/2^n)")).toBe("2");
    });

    it("collapses values within the zero epsilon", () => {
      expect(show("1e-9")).toBe("0");
    });

    it("keeps fac symbolic for symbolic input", () => {
      expect(show("fac(x)")).toBe("fac(x)");
    });

    it("re-evaluates rendered results to the same value", () => {
      const first = show("1/3+2");
      expect(first).toBe("2.333333333");
      expect(show(first)).toBe(first);
    });
  });

  describe("settings", () => {
    it("exposes a frozen snapshot", () => {
      expect(session.settings.precision).toBe(10);
      expect(Object.isFrozen(session.settings)).toBe(true);
    });

    it("changes precision for later requests", () => {
      session.setPrecision(4);
      expect(show("1/3")).toBe("0.3333");
      expect(session.settings.precision).toBe(4);
    });

    it("rejects invalid precision", () => {
      expect(() => session.setPrecision(0)).toThrow(RangeError);
      expect(session.settings.precision).toBe(10);
    });

    it("switches angle mode", () => {
      session.setAngleMode("degrees");
      expect(show("sin(90)")).toBe("1");
      expect(show("cos(0)")).toBe("1");
    });
  });

  describe("functions", () => {
    it("defines and calls user functions", () => {
      const def = session.defineFunction("f(x,y)=x^2+y");
      expect(def.params).toEqual(["x", "y"]);
      expect(show("f(2,3)")).toBe("7");
    });

    it("lists user functions in definition order", () => {
      session.defineFunction("g(x)=x+1");
      session.defineFunction("f(x)=2x");
      expect(session.functions().map((def) => def.name)).toEqual(["g", "f"]);
    });

    it("rejects redefinition", () => {
      session.defineFunction("f(x)=x");
      expect(() => session.defineFunction("f(x)=2x")).toThrow(DefinitionError);
    });
  });

  describe("calculus", () => {
    it("differentiates", () => {
      const d = session.differentiate("x^2", "x");
      expect(session.render(d)).toBe("2x");
      expect(show(session.render(d), { x: 5 })).toBe("10");
    });

    it("folds numeric factors into divisions", () => {
      expect(session.render(session.differentiate("x^2/2", "x"))).toBe("x");
      expect(show("x/2+x/2")).toBe("x");
    });

    it("differentiates sin to a slope of 1 at 0", () => {
      const d = session.differentiate("sin(x)", "x");
      expect(show(session.render(d), { x: 0 })).toBe("1");
    });

    it("returns numbers for constant derivatives", () => {
      expect(session.differentiate("3x", "x")).toEqual({
        kind: "numeric",
        value: BigDecOps.bigDecimal(3),
      });
    });

    it("takes higher derivatives", () => {
      expect(session.render(session.nthDerivative("x^3", "x", 2))).toBe("6x");
    });

    it("integrates", () => {
      expect(session.render(session.integrate("x^2", "x"))).toBe("x^3/3");
    });

    it("simplifies and factors text", () => {
      expect(session.render(session.evaluate(session.simplify("x+x")))).toBe("2x");
      expect(session.render(session.evaluate(session.factor("(x+1)(x-1)")))).toBe("x^2-1");
    });
  });

  describe("findRoots", () => {
    const roots = (text: string, ...variables: string[]) =>
      session.findRoots(text, ...variables).map((r) => BigDecOps.toString(r));

    it("infers the unknown", () => {
      expect(roots("x^2-4")).toEqual(["-2", "2"]);
    });

    it("uses the named unknown", () => {
      expect(roots("t^2-9", "t")).toEqual(["-3", "3"]);
    });

    it("treats constants as numbers", () => {
      expect(roots("x^2-pi")).toEqual(["-1.772453851", "1.772453851"]);
    });

    it("separates close and repeated roots", () => {
      expect(roots("(x-1)(x-1.0005)")).toEqual(["1", "1.0005"]);
      expect(roots("x^2-2x+1")).toEqual(["1"]);
    });

    it("needs exactly one unknown", () => {
      expect(() => roots("x*y")).toThrow(UnknownIdentifierError);
      expect(() => roots("x^2-4", "x", "y")).toThrow(UnsupportedOperationError);
    });
  });

  describe("matrices", () => {
    it("row-reduces an invertible matrix to the identity", () => {
      const m = session.parseMatrix("[1 3 5][8 30 2][1 89 2]");
      expect(session.formatMatrix(session.rowReduce(m))).toBe("[1 0 0]\n[0 1 0]\n[0 0 1]");
    });

    it("computes determinants", () => {
      const m = session.parseMatrix("[1 3 5][8 30 2][1 89 2]");
      expect(session.render(session.determinant(m))).toBe("3250");
      expect(session.render(session.determinant(session.parseMatrix("[1 2][2 4]")))).toBe("0");
    });

    it("evaluates entries", () => {
      expect(session.formatMatrix(session.parseMatrix("[1/2 2^2]"))).toBe("[0.5 4]");
    });

    it("inverts", () => {
      const inverse = session.inverse(session.parseMatrix("[1 2][3 4]"));
      expect(session.formatMatrix(inverse)).toBe("[-2 1]\n[1.5 -0.5]");
    });

    it("rejects singular matrices", () => {
      expect(() => session.inverse(session.parseMatrix("[1 2][2 4]"))).toThrow(
        SingularMatrixError
      );
    });

    it("eliminates below the pivots", () => {
      const m = session.parseMatrix("[2 4][1 3]");
      expect(session.formatMatrix(session.echelon(m))).toBe("[2 4]\n[0 1]");
    });

    it("builds the characteristic polynomial", () => {
      const m = session.parseMatrix("[2 0][0 3]");
      expect(session.render(session.characteristicPolynomial(m))).toBe("x^2-5x+6");
      expect(session.render(session.characteristicPolynomial(m, "t"))).toBe("t^2-5t+6");
    });

    it("rounds the display", () => {
      const coarse = new Session({ displayPlaces: 2 });
      expect(coarse.formatMatrix(coarse.parseMatrix("[1/3]"))).toBe("[0.33]");
    });

    it("rejects non-matrix text and symbolic entries", () => {
      expect(() => session.parseMatrix("2+3")).toThrow(ParseError);
      expect(() => session.parseMatrix("[x 1]")).toThrow(UnsupportedOperationError);
    });
  });
});
