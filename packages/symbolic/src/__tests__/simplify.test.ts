import { describe, it, expect } from "vitest";
import { parse, toText } from "@symcalc/parser";
import { factor, foldAdditive, simplify } from "../simplify/simplify.js";

const s = (text: string) => toText(simplify(parse(text)));

describe("simplify", () => {
  describe("additive folding", () => {
    it("merges like terms and cancels constants", () => {
      expect(s("x+2+x-2")).toBe("2x");
      expect(s("2x-2x")).toBe("0");
      expect(s("x+0")).toBe("x");
    });

    it("puts the constant last", () => {
      expect(s("3-x+4")).toBe("-x+7");
      expect(toText(foldAdditive(parse("1+x^2-2")))).toBe("x^2-1");
    });

    it("distributes a leading minus", () => {
      expect(s("--x")).toBe("x");
      expect(s("-(x+1)")).toBe("-x-1");
    });
  });

  describe("products", () => {
    it("adds exponents of equal bases", () => {
      expect(s("x*x")).toBe("x^2");
      expect(s("x^2*x^3")).toBe("x^5");
    });

    it("multiplies coefficients", () => {
      expect(s("2*3x")).toBe("6x");
      expect(s("x*1")).toBe("x");
      expect(s("x*0")).toBe("0");
    });
  });

  describe("identities", () => {
    it("folds division by one and of zero", () => {
      expect(s("x/1")).toBe("x");
      expect(s("0/x")).toBe("0");
    });

    it("folds only exact literal quotients", () => {
      expect(s("6/4")).toBe("1.5");
      expect(s("1/3")).toBe("1/3");
    });

    it("folds numeric factors into literal divisors", () => {
      expect(s("x/2+x/2")).toBe("x");
      expect(s("2x/2")).toBe("x");
      expect(s("4x/2")).toBe("2x");
      expect(s("2x/4")).toBe("x/2");
      expect(s("x/2+x/3")).toBe("5x/6");
      expect(s("x^3/3")).toBe("x^3/3");
    });

    it("folds trivial powers", () => {
      expect(s("x^1")).toBe("x");
      expect(s("x^0")).toBe("1");
      expect(s("2^10")).toBe("1024");
    });

    it("folds literal comparisons", () => {
      expect(s("3>2")).toBe("1");
      expect(s("3<2")).toBe("0");
    });

    it("simplifies call arguments", () => {
      expect(s("sin(0+x)")).toBe("sin(x)");
    });
  });
});

describe("factor", () => {
  const f = (text: string) => toText(factor(parse(text)));

  it("expands products of sums", () => {
    expect(f("(x+1)(x-1)")).toBe("x^2-1");
    expect(f("x*(x+3)")).toBe("x^2+3x");
    expect(f("(x-y)(x+y)")).toBe("x^2-y^2");
  });

  it("leaves non-products alone", () => {
    expect(f("(x+1)^2")).toBe("(x+1)^2");
  });

  it("gives up above the expansion limit", () => {
    expect(toText(factor(parse("(a+b)(c+d)"), { maxExpansion: 3 }))).toBe("(a+b)(c+d)");
  });
});
