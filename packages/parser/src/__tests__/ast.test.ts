import { describe, it, expect } from "vitest";
import {
  parse,
  toText,
  canJoin,
  freeVariables,
  hasVariable,
  substitute,
  nodeValue,
  nodeCount,
  depth,
  isLiteralValue,
  const_,
  var_,
  add,
  sub,
  mul,
  pow,
  neg,
  binary,
} from "../index.js";

describe("AST utilities", () => {
  it("collects free variables in first-appearance order", () => {
    expect([...freeVariables(parse("y*sin(x)+y+z"))]).toEqual(["y", "x", "z"]);
  });

  it("does not count function names or bound parameters", () => {
    expect(freeVariables(parse("f(x) = x + a"))).toEqual(new Set(["a"]));
    expect(hasVariable(parse("f(x) = x + a"), "x")).toBe(false);
    expect(hasVariable(parse("g(2)"), "g")).toBe(false);
  });

  it("substitutes variables structurally", () => {
    const tree = parse("x^2 + xy");
    const result = substitute(tree, { x: const_(3) });
    expect(toText(result)).toBe("3^2+xy");
  });

  it("leaves parameters of a definition alone", () => {
    const result = substitute(parse("f(x)=x+a"), { x: const_(1), a: const_(2) });
    expect(toText(result)).toBe("f(x)=x+2");
  });

  it("reports node values", () => {
    expect(nodeValue(parse("12.50"))).toBe("12.5");
    expect(nodeValue(parse("a>=b"))).toBe(">=");
    expect(nodeValue(parse("-a"))).toBe("-");
    expect(nodeValue(parse("[1 2 3]"))).toBe("3");
    expect(nodeValue(parse(""))).toBe(" ");
  });

  it("measures trees", () => {
    const tree = parse("1+2*3");
    expect(nodeCount(tree)).toBe(5);
    expect(depth(tree)).toBe(3);
  });

  it("compares literal values across scales", () => {
    expect(isLiteralValue(parse("2.0"), 2)).toBe(true);
    expect(isLiteralValue(parse("x"), 2)).toBe(false);
  });
});

describe("toText", () => {
  const x = var_("x");
  const y = var_("y");

  it("round-trips parsed text", () => {
    for (const text of ["2x+1", "x^2-3x+2", "(x+1)^2", "sin(2x)/cos(x)", "-x^2", "2^3^2"]) {
      expect(toText(parse(text))).toBe(text);
    }
  });

  it("adds the parentheses precedence requires", () => {
    expect(toText(mul(add(x, y), x))).toBe("(x+y)*x");
    expect(toText(sub(x, sub(y, x)))).toBe("x-(y-x)");
    expect(toText(pow(pow(x, y), const_(2)))).toBe("(x^y)^2");
    expect(toText(pow(neg(x), const_(2)))).toBe("(-x)^2");
    expect(toText(pow(const_(-2), const_(2)))).toBe("(-2)^2");
  });

  it("keeps * when joining would merge tokens", () => {
    expect(toText(binary("MULT", x, y, true))).toBe("x*y");
    expect(toText(binary("MULT", var_("x2"), y, true))).toBe("x2*y");
    expect(toText(binary("MULT", const_(2), const_(3), true))).toBe("2*3");
    expect(toText(binary("MULT", const_(2), var_("e5"), true))).toBe("2*e5");
    expect(toText(mul(const_(2), x))).toBe("2*x");
  });

  it("spaces binary operators on request", () => {
    expect(toText(parse("2x+(y-1)^2"), { spaced: true })).toBe("2x + (y - 1)^2");
  });

  it("renders brackets", () => {
    expect(toText(parse("[1 -3][2 4]"))).toBe("[1 -3][2 4]");
    expect(toText(parse(""))).toBe("");
  });

  it("decides when operands can be joined", () => {
    expect(canJoin("2", "x")).toBe(true);
    expect(canJoin("(a+b)", "(c)")).toBe(true);
    expect(canJoin("x", "y")).toBe(false);
    expect(canJoin("2", "3")).toBe(false);
  });
});
