import { describe, it, expect } from "vitest";
import { LexicalError } from "@symcalc/core";
import { tokenize } from "../index.js";

const kinds = (text: string) => tokenize(text).map((t) => t.kind);
const texts = (text: string) => tokenize(text).map((t) => t.text);

describe("tokenize", () => {
  it("splits numbers, identifiers and operators", () => {
    expect(texts("2x+1")).toEqual(["2", "x", "+", "1"]);
    expect(kinds("2x+1")).toEqual(["number", "identifier", "operator", "number"]);
  });

  it("collapses whitespace runs into one space token", () => {
    expect(texts("a  \t+ b")).toEqual(["a", " ", "+", " ", "b"]);
  });

  it("recognizes decimal and scientific literals", () => {
    expect(texts("3.5 .5 2e3 1.5e-2")).toEqual(["3.5", " ", ".5", " ", "2e3", " ", "1.5e-2"]);
  });

  it("reads 2e as a number followed by an identifier", () => {
    expect(kinds("2e")).toEqual(["number", "identifier"]);
  });

  it("prefers two-character operators", () => {
    expect(texts("a>=b<=c!=d==e+=f")).toEqual([
      "a", ">=", "b", "<=", "c", "!=", "d", "==", "e", "+=", "f",
    ]);
  });

  it("distinguishes definition '=' from comparison '=='", () => {
    expect(kinds("f(x)=x==1")).toEqual([
      "identifier",
      "lparen",
      "identifier",
      "rparen",
      "equals",
      "identifier",
      "operator",
      "number",
    ]);
  });

  it("tokenizes brackets and commas", () => {
    expect(kinds("[1,2]")).toEqual(["lbracket", "number", "comma", "number", "rbracket"]);
  });

  it("records offsets", () => {
    expect(tokenize("ab + 12").map((t) => t.offset)).toEqual([0, 2, 3, 4, 5]);
  });

  it("accepts underscores and digits in identifiers", () => {
    expect(texts("x_1")).toEqual(["x_1"]);
  });

  it("throws LexicalError with the offending offset", () => {
    try {
      tokenize("2 $ 3");
      expect.unreachable("tokenize should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(LexicalError);
      if (e instanceof LexicalError) {
        expect(e.position).toBe(2);
        expect(e.character).toBe("$");
      }
    }
  });

  it("rejects a lone '!'", () => {
    expect(() => tokenize("3!")).toThrow(LexicalError);
  });
});
