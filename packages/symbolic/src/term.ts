/**
 * Terms
 *
 * The result of evaluating an expression: either an exact decimal or the
 * text of an expression that still mentions unbound names. Symbolic text is
 * always valid expression text, so it can be parsed again.
 *
 * @example
 * ```typescript
 * renderTerm(numeric(BigDecOps.fromString("0.5"))); // "0.5"
 * renderTerm(symbolic("(2x)"));                     // "(2x)"
 * exponentOf(symbolic("x^(n+1)"));                   // "(n+1)"
 * ```
 */

import { UnsupportedOperationError } from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import { tokenize } from "@symcalc/parser";

export interface NumericTerm {
  readonly kind: "numeric";
  readonly value: BigDecimal;
}

export interface SymbolicTerm {
  readonly kind: "symbolic";
  readonly text: string;
}

export type Term = NumericTerm | SymbolicTerm;

export function numeric(value: BigDecimal): NumericTerm {
  return { kind: "numeric", value };
}

export function symbolic(text: string): SymbolicTerm {
  return { kind: "symbolic", text };
}

export function isNumeric(term: Term): term is NumericTerm {
  return term.kind === "numeric";
}

export function isSymbolic(term: Term): term is SymbolicTerm {
  return term.kind === "symbolic";
}

export const ZERO_TERM: NumericTerm = numeric(BigDecOps.ZERO);
export const ONE_TERM: NumericTerm = numeric(BigDecOps.ONE);

/**
 * Render a term as expression text. With `precision`, numbers are rounded
 * half-up to that many significant digits first; empty text reads as `"0"`.
 */
export function renderTerm(term: Term, precision?: number): string {
  if (term.kind === "symbolic") {
    return stripParens(term.text) === "" ? "0" : term.text;
  }
  const value =
    precision === undefined ? term.value : BigDecOps.roundSignificant(term.value, precision);
  return BigDecOps.toString(value);
}

/**
 * Sign of a term. Symbolic text is negative when it starts with `-` once
 * its outer parentheses are removed.
 */
export function termSign(term: Term): -1 | 0 | 1 {
  if (term.kind === "numeric") {
    return BigDecOps.signum(term.value);
  }
  const text = stripParens(term.text);
  if (text === "") return 0;
  return text.startsWith("-") ? -1 : 1;
}

/**
 * Whether a term is zero: numbers within `epsilon` of zero, or empty text.
 */
export function isZeroTerm(term: Term, epsilon = 0): boolean {
  if (term.kind === "symbolic") {
    return stripParens(term.text) === "";
  }
  return BigDecOps.toNumber(BigDecOps.abs(term.value)) <= epsilon;
}

export function termToNumber(term: Term): number {
  if (term.kind === "symbolic") {
    throw new UnsupportedOperationError("convert to a number", `'${term.text}' is symbolic`);
  }
  return BigDecOps.toNumber(term.value);
}

/**
 * First name in a term's text that is not being called.
 */
export function freeVariableOf(term: Term): string | undefined {
  if (term.kind === "numeric") return undefined;
  const tokens = tokenize(term.text);
  return tokens.find((t, i) => t.kind === "identifier" && tokens[i + 1]?.kind !== "lparen")
    ?.text;
}

/**
 * Exponent text after the first top-level `^`, or `"1"` when there is none.
 */
export function exponentOf(term: Term): string {
  if (term.kind === "numeric") return "1";
  const text = stripParens(term.text);

  let level = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(") level++;
    else if (ch === ")") level--;
    else if (ch === "^" && level === 0) {
      return readOperand(text, i + 1);
    }
  }
  return "1";
}

function readOperand(text: string, start: number): string {
  if (text[start] === "(") {
    const close = matchingParen(text, start);
    return text.slice(start, close + 1);
  }
  const match = /^-?[A-Za-z0-9_.]+/.exec(text.slice(start));
  return match ? match[0] : "1";
}

// ============================================================================
// Parentheses
// ============================================================================

function matchingParen(text: string, open: number): number {
  let level = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === "(") level++;
    else if (text[i] === ")") {
      level--;
      if (level === 0) return i;
    }
  }
  return text.length - 1;
}

/**
 * Whether the whole text is one parenthesized group: `(a+b)` but not `(a)+(b)`.
 */
export function isWrapped(text: string): boolean {
  return text.startsWith("(") && matchingParen(text, 0) === text.length - 1;
}

export function parenthesize(text: string): string {
  return isWrapped(text) ? text : `(${text})`;
}

/**
 * Remove redundant outer parentheses.
 */
export function stripParens(text: string): string {
  let result = text;
  while (result.length >= 2 && isWrapped(result)) {
    result = result.slice(1, -1);
  }
  return result;
}
