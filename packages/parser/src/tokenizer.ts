/**
 * Tokenizer
 *
 * Splits expression text into tokens. Whitespace runs are kept as a single
 * `space` token: adjacency decides implicit multiplication, and spaces
 * separate elements inside square brackets.
 *
 * @example
 * ```typescript
 * tokenize("2x + 1").map((t) => t.text); // ["2", "x", " ", "+", " ", "1"]
 * ```
 */

import { LexicalError } from "@symcalc/core";
import { OPERATOR_SYMBOLS } from "./operators.js";

export type TokenKind =
  | "number"
  | "identifier"
  | "operator"
  | "lparen"
  | "rparen"
  | "lbracket"
  | "rbracket"
  | "comma"
  | "equals"
  | "space";

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** Zero-based offset of the first character in the source */
  readonly offset: number;
}

const NUMBER = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const WHITESPACE = /\s+/y;

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  "(": "lparen",
  ")": "rparen",
  "[": "lbracket",
  "]": "rbracket",
  ",": "comma",
};

function matchAt(pattern: RegExp, input: string, pos: number): string | undefined {
  pattern.lastIndex = pos;
  const match = pattern.exec(input);
  return match ? match[0] : undefined;
}

/**
 * Tokenize expression text.
 *
 * @throws LexicalError on any character outside the expression alphabet
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input[pos];

    const space = matchAt(WHITESPACE, input, pos);
    if (space !== undefined) {
      tokens.push({ kind: "space", text: " ", offset: pos });
      pos += space.length;
      continue;
    }

    const number = matchAt(NUMBER, input, pos);
    if (number !== undefined) {
      tokens.push({ kind: "number", text: number, offset: pos });
      pos += number.length;
      continue;
    }

    const identifier = matchAt(IDENTIFIER, input, pos);
    if (identifier !== undefined) {
      tokens.push({ kind: "identifier", text: identifier, offset: pos });
      pos += identifier.length;
      continue;
    }

    const symbol = OPERATOR_SYMBOLS.find((s) => input.startsWith(s, pos));
    if (symbol !== undefined) {
      tokens.push({ kind: "operator", text: symbol, offset: pos });
      pos += symbol.length;
      continue;
    }

    if (ch === "=") {
      tokens.push({ kind: "equals", text: ch, offset: pos });
      pos++;
      continue;
    }

    const punctuation = PUNCTUATION[ch];
    if (punctuation !== undefined) {
      tokens.push({ kind: punctuation, text: ch, offset: pos });
      pos++;
      continue;
    }

    throw new LexicalError(pos, ch);
  }

  return tokens;
}
