/**
 * Plain Text Renderer
 *
 * Converts an AST back to expression text that reads back as an equivalent tree.
 * Products written by adjacency keep their compact form where the two
 * sides cannot merge into a single token.
 *
 * @example
 * ```typescript
 * toText(parse("2x + (y - 1)^2"));                  // "2x+(y-1)^2"
 * toText(parse("2x + (y - 1)^2"), { spaced: true }); // "2x + (y - 1)^2"
 * ```
 */

import { unreachable } from "@symcalc/core";
import { BigDecOps } from "@symcalc/math";
import type { AstNode, BinaryNode } from "./ast.js";
import { ATOM_PRECEDENCE, OPERATORS, UNARY_PRECEDENCE } from "./operators.js";

/**
 * Rendering options for plain text output.
 */
export interface TextOptions {
  /** Surround binary operators other than `^` with spaces (default: false) */
  spaced?: boolean;
}

const defaultOptions: Required<TextOptions> = {
  spaced: false,
};

/**
 * Convert a node to expression text.
 */
export function toText(node: AstNode, options: TextOptions = {}): string {
  const opts = { ...defaultOptions, ...options };
  return render(node, opts, 0);
}

function render(node: AstNode, opts: Required<TextOptions>, parentPrec: number): string {
  const result = renderNode(node, opts);
  if (precedenceOf(node) < parentPrec) {
    return `(${result})`;
  }
  return result;
}

function renderNode(node: AstNode, opts: Required<TextOptions>): string {
  switch (node.kind) {
    case "literal":
      return BigDecOps.toString(node.value);

    case "variable":
      return node.name;

    case "unary":
      return (
        (node.sign === "negative" ? "-" : "+") + render(node.operand, opts, UNARY_PRECEDENCE)
      );

    case "binary":
      return renderBinary(node, opts);

    case "call":
      return `${node.name}(${node.args.map((a) => render(a, opts, 0)).join(",")})`;

    case "definition":
      return `${node.name}(${node.params.join(",")})=${render(node.body, opts, 0)}`;

    case "vector":
      return `[${node.elements.map((e) => render(e, opts, 0)).join(" ")}]`;

    case "matrix":
      return node.rows.map((r) => renderNode(r, opts)).join("");

    case "space":
      return "";

    default:
      return unreachable(node);
  }
}

function renderBinary(node: BinaryNode, opts: Required<TextOptions>): string {
  const { symbol, precedence, associativity } = OPERATORS[node.op];
  const leftPrec = associativity === "right" ? precedence + 0.5 : precedence;
  const rightPrec = associativity === "right" ? precedence : precedence + 0.5;
  const leftStr = render(node.left, opts, leftPrec);
  const rightStr = render(node.right, opts, rightPrec);

  if (node.op === "MULT" && node.attached && canJoin(leftStr, rightStr)) {
    return leftStr + rightStr;
  }
  if (node.op === "EXP" || !opts.spaced) {
    return `${leftStr}${symbol}${rightStr}`;
  }
  return `${leftStr} ${symbol} ${rightStr}`;
}

/**
 * Whether `left` and `right` can be written side by side and still read
 * back as a product: `2x`, `3(y)`, `(a)b`, but not `xy`, `x2y`, `23` or `2e5`.
 */
export function canJoin(left: string, right: string): boolean {
  const endsWithNumber = /(^|[^A-Za-z0-9_.])[0-9.]+$/.test(left);
  return (
    (endsWithNumber || left.endsWith(")")) &&
    /^[A-Za-z_(]/.test(right) &&
    !/^[eE][+-]?\d/.test(right)
  );
}

function precedenceOf(node: AstNode): number {
  switch (node.kind) {
    case "binary":
      return OPERATORS[node.op].precedence;
    case "unary":
      return UNARY_PRECEDENCE;
    case "literal":
      return BigDecOps.isNegative(node.value) ? UNARY_PRECEDENCE : ATOM_PRECEDENCE;
    default:
      return ATOM_PRECEDENCE;
  }
}
