/**
 * AST Builders
 *
 * Factory functions for constructing nodes without going through the parser.
 *
 * @example
 * ```typescript
 * const x = var_("x");
 * const expr = add(mul(const_(2), x), const_(1)); // 2*x+1
 * ```
 */

import { BigDecOps, type BigDecimal } from "@symcalc/math";
import type { Operator } from "./operators.js";
import type {
  AstNode,
  LiteralNode,
  VariableNode,
  UnaryNode,
  BinaryNode,
  CallNode,
  DefinitionNode,
  VectorNode,
  MatrixNode,
  SpaceNode,
} from "./ast.js";

// ============================================================================
// Literals and Variables
// ============================================================================

/**
 * Create a literal from a decimal, a number or a decimal string.
 */
export function const_(value: BigDecimal | number | string): LiteralNode {
  return {
    kind: "literal",
    value: typeof value === "object" ? value : BigDecOps.bigDecimal(value),
  };
}

/**
 * Create a variable reference.
 *
 * @throws {Error} If name is empty
 */
export function var_(name: string): VariableNode {
  if (name.length === 0) {
    throw new Error("Variable name must be non-empty");
  }
  return { kind: "variable", name };
}

export const ZERO: LiteralNode = const_(BigDecOps.ZERO);
export const ONE: LiteralNode = const_(BigDecOps.ONE);
export const TWO: LiteralNode = const_(2);
export const SPACE: SpaceNode = { kind: "space" };

// ============================================================================
// Operators
// ============================================================================

export function binary(op: Operator, left: AstNode, right: AstNode, attached = false): BinaryNode {
  return { kind: "binary", op, left, right, attached };
}

export function add(left: AstNode, right: AstNode): BinaryNode {
  return binary("PLUS", left, right);
}

export function sub(left: AstNode, right: AstNode): BinaryNode {
  return binary("MINUS", left, right);
}

export function mul(left: AstNode, right: AstNode): BinaryNode {
  return binary("MULT", left, right);
}

export function div(left: AstNode, right: AstNode): BinaryNode {
  return binary("DIV", left, right);
}

export function pow(base: AstNode, exponent: AstNode): BinaryNode {
  return binary("EXP", base, exponent);
}

export function neg(operand: AstNode): UnaryNode {
  return { kind: "unary", sign: "negative", operand };
}

// ============================================================================
// Calls, Definitions and Brackets
// ============================================================================

export function call(name: string, ...args: AstNode[]): CallNode {
  return { kind: "call", name, args };
}

export function definition(
  name: string,
  params: readonly string[],
  body: AstNode,
  source: string
): DefinitionNode {
  return { kind: "definition", name, params, body, source };
}

export function vector(elements: readonly AstNode[]): VectorNode {
  return { kind: "vector", elements };
}

export function matrixNode(rows: readonly VectorNode[]): MatrixNode {
  return { kind: "matrix", rows };
}
