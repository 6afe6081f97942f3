/**
 * Abstract Syntax Tree
 *
 * A closed union of immutable nodes discriminated by `kind`. Rewrites build
 * new nodes; nodes carry no parent pointers, so traversals that care about
 * the enclosing operator receive it as a parameter.
 *
 * @example
 * ```typescript
 * const tree = parse("2x + y");
 * freeVariables(tree);                         // Set { "x", "y" }
 * toText(substitute(tree, { y: const_(3) }));  // "2x+3"
 * ```
 */

import { unreachable } from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import { OPERATORS, type Operator } from "./operators.js";

// ============================================================================
// AST Node Types
// ============================================================================

/** A decimal literal. */
export interface LiteralNode {
  readonly kind: "literal";
  readonly value: BigDecimal;
}

/** A named variable or constant. */
export interface VariableNode {
  readonly kind: "variable";
  readonly name: string;
}

export type Sign = "positive" | "negative";

/** A leading `+` or `-`. */
export interface UnaryNode {
  readonly kind: "unary";
  readonly sign: Sign;
  readonly operand: AstNode;
}

/**
 * A binary operation. `attached` marks a product written by adjacency
 * (`2x`, `3(y+1)`), which renders without the `*` sign.
 */
export interface BinaryNode {
  readonly kind: "binary";
  readonly op: Operator;
  readonly left: AstNode;
  readonly right: AstNode;
  readonly attached: boolean;
}

/** A function application `name(arg, ...)`. */
export interface CallNode {
  readonly kind: "call";
  readonly name: string;
  readonly args: readonly AstNode[];
}

/** A function definition `name(p1, p2) = body`. */
export interface DefinitionNode {
  readonly kind: "definition";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: AstNode;
  /** Source text of the definition */
  readonly source: string;
}

/** A bracketed list `[a b c]`. */
export interface VectorNode {
  readonly kind: "vector";
  readonly elements: readonly AstNode[];
}

/** Adjacent bracket groups `[a b][c d]`, one vector per row. */
export interface MatrixNode {
  readonly kind: "matrix";
  readonly rows: readonly VectorNode[];
}

/** Empty input; evaluates to zero. */
export interface SpaceNode {
  readonly kind: "space";
}

export type AstNode =
  | LiteralNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | CallNode
  | DefinitionNode
  | VectorNode
  | MatrixNode
  | SpaceNode;

export type NodeKind = AstNode["kind"];

// ============================================================================
// Type Guards
// ============================================================================

export function isLiteral(node: AstNode): node is LiteralNode {
  return node.kind === "literal";
}

export function isVariable(node: AstNode): node is VariableNode {
  return node.kind === "variable";
}

export function isBinary<O extends Operator = Operator>(
  node: AstNode,
  op?: O
): node is BinaryNode & { readonly op: O } {
  return node.kind === "binary" && (op === undefined || node.op === op);
}

export function isCall(node: AstNode): node is CallNode {
  return node.kind === "call";
}

/**
 * Check if a node is a literal with a specific value.
 */
export function isLiteralValue(node: AstNode, value: number): boolean {
  return isLiteral(node) && BigDecOps.equals(node.value, BigDecOps.bigDecimal(value));
}

// ============================================================================
// Node Inspection
// ============================================================================

/**
 * The generic "value" of a node: literal digits, a name, an operator
 * symbol, a sign, an element count, or a single space.
 */
export function nodeValue(node: AstNode): string {
  switch (node.kind) {
    case "literal":
      return BigDecOps.toString(node.value);
    case "variable":
    case "call":
    case "definition":
      return node.name;
    case "unary":
      return node.sign === "negative" ? "-" : "+";
    case "binary":
      return OPERATORS[node.op].symbol;
    case "vector":
      return String(node.elements.length);
    case "matrix":
      return String(node.rows.length);
    case "space":
      return " ";
    default:
      return unreachable(node);
  }
}

/**
 * Direct children in evaluation order.
 */
export function children(node: AstNode): readonly AstNode[] {
  switch (node.kind) {
    case "literal":
    case "variable":
    case "space":
      return [];
    case "unary":
      return [node.operand];
    case "binary":
      return [node.left, node.right];
    case "call":
      return node.args;
    case "definition":
      return [node.body];
    case "vector":
      return node.elements;
    case "matrix":
      return node.rows;
    default:
      return unreachable(node);
  }
}

// ============================================================================
// Variable Traversal
// ============================================================================

/**
 * Collect free variable names in first-appearance order. Function names are
 * not variables, and a definition's parameters are bound in its body.
 */
export function freeVariables(node: AstNode): Set<string> {
  const vars = new Set<string>();

  function collect(n: AstNode, bound: ReadonlySet<string>): void {
    if (n.kind === "variable") {
      if (!bound.has(n.name)) vars.add(n.name);
      return;
    }
    if (n.kind === "definition") {
      collect(n.body, new Set([...bound, ...n.params]));
      return;
    }
    for (const child of children(n)) {
      collect(child, bound);
    }
  }

  collect(node, new Set());
  return vars;
}

/**
 * Check if a node mentions a specific free variable.
 * Short-circuits on the first match.
 */
export function hasVariable(node: AstNode, name: string): boolean {
  switch (node.kind) {
    case "variable":
      return node.name === name;
    case "definition":
      return !node.params.includes(name) && hasVariable(node.body, name);
    default:
      return children(node).some((child) => hasVariable(child, name));
  }
}

/**
 * Replace free variables structurally. Names without a replacement are kept.
 */
export function substitute(node: AstNode, replacements: Readonly<Record<string, AstNode>>): AstNode {
  const lookup = (name: string): AstNode | undefined =>
    Object.prototype.hasOwnProperty.call(replacements, name) ? replacements[name] : undefined;

  function walk(n: AstNode, bound: ReadonlySet<string>): AstNode {
    switch (n.kind) {
      case "literal":
      case "space":
        return n;
      case "variable":
        return bound.has(n.name) ? n : (lookup(n.name) ?? n);
      case "unary":
        return { ...n, operand: walk(n.operand, bound) };
      case "binary":
        return { ...n, left: walk(n.left, bound), right: walk(n.right, bound) };
      case "call":
        return { ...n, args: n.args.map((a) => walk(a, bound)) };
      case "definition":
        return { ...n, body: walk(n.body, new Set([...bound, ...n.params])) };
      case "vector":
        return { ...n, elements: n.elements.map((e) => walk(e, bound)) };
      case "matrix":
        return {
          ...n,
          rows: n.rows.map((r) => ({ ...r, elements: r.elements.map((e) => walk(e, bound)) })),
        };
      default:
        return unreachable(n);
    }
  }

  return walk(node, new Set());
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Count the depth of the tree.
 */
export function depth(node: AstNode): number {
  const nested = children(node);
  return 1 + (nested.length === 0 ? 0 : Math.max(...nested.map(depth)));
}

/**
 * Count the number of nodes in the tree.
 */
export function nodeCount(node: AstNode): number {
  return children(node).reduce((sum, child) => sum + nodeCount(child), 1);
}
