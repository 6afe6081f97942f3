/**
 * Symbolic Differentiation
 *
 * Computes derivatives structurally over the AST: sum, product, quotient,
 * power and chain rules, a fixed table for the trigonometric, hyperbolic
 * and logarithmic natives, and inlining of user functions.
 *
 * @example
 * ```typescript
 * toText(derivative(parse("x^3"), "x", ctx));     // "3*x^2"
 * toText(derivative(parse("sin(2x)"), "x", ctx)); // "cos(2x)*2"
 * ```
 */

import { ArityError, UnsupportedOperationError, unreachable } from "@symcalc/core";
import { BigDecOps } from "@symcalc/math";
import {
  ONE,
  TWO,
  ZERO,
  add,
  call,
  const_,
  div,
  hasVariable,
  isLiteral,
  isLiteralValue,
  mul,
  neg,
  parse,
  pow,
  sub,
  substitute,
  type AstNode,
  type BinaryNode,
  type CallNode,
} from "@symcalc/parser";
import type { Context } from "../context.js";

/**
 * Derivatives of single-argument natives in terms of their argument `u`;
 * the chain rule multiplies by `u'`.
 */
const DERIVATIVE_TABLE: Readonly<Record<string, string>> = {
  sin: "cos(u)",
  cos: "-sin(u)",
  tan: "sec(u)^2",
  cot: "-csc(u)^2",
  sec: "sec(u)*tan(u)",
  csc: "-csc(u)*cot(u)",
  asin: "1/sqrt(1-u^2)",
  acos: "-1/sqrt(1-u^2)",
  atan: "1/(u^2+1)",
  acot: "-1/(u^2+1)",
  asec: "1/(abs(u)*sqrt(u^2-1))",
  acsc: "-1/(abs(u)*sqrt(u^2-1))",
  sinh: "cosh(u)",
  cosh: "sinh(u)",
  tanh: "1-tanh(u)^2",
  ln: "1/u",
  log: "1/(u*ln(10))",
  sqrt: "1/(2sqrt(u))",
};

const templates = new Map<string, AstNode>();

function template(name: string): AstNode | undefined {
  const source = DERIVATIVE_TABLE[name];
  if (source === undefined) return undefined;
  let tree = templates.get(name);
  if (!tree) {
    tree = parse(source);
    templates.set(name, tree);
  }
  return tree;
}

/**
 * Differentiate `node` with respect to `wrt`. User functions are looked up
 * in `context` and differentiated through their bodies.
 *
 * @throws UnsupportedOperationError for natives without a derivative rule,
 *   comparisons, and non-value nodes
 */
export function derivative(node: AstNode, wrt: string, context: Context): AstNode {
  return diffNode(node, wrt, context);
}

/**
 * Differentiate `n` times.
 */
export function nthDerivative(node: AstNode, wrt: string, n: number, context: Context): AstNode {
  let result = node;
  for (let i = 0; i < n; i++) {
    result = derivative(result, wrt, context);
  }
  return result;
}

function diffNode(node: AstNode, v: string, ctx: Context): AstNode {
  switch (node.kind) {
    case "literal":
    case "space":
      return ZERO;

    case "variable":
      return node.name === v ? ONE : ZERO;

    case "unary": {
      const inner = diffNode(node.operand, v, ctx);
      return node.sign === "negative" ? simplifyNeg(inner) : inner;
    }

    case "binary":
      return diffBinary(node, v, ctx);

    case "call":
      return diffCall(node, v, ctx);

    case "definition":
    case "vector":
    case "matrix":
      throw new UnsupportedOperationError("differentiate", `a ${node.kind} is not a value`);

    default:
      return unreachable(node);
  }
}

function diffBinary(node: BinaryNode, v: string, ctx: Context): AstNode {
  const { left, right } = node;

  switch (node.op) {
    case "PLUS":
    case "PEQUAL":
      return simplifyAdd(diffNode(left, v, ctx), diffNode(right, v, ctx));

    case "MINUS":
      return simplifySub(diffNode(left, v, ctx), diffNode(right, v, ctx));

    case "MULT":
      return diffProduct(left, right, v, ctx);

    case "DIV": {
      if (!hasVariable(right, v)) {
        return simplifyDiv(diffNode(left, v, ctx), right);
      }
      // (f'g - fg') / g^2
      return simplifyDiv(
        simplifySub(
          simplifyMul(diffNode(left, v, ctx), right),
          simplifyMul(left, diffNode(right, v, ctx))
        ),
        pow(right, TWO)
      );
    }

    case "EXP":
      return diffPower(left, right, v, ctx);

    case "GT":
    case "LT":
    case "GTE":
    case "LTE":
    case "NEQ":
    case "EQUAL":
      throw new UnsupportedOperationError("differentiate", "comparisons have no derivative");

    default:
      return unreachable(node.op);
  }
}

function diffProduct(left: AstNode, right: AstNode, v: string, ctx: Context): AstNode {
  const leftVaries = hasVariable(left, v);
  const rightVaries = hasVariable(right, v);

  if (!leftVaries && !rightVaries) return ZERO;
  // constant factors are pulled out
  if (!leftVaries) return simplifyMul(left, diffNode(right, v, ctx));
  if (!rightVaries) return simplifyMul(diffNode(left, v, ctx), right);

  // x*g -> g + x*g'
  if (left.kind === "variable") {
    return simplifyAdd(right, simplifyMul(left, diffNode(right, v, ctx)));
  }
  if (right.kind === "variable") {
    return simplifyAdd(simplifyMul(diffNode(left, v, ctx), right), left);
  }

  return simplifyAdd(
    simplifyMul(diffNode(left, v, ctx), right),
    simplifyMul(left, diffNode(right, v, ctx))
  );
}

function diffPower(base: AstNode, exponent: AstNode, v: string, ctx: Context): AstNode {
  const baseVaries = hasVariable(base, v);
  const exponentVaries = hasVariable(exponent, v);

  if (!baseVaries && !exponentVaries) {
    return ZERO;
  }

  if (!exponentVaries) {
    // n * u^(n-1) * u'
    return simplifyMul(
      simplifyMul(exponent, simplifyPow(base, reducedExponent(exponent))),
      diffNode(base, v, ctx)
    );
  }

  if (!baseVaries) {
    // a^g * ln(a) * g'
    return simplifyMul(
      simplifyMul(pow(base, exponent), naturalLog(base)),
      diffNode(exponent, v, ctx)
    );
  }

  // f^g * (g' * ln(f) + g * f'/f)
  return simplifyMul(
    pow(base, exponent),
    simplifyAdd(
      simplifyMul(diffNode(exponent, v, ctx), naturalLog(base)),
      simplifyMul(exponent, simplifyDiv(diffNode(base, v, ctx), base))
    )
  );
}

function reducedExponent(exponent: AstNode): AstNode {
  if (isLiteral(exponent)) {
    return const_(BigDecOps.sub(exponent.value, BigDecOps.ONE));
  }
  return sub(exponent, ONE);
}

function naturalLog(base: AstNode): AstNode {
  return base.kind === "variable" && base.name === "e" ? ONE : call("ln", base);
}

function diffCall(node: CallNode, v: string, ctx: Context): AstNode {
  if (!node.args.some((arg) => hasVariable(arg, v))) {
    return ZERO;
  }

  const fn = ctx.lookupFunction(node.name);
  if (fn) {
    if (node.args.length !== fn.params.length) {
      throw new ArityError(fn.name, fn.params.length, node.args.length);
    }
    const replacements: Record<string, AstNode> = {};
    fn.params.forEach((param, i) => {
      replacements[param] = node.args[i];
    });
    return diffNode(substitute(fn.body, replacements), v, ctx);
  }

  const canonical = ctx.lookupNative(node.name)?.name ?? node.name;
  const rule = template(canonical);
  if (!rule) {
    throw new UnsupportedOperationError("differentiate", `no derivative rule for '${node.name}'`);
  }
  if (node.args.length !== 1) {
    throw new ArityError(node.name, 1, node.args.length);
  }

  const [arg] = node.args;
  return simplifyMul(substitute(rule, { u: arg }), diffNode(arg, v, ctx));
}

// ============================================================================
// Simplification Helpers (local to keep derivatives small as they are built)
// ============================================================================

function simplifyAdd(a: AstNode, b: AstNode): AstNode {
  if (isLiteralValue(a, 0)) return b;
  if (isLiteralValue(b, 0)) return a;
  if (isLiteral(a) && isLiteral(b)) {
    return const_(BigDecOps.add(a.value, b.value));
  }
  return add(a, b);
}

function simplifySub(a: AstNode, b: AstNode): AstNode {
  if (isLiteralValue(b, 0)) return a;
  if (isLiteralValue(a, 0)) return simplifyNeg(b);
  if (isLiteral(a) && isLiteral(b)) {
    return const_(BigDecOps.sub(a.value, b.value));
  }
  return sub(a, b);
}

function simplifyMul(a: AstNode, b: AstNode): AstNode {
  if (isLiteralValue(a, 0) || isLiteralValue(b, 0)) return ZERO;
  if (isLiteralValue(a, 1)) return b;
  if (isLiteralValue(b, 1)) return a;
  if (isLiteral(a) && isLiteral(b)) {
    return const_(BigDecOps.mul(a.value, b.value));
  }
  return mul(a, b);
}

function simplifyDiv(a: AstNode, b: AstNode): AstNode {
  if (isLiteralValue(a, 0)) return ZERO;
  if (isLiteralValue(b, 1)) return a;
  return div(a, b);
}

function simplifyPow(base: AstNode, exponent: AstNode): AstNode {
  if (isLiteralValue(exponent, 0)) return ONE;
  if (isLiteralValue(exponent, 1)) return base;
  return pow(base, exponent);
}

function simplifyNeg(a: AstNode): AstNode {
  if (isLiteral(a)) {
    return const_(BigDecOps.negate(a.value));
  }
  if (a.kind === "unary" && a.sign === "negative") {
    return a.operand;
  }
  return neg(a);
}
