/**
 * Symbolic Integration
 *
 * A narrow antiderivative: constants, the variable itself, sums and
 * differences, powers of the variable, and products or quotients with a
 * constant factor. Other products are integrated factor by factor, which
 * is only correct when one factor is constant.
 *
 * @example
 * ```typescript
 * toText(integrate(parse("x^2"), "x"));  // "x^3/3"
 * toText(integrate(parse("3x+1"), "x")); // "3(x^2/2)+1x"
 * ```
 */

import { UnsupportedOperationError } from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import {
  TWO,
  add,
  binary,
  const_,
  div,
  hasVariable,
  isLiteral,
  mul,
  neg,
  pow,
  sub,
  var_,
  type AstNode,
} from "@symcalc/parser";

/**
 * Result of an integration attempt.
 */
export type IntegrationResult =
  | { success: true; result: AstNode }
  | { success: false; reason: string };

/**
 * Attempt to integrate, reporting an unsupported shape instead of throwing.
 */
export function tryIntegrate(node: AstNode, variable: string): IntegrationResult {
  try {
    return { success: true, result: integrateNode(node, variable) };
  } catch (e) {
    if (e instanceof UnsupportedOperationError) {
      return { success: false, reason: e.detail };
    }
    throw e;
  }
}

/**
 * Compute an antiderivative of `node` with respect to `variable`.
 *
 * @throws UnsupportedOperationError for shapes outside the supported rules
 */
export function integrate(node: AstNode, variable: string): AstNode {
  const result = tryIntegrate(node, variable);
  if (!result.success) {
    throw new UnsupportedOperationError("integrate", result.reason);
  }
  return result.result;
}

function integrateNode(node: AstNode, v: string): AstNode {
  if (!hasVariable(node, v)) {
    if (node.kind === "definition" || node.kind === "vector" || node.kind === "matrix") {
      throw new UnsupportedOperationError("integrate", `a ${node.kind} is not a value`);
    }
    // c -> c*x
    return binary("MULT", node, var_(v), true);
  }

  switch (node.kind) {
    case "variable":
      return div(pow(node, TWO), TWO);

    case "unary": {
      const inner = integrateNode(node.operand, v);
      return node.sign === "negative" ? neg(inner) : inner;
    }

    case "binary":
      switch (node.op) {
        case "PLUS":
        case "PEQUAL":
          return add(integrateNode(node.left, v), integrateNode(node.right, v));
        case "MINUS":
          return sub(integrateNode(node.left, v), integrateNode(node.right, v));
        case "MULT":
          return integrateProduct(node.left, node.right, v);
        case "DIV":
          if (!hasVariable(node.right, v)) {
            return div(integrateNode(node.left, v), node.right);
          }
          throw new UnsupportedOperationError("integrate", "the divisor depends on the variable");
        case "EXP":
          return integratePower(node.left, node.right, v);
        default:
          throw new UnsupportedOperationError("integrate", "comparisons have no antiderivative");
      }

    default:
      throw new UnsupportedOperationError(
        "integrate",
        `no rule for a ${node.kind} that depends on '${v}'`
      );
  }
}

function integrateProduct(left: AstNode, right: AstNode, v: string): AstNode {
  if (!hasVariable(left, v)) {
    return binary("MULT", left, integrateNode(right, v), true);
  }
  if (!hasVariable(right, v)) {
    return binary("MULT", right, integrateNode(left, v), true);
  }
  // termwise; exact only when one side is constant
  return mul(integrateNode(left, v), integrateNode(right, v));
}

function integratePower(base: AstNode, exponent: AstNode, v: string): AstNode {
  if (!(base.kind === "variable" && base.name === v) || hasVariable(exponent, v)) {
    throw new UnsupportedOperationError("integrate", "only powers of the variable are supported");
  }
  const n = literalValue(exponent);
  if (n !== undefined && BigDecOps.equals(n, BigDecOps.bigDecimal(-1))) {
    throw new UnsupportedOperationError("integrate", `${v}^-1 has no power-rule antiderivative`);
  }

  // x^n -> x^(n+1)/(n+1)
  const raised =
    n !== undefined ? const_(BigDecOps.add(n, BigDecOps.ONE)) : add(exponent, const_(1));
  return div(pow(base, raised), raised);
}

/** Value of a literal, or of a signed literal such as `-2`. */
function literalValue(node: AstNode): BigDecimal | undefined {
  if (isLiteral(node)) return node.value;
  if (node.kind === "unary") {
    const inner = literalValue(node.operand);
    if (inner === undefined) return undefined;
    return node.sign === "negative" ? BigDecOps.negate(inner) : inner;
  }
  return undefined;
}
