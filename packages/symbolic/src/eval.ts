/**
 * Expression Evaluation
 *
 * Evaluates an AST to a Term. Numbers are combined with exact decimal
 * arithmetic; once an operand is symbolic the result becomes expression
 * text instead, so a partly bound expression still evaluates.
 *
 * @example
 * ```typescript
 * const ctx = new Context();
 * evaluate(parse("2+3*4"), ctx, settings);  // numeric 14
 * evaluate(parse("2*x+1"), ctx, settings);  // symbolic "((2x)+1)"
 * ```
 */

import {
  ArityError,
  DivisionError,
  DomainError,
  UnknownIdentifierError,
  UnsupportedOperationError,
  unreachable,
  type EngineSettings,
} from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import {
  OPERATORS,
  canJoin,
  type AstNode,
  type BinaryNode,
  type CallNode,
  type Operator,
} from "@symcalc/parser";
import type { Context, FunctionDefinition } from "./context.js";
import { invokeNative, type NativeFunction } from "./natives.js";
import { createEvaluationState, type EvaluationState } from "./state.js";
import {
  ZERO_TERM,
  numeric,
  parenthesize,
  renderTerm,
  stripParens,
  symbolic,
  type Term,
} from "./term.js";

/** Integer exponents above this are computed in floating point. */
const MAX_EXACT_EXPONENT = 10_000;

/**
 * Evaluate a node. Pass `state` to share a precision raise across several
 * evaluations or to read the final precision afterwards.
 *
 * @throws DivisionError, DomainError, ArityError, UnknownIdentifierError,
 *   UnsupportedOperationError
 */
export function evaluate(
  node: AstNode,
  context: Context,
  settings: EngineSettings,
  state: EvaluationState = createEvaluationState(settings)
): Term {
  return evalNode(node, context, state);
}

function evalNode(node: AstNode, context: Context, state: EvaluationState): Term {
  switch (node.kind) {
    case "literal":
      raisePrecision(node.value, state);
      return numeric(node.value);

    case "variable":
      return context.lookupBinding(node.name) ?? symbolic(node.name);

    case "unary": {
      const operand = evalNode(node.operand, context, state);
      if (node.sign === "positive") return operand;
      return operand.kind === "numeric"
        ? numeric(BigDecOps.negate(operand.value))
        : symbolic(`(-${operand.text})`);
    }

    case "binary":
      return evalBinary(node, context, state);

    case "call":
      return evalCall(node, context, state);

    case "definition":
    case "vector":
    case "matrix":
      throw new UnsupportedOperationError("evaluate", `a ${node.kind} is not a value`);

    case "space":
      return ZERO_TERM;

    default:
      return unreachable(node);
  }
}

function raisePrecision(value: BigDecimal, state: EvaluationState): void {
  const digits = BigDecOps.precisionOf(value);
  if (digits > state.precision) {
    state.log.debug(`raising precision ${state.precision} -> ${digits}`);
    state.precision = digits;
  }
}

// ============================================================================
// Binary operators
// ============================================================================

function evalBinary(node: BinaryNode, context: Context, state: EvaluationState): Term {
  const left = evalNode(node.left, context, state);
  const right = evalNode(node.right, context, state);

  if (left.kind === "numeric" && right.kind === "numeric") {
    return numeric(arithmetic(node.op, left.value, right.value, state));
  }
  return combineSymbolic(node.op, left, right, state);
}

function arithmetic(op: Operator, a: BigDecimal, b: BigDecimal, state: EvaluationState): BigDecimal {
  switch (op) {
    case "PLUS":
    case "PEQUAL":
      return BigDecOps.add(a, b);
    case "MINUS":
      return BigDecOps.sub(a, b);
    case "MULT":
      return BigDecOps.mul(a, b);
    case "DIV":
      if (BigDecOps.isZero(b)) {
        throw new DivisionError();
      }
      return BigDecOps.divide(a, b, state.precision);
    case "EXP":
      return power(a, b, state);
    case "GT":
      return truth(BigDecOps.compare(a, b) > 0);
    case "LT":
      return truth(BigDecOps.compare(a, b) < 0);
    case "GTE":
      return truth(BigDecOps.compare(a, b) >= 0);
    case "LTE":
      return truth(BigDecOps.compare(a, b) <= 0);
    case "NEQ":
      return truth(!BigDecOps.equals(a, b));
    case "EQUAL":
      return truth(BigDecOps.equals(a, b));
    default:
      return unreachable(op);
  }
}

function truth(value: boolean): BigDecimal {
  return value ? BigDecOps.ONE : BigDecOps.ZERO;
}

function power(base: BigDecimal, exponent: BigDecimal, state: EvaluationState): BigDecimal {
  if (BigDecOps.isInteger(exponent)) {
    const n = BigDecOps.integerPart(exponent);
    const magnitude = n < 0n ? -n : n;
    if (magnitude <= BigInt(MAX_EXACT_EXPONENT)) {
      if (n >= 0n) {
        return BigDecOps.pow(base, Number(n));
      }
      if (BigDecOps.isZero(base)) {
        throw new DivisionError("Zero raised to a negative power");
      }
      return BigDecOps.divide(BigDecOps.ONE, BigDecOps.pow(base, Number(magnitude)), state.precision);
    }
  }

  const x = BigDecOps.toNumber(base);
  const result = Math.pow(x, BigDecOps.toNumber(exponent));
  if (!Number.isFinite(result)) {
    throw new DomainError("^", x);
  }
  return BigDecOps.fromNumber(result);
}

/**
 * Join two terms, at least one symbolic, into parenthesized text. Products
 * put a numeric factor first and drop the `*` where the two sides read back
 * as an implicit product.
 */
function combineSymbolic(op: Operator, left: Term, right: Term, state: EvaluationState): Term {
  if (op === "MULT") {
    const [first, second] =
      right.kind === "numeric" && left.kind === "symbolic" ? [right, left] : [left, right];
    const a = operandText(first, state);
    const b = operandText(second, state);
    return symbolic(parenthesize(canJoin(a, b) ? a + b : `${a}*${b}`));
  }

  const symbol = op === "PEQUAL" ? "+" : OPERATORS[op].symbol;
  return symbolic(
    parenthesize(`${operandText(left, state)}${symbol}${operandText(right, state)}`)
  );
}

function operandText(term: Term, state: EvaluationState): string {
  if (term.kind === "symbolic") return term.text;
  const text = renderTerm(term, state.precision);
  return text.startsWith("-") ? `(${text})` : text;
}

// ============================================================================
// Calls
// ============================================================================

function evalCall(node: CallNode, context: Context, state: EvaluationState): Term {
  const fn = context.lookupFunction(node.name);
  if (fn) {
    return callUserFunction(fn, node, context, state);
  }

  const form = context.lookupSpecialForm(node.name);
  if (form) {
    return form({ name: node.name, args: node.args, context, state, evaluate: evalNode });
  }

  const native = context.lookupNative(node.name);
  if (native) {
    return callNative(native, node, context, state);
  }

  throw new UnknownIdentifierError(node.name);
}

function callUserFunction(
  fn: FunctionDefinition,
  node: CallNode,
  context: Context,
  state: EvaluationState
): Term {
  if (node.args.length !== fn.params.length) {
    throw new ArityError(fn.name, fn.params.length, node.args.length);
  }

  const values = node.args.map((arg) => evalNode(arg, context, state));
  const scope = context.createChild();
  fn.params.forEach((param, i) => scope.bind(param, values[i]));
  return evalNode(fn.body, scope, state);
}

function callNative(
  native: NativeFunction,
  node: CallNode,
  context: Context,
  state: EvaluationState
): Term {
  if (node.args.length !== native.arity) {
    throw new ArityError(node.name, native.arity, node.args.length);
  }

  const values = node.args.map((arg) => evalNode(arg, context, state));
  const numbers: BigDecimal[] = [];
  for (const value of values) {
    if (value.kind === "symbolic") {
      const args = values.map((v) => stripParens(renderTerm(v, state.precision)));
      return symbolic(`${node.name}(${args.join(",")})`);
    }
    numbers.push(value.value);
  }
  return numeric(invokeNative(native, node.name, numbers, state.settings));
}
