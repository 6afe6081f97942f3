/**
 * Root Finding
 *
 * Newton-Raphson over helper functions synthesized for the expression and
 * its derivative. A doubling bracket search from ±1 picks the seeds; roots
 * already found are divided out of later iterations (deflation) so each
 * seed can converge to a new one. Each root is then polished against the
 * undeflated expression, which also settles repeated roots that plain
 * Newton only approaches linearly.
 */

import {
  ConvergenceError,
  DivisionError,
  DomainError,
  UnsupportedOperationError,
  createLogger,
  type EngineSettings,
} from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import { call, children, const_, isLiteral, type AstNode } from "@symcalc/parser";
import type { Context, FunctionDefinition } from "../context.js";
import { evaluate } from "../eval.js";
import { simplify } from "../simplify/simplify.js";
import { derivative } from "./diff.js";

/**
 * How many roots to look for: the degree in `variable` when `node` is a
 * polynomial in it (`(x-1)(x-2)` is 2), otherwise the largest literal
 * exponent on a non-literal base. At least 1.
 */
export function polynomialDegree(node: AstNode, variable: string): number {
  return Math.max(1, degreeIn(node, variable) ?? largestExponent(node));
}

function degreeIn(node: AstNode, variable: string): number | undefined {
  switch (node.kind) {
    case "literal":
      return 0;
    case "variable":
      return node.name === variable ? 1 : 0;
    case "unary":
      return degreeIn(node.operand, variable);
    case "binary": {
      const left = degreeIn(node.left, variable);
      const right = degreeIn(node.right, variable);
      if (left === undefined || right === undefined) return undefined;
      switch (node.op) {
        case "MULT":
          return left + right;
        case "DIV":
          return right === 0 ? left : undefined;
        case "EXP": {
          if (right !== 0) return undefined;
          if (left === 0) return 0;
          const n = isLiteral(node.right) ? BigDecOps.toNumber(node.right.value) : Number.NaN;
          return Number.isInteger(n) && n >= 0 ? left * n : undefined;
        }
        default:
          return Math.max(left, right);
      }
    }
    case "call":
      return node.args.every((a) => degreeIn(a, variable) === 0) ? 0 : undefined;
    default:
      return undefined;
  }
}

function largestExponent(node: AstNode): number {
  let degree = 1;
  const visit = (n: AstNode): void => {
    if (n.kind === "binary" && n.op === "EXP" && !isLiteral(n.left) && isLiteral(n.right)) {
      degree = Math.max(degree, Math.floor(BigDecOps.toNumber(n.right.value)));
    }
    children(n).forEach(visit);
  };
  visit(node);
  return degree;
}

/**
 * Find the real roots of `node` in `variable`, in ascending order, rounded
 * to `settings.precision` significant digits.
 *
 * @throws ConvergenceError when no root is found
 * @throws UnsupportedOperationError when other variables are left unbound
 */
export function findRoots(
  node: AstNode,
  variable: string,
  context: Context,
  settings: EngineSettings
): BigDecimal[] {
  const log = createLogger("roots", settings.debug);
  const { newtonTolerance: tolerance, maxIterations } = settings;

  const scope = context.createChild();
  const f = sampler(scope.synthesizeFunction([variable], node), scope, settings, variable);
  const slope = sampler(
    scope.synthesizeFunction([variable], simplify(derivative(node, variable, scope))),
    scope,
    settings,
    variable
  );
  const degree = polynomialDegree(node, variable);
  const roots: number[] = [];
  const close = (a: number, b: number): boolean =>
    Math.abs(a - b) < tolerance * Math.max(1, Math.abs(a));

  const newton = (seed: number): number | undefined => {
    let x = seed;
    let step = Number.POSITIVE_INFINITY;
    for (let i = 0; i < maxIterations; i++) {
      const fx = f(x);
      if (!Number.isFinite(fx)) return undefined;
      if (Math.abs(fx) < tolerance && close(x, x - step)) return x;

      const deflation = roots.reduce((sum, r) => sum + 1 / (x - r), 0);
      const dfx = slope(x) - fx * deflation;
      if (!Number.isFinite(dfx) || dfx === 0) return undefined;
      step = fx / dfx;
      x -= step;
    }
    return undefined;
  };

  // Newton on the undeflated expression until the step no longer moves x
  const reach = Math.sqrt(tolerance);
  const polish = (start: number): number => {
    let x = start;
    for (let i = 0; i < maxIterations; i++) {
      const fx = f(x);
      if (fx === 0) break;
      const dfx = slope(x);
      if (!Number.isFinite(dfx) || dfx === 0) break;
      const next = x - fx / dfx;
      if (!Number.isFinite(next) || next === x) break;
      if (Math.abs(next - start) > reach * Math.max(1, Math.abs(start))) break;
      x = next;
    }
    return x;
  };

  for (const seed of bracketSeeds(f, maxIterations)) {
    if (roots.length >= degree) break;
    const candidate = newton(seed);
    if (candidate === undefined) continue;
    const root = polish(candidate);
    if (roots.some((r) => close(r, root))) continue;
    log.debug(`root ${root} from seed ${seed}`);
    roots.push(root);
  }

  if (roots.length === 0) {
    throw new ConvergenceError("root finding", maxIterations);
  }

  return roots
    .sort((a, b) => a - b)
    .map((r) => (Math.abs(r) < tolerance * tolerance ? 0 : r))
    .map((r) => BigDecOps.normalize(BigDecOps.roundSignificant(BigDecOps.fromNumber(r), settings.precision)));
}

/**
 * Double `[-b, b]` from `b = 1` until either end differs in sign from f(0),
 * then seed from the bracket ends, their halves and doubles, and zero.
 */
function bracketSeeds(f: (x: number) => number, maxIterations: number): number[] {
  const origin = Math.sign(f(0));
  let bound = 1;
  for (let i = 0; i < maxIterations; i++) {
    const lo = Math.sign(f(-bound));
    const hi = Math.sign(f(bound));
    if ((!Number.isNaN(lo) && lo !== origin) || (!Number.isNaN(hi) && hi !== origin)) break;
    bound *= 2;
  }
  const seeds = [-bound, bound, 0, -bound / 2, bound / 2, -2 * bound, 2 * bound, -1, 1];
  return [...new Set(seeds)];
}

/**
 * Numeric view of a one-parameter helper. Points outside the domain read
 * as NaN.
 */
function sampler(
  fn: FunctionDefinition,
  scope: Context,
  settings: EngineSettings,
  variable: string
): (x: number) => number {
  return (x) => {
    try {
      const term = evaluate(call(fn.name, const_(x)), scope, settings);
      if (term.kind === "symbolic") {
        throw new UnsupportedOperationError(
          "find roots",
          `'${term.text}' depends on variables other than ${variable}`
        );
      }
      return BigDecOps.toNumber(term.value);
    } catch (e) {
      if (e instanceof DomainError || e instanceof DivisionError) {
        return Number.NaN;
      }
      throw e;
    }
  };
}
