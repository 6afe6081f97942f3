/**
 * Series Summation
 *
 * `sum(expr)` adds `expr` at index 0, 1, 2, ... until terms stay below the
 * zero epsilon and leave the partial sum unchanged at the working precision.
 * The index is the expression's single unbound variable.
 *
 * @example
 * ```typescript
 * session.evaluate("sum(1/2^n)");    // 2
 * session.evaluate("sum(n/2^n)");    // 2
 * session.evaluate("sum(1/fac(k))"); // ≈ e
 * ```
 */

import {
  ArityError,
  ConvergenceError,
  UnknownIdentifierError,
  UnsupportedOperationError,
} from "@symcalc/core";
import { BigDecOps } from "@symcalc/math";
import { call, const_, freeVariables, toText } from "@symcalc/parser";
import type { SpecialFormCall } from "../context.js";
import { ZERO_TERM, numeric, symbolic, type Term } from "../term.js";

/** Consecutive negligible terms, after the first, that end the sum */
const SETTLE_STEPS = 2;

export function sumSeries({ name, args, context, state, evaluate }: SpecialFormCall): Term {
  if (args.length !== 1) {
    throw new ArityError(name, 1, args.length);
  }
  const [body] = args;
  const { zeroEpsilon, seriesMaxTerms } = state.settings;
  const log = state.log;

  const unbound = [...freeVariables(body)].filter((v) => !context.isBound(v));

  if (unbound.length === 0) {
    const value = evaluate(body, context, state);
    if (value.kind === "symbolic") {
      return symbolic(`${name}(${toText(body)})`);
    }
    if (Math.abs(BigDecOps.toNumber(value.value)) <= zeroEpsilon) {
      return ZERO_TERM;
    }
    throw new ConvergenceError("series", seriesMaxTerms);
  }
  if (unbound.length > 1) {
    throw new UnknownIdentifierError(
      unbound[0],
      `A series needs exactly one free variable, found ${unbound.join(", ")}`
    );
  }

  const [index] = unbound;
  const scope = context.createChild();
  const helper = scope.synthesizeFunction([index], body);
  log.debug(`summing ${helper.source} over ${index}`);

  let total = BigDecOps.ZERO;
  let settled = 0;
  for (let n = 0; n < seriesMaxTerms; n++) {
    const term = evaluate(call(helper.name, const_(n)), scope, state);
    if (term.kind === "symbolic") {
      throw new UnsupportedOperationError("sum", `term ${n} is symbolic: ${term.text}`);
    }
    const before = BigDecOps.roundSignificant(total, state.precision);
    total = BigDecOps.add(total, term.value);

    const small = Math.abs(BigDecOps.toNumber(term.value)) < zeroEpsilon;
    const unchanged = BigDecOps.equals(BigDecOps.roundSignificant(total, state.precision), before);
    settled = n > 0 && small && unchanged ? settled + 1 : 0;
    if (settled >= SETTLE_STEPS) {
      log.debug(`series converged after ${n + 1} terms`);
      return numeric(total);
    }
  }
  throw new ConvergenceError("series", seriesMaxTerms);
}
