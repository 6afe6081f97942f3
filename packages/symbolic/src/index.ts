/**
 * @symcalc/symbolic
 *
 * @example
 * ```typescript
 * import { Context, evaluate, derivative, simplify } from "@symcalc/symbolic";
 * import { parse, toText } from "@symcalc/parser";
 *
 * const ctx = new Context();
 * ctx.addFunction("f(x) = x^2 + 1");
 * evaluate(parse("f(3)"), ctx, settings);                   // numeric 10
 * toText(simplify(derivative(parse("f(x)"), "x", ctx)));   // "2x"
 * ```
 */

// Values
export * from "./term.js";
export * from "./state.js";

// Scope and built-ins
export * from "./natives.js";
export * from "./context.js";

// Evaluation
export * from "./eval.js";

// Simplification
export * from "./simplify/simplify.js";

// Calculus
export * from "./calculus/diff.js";
export * from "./calculus/integrate.js";
export * from "./calculus/roots.js";
export * from "./calculus/series.js";
