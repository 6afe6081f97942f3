/**
 * symcalc - A mathematical expression engine
 *
 * Parses arithmetic and algebraic text, evaluates it exactly or
 * symbolically, and differentiates, integrates, simplifies, finds roots and
 * runs small matrix routines on the result.
 *
 * @example
 * ```typescript
 * import { Session } from "symcalc";
 *
 * const session = new Session({ precision: 12 });
 * session.render(session.evaluate("1/3"));          // "0.333333333333"
 * session.render(session.evaluate("2x+1", { x: 3 })); // "7"
 * session.render(session.differentiate("sin(x)", "x")); // "cos(x)"
 *
 * const m = session.parseMatrix("[1 3 5][8 30 2][1 89 2]");
 * session.formatMatrix(session.rowReduce(m)); // "[1 0 0]\n[0 1 0]\n[0 0 1]"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Facade
// ============================================================================

export { Session, type BindingValue } from "./session.js";

// ============================================================================
// Layers
// ============================================================================

export * from "@symcalc/core";
export * from "@symcalc/math";
export * from "@symcalc/parser";
export * from "@symcalc/symbolic";
