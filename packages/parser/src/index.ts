/**
 * @symcalc/parser
 *
 * @example
 * ```typescript
 * import { parse, toText, freeVariables } from "@symcalc/parser";
 *
 * const tree = parse("3x^2 + 2x - 1");
 * freeVariables(tree); // Set { "x" }
 * toText(tree);        // "3x^2+2x-1"
 * ```
 */

export * from "./operators.js";
export * from "./tokenizer.js";
export * from "./ast.js";
export * from "./builders.js";
export * from "./parser.js";
export * from "./render.js";
