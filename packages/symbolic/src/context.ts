/**
 * Evaluation Context
 *
 * Holds user-defined functions, the native registry, the special forms and
 * variable bindings. A child context (one per user function call) copies the
 * function table but binds its own variables, so parameters shadow the
 * caller's names without touching them.
 *
 * @example
 * ```typescript
 * const ctx = new Context();
 * ctx.addFunction("f(x, y) = x^2 + y");
 * ctx.containsFunction("f"); // true
 * ctx.containsNative("sin"); // true
 * ```
 */

import {
  DefinitionError,
  ParseError,
  UnknownIdentifierError,
  type EngineSettings,
} from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import { children, parse, toText, type AstNode } from "@symcalc/parser";
import { sumSeries } from "./calculus/series.js";
import { createNativeRegistry, invokeNative, type NativeFunction, type NativeRegistry } from "./natives.js";
import type { EvaluationState } from "./state.js";
import type { Term } from "./term.js";

export interface FunctionDefinition {
  readonly name: string;
  readonly params: readonly string[];
  readonly body: AstNode;
  readonly source: string;
}

export interface SpecialFormCall {
  readonly name: string;
  readonly args: readonly AstNode[];
  readonly context: Context;
  readonly state: EvaluationState;
  /** The evaluator, for forms that evaluate their arguments themselves */
  readonly evaluate: (node: AstNode, context: Context, state: EvaluationState) => Term;
}

/**
 * A built-in that receives its arguments unevaluated.
 */
export type SpecialForm = (call: SpecialFormCall) => Term;

export interface ContextOptions {
  natives?: NativeRegistry;
  specialForms?: ReadonlyMap<string, SpecialForm>;
}

export const CONSTANTS: ReadonlyMap<string, BigDecimal> = new Map([
  ["e", BigDecOps.fromString("2.718281828459045235360287471352662")],
  ["pi", BigDecOps.fromString("3.141592653589793238462643383279503")],
]);

const DEFAULT_SPECIAL_FORMS: ReadonlyMap<string, SpecialForm> = new Map([["sum", sumSeries]]);

export class Context {
  private readonly functions: Map<string, FunctionDefinition>;
  private readonly bindings = new Map<string, Term>();
  private readonly natives: NativeRegistry;
  private readonly specialForms: ReadonlyMap<string, SpecialForm>;
  private readonly counter: { next: number };

  constructor(
    options: ContextOptions = {},
    readonly parent?: Context
  ) {
    this.natives = options.natives ?? parent?.natives ?? createNativeRegistry();
    this.specialForms = options.specialForms ?? parent?.specialForms ?? DEFAULT_SPECIAL_FORMS;
    this.functions = new Map<string, FunctionDefinition>(parent?.functions);
    this.counter = parent?.counter ?? { next: 0 };
  }

  /**
   * Create a scope for a function call. Functions defined later in the
   * parent are not visible to it.
   */
  createChild(): Context {
    return new Context({}, this);
  }

  // --------------------------------------------------------------------------
  // Functions
  // --------------------------------------------------------------------------

  /**
   * Parse and store a definition such as `f(x, y) = x^2 + y`.
   *
   * @throws ParseError when the text is not a definition
   * @throws DefinitionError when the name is taken
   */
  addFunction(text: string): FunctionDefinition {
    const node = parse(text);
    if (node.kind !== "definition") {
      throw new ParseError(0, "function definition", text.trim());
    }
    return this.defineFunction({
      name: node.name,
      params: node.params,
      body: node.body,
      source: node.source,
    });
  }

  defineFunction(def: FunctionDefinition): FunctionDefinition {
    if (this.isBuiltin(def.name)) {
      throw new DefinitionError(def.name, `Cannot redefine built-in function '${def.name}'`);
    }
    if (this.functions.has(def.name)) {
      throw new DefinitionError(def.name, `Function '${def.name}' is already defined`);
    }
    if (callsFunction(def.body, def.name)) {
      throw new DefinitionError(def.name, `Function '${def.name}' cannot call itself`);
    }
    this.functions.set(def.name, def);
    return def;
  }

  lookupFunction(name: string): FunctionDefinition | undefined {
    return this.functions.get(name);
  }

  containsFunction(name: string): boolean {
    return this.functions.has(name);
  }

  /** User-defined functions, in definition order. */
  listFunctions(): FunctionDefinition[] {
    return [...this.functions.values()];
  }

  /**
   * Define a helper function under a fresh `_fnN` name.
   */
  synthesizeFunction(params: readonly string[], body: AstNode): FunctionDefinition {
    let name: string;
    do {
      name = `_fn${++this.counter.next}`;
    } while (this.functions.has(name) || this.isBuiltin(name));

    return this.defineFunction({
      name,
      params,
      body,
      source: `${name}(${params.join(",")})=${toText(body)}`,
    });
  }

  // --------------------------------------------------------------------------
  // Natives and special forms
  // --------------------------------------------------------------------------

  containsNative(name: string): boolean {
    return this.natives.has(name) || this.specialForms.has(name);
  }

  lookupNative(name: string): NativeFunction | undefined {
    return this.natives.get(name);
  }

  lookupSpecialForm(name: string): SpecialForm | undefined {
    return this.specialForms.get(name);
  }

  /**
   * @throws UnknownIdentifierError when `name` is not a native function
   */
  callNative(name: string, args: readonly BigDecimal[], settings: EngineSettings): BigDecimal {
    const fn = this.natives.get(name);
    if (!fn) {
      throw new UnknownIdentifierError(name, `'${name}' is not a native function`);
    }
    return invokeNative(fn, name, args, settings);
  }

  private isBuiltin(name: string): boolean {
    return this.natives.has(name) || this.specialForms.has(name);
  }

  // --------------------------------------------------------------------------
  // Constants and bindings
  // --------------------------------------------------------------------------

  lookupConstant(name: string): BigDecimal | undefined {
    return CONSTANTS.get(name);
  }

  bind(name: string, term: Term): void {
    this.bindings.set(name, term);
  }

  /**
   * Find a binding in this scope or the nearest enclosing one.
   */
  lookupBinding(name: string): Term | undefined {
    return this.bindings.get(name) ?? this.parent?.lookupBinding(name);
  }

  isBound(name: string): boolean {
    return this.lookupBinding(name) !== undefined;
  }
}

function callsFunction(node: AstNode, name: string): boolean {
  if (node.kind === "call" && node.name === name) {
    return true;
  }
  return children(node).some((child) => callsFunction(child, name));
}
