/**
 * Session
 *
 * The entry point most callers need: one context of user functions, one
 * immutable settings snapshot, and the operations of every layer behind
 * text-in, term-out methods.
 *
 * @example
 * ```typescript
 * const session = new Session();
 * session.render(session.evaluate("2+3*4"));            // "14"
 * session.defineFunction("f(x,y)=x^2+y");
 * session.render(session.evaluate("f(2,3)"));           // "7"
 * session.render(session.differentiate("x^3", "x"));    // "3x^2"
 * session.findRoots("x^2-4").map(BigDecOps.toString);   // ["-2", "2"]
 * ```
 */

import {
  ParseError,
  SymcalcError,
  UnknownIdentifierError,
  UnsupportedOperationError,
  createLogger,
  loadSettings,
  withSettings,
  type AngleMode,
  type EngineSettings,
  type Logger,
} from "@symcalc/core";
import { BigDecOps, MatrixOps, type BigDecimal, type Matrix } from "@symcalc/math";
import {
  add,
  binary,
  const_,
  freeVariables,
  isLiteral,
  parse,
  pow,
  toText,
  var_,
  type AstNode,
} from "@symcalc/parser";
import {
  CONSTANTS,
  Context,
  ZERO_TERM,
  createEvaluationState,
  derivative,
  evaluate,
  factor,
  findRoots,
  foldAdditive,
  integrate,
  nthDerivative,
  numeric,
  renderTerm,
  simplify,
  stripParens,
  symbolic,
  type FunctionDefinition,
  type SymbolicTerm,
  type Term,
} from "@symcalc/symbolic";

/** A value bound to a variable for one evaluation. Strings are decimal text. */
export type BindingValue = number | string | BigDecimal;

export class Session {
  private readonly context = new Context();
  private current: EngineSettings;
  private log: Logger;

  /**
   * @param overrides - Settings that take priority over config files and
   *   `SYMCALC_*` environment variables
   */
  constructor(overrides: Partial<EngineSettings> = {}) {
    this.current = loadSettings(overrides);
    this.log = createLogger("session", this.current.debug);
  }

  /** Read-only snapshot of the settings the next request will use. */
  get settings(): EngineSettings {
    return this.current;
  }

  setPrecision(digits: number): void {
    this.update({ precision: digits });
  }

  setAngleMode(mode: AngleMode): void {
    this.update({ angleMode: mode });
  }

  private update(changes: Partial<EngineSettings>): void {
    this.current = withSettings(this.current, changes);
    this.log = createLogger("session", this.current.debug);
  }

  // --------------------------------------------------------------------------
  // Expressions
  // --------------------------------------------------------------------------

  parse(text: string): AstNode {
    return parse(text);
  }

  /**
   * Evaluate text or a parsed tree. Numbers are rounded to the precision in
   * effect at the end of the request; results with free variables come back
   * simplified.
   */
  evaluate(input: string | AstNode, bindings: Readonly<Record<string, BindingValue>> = {}): Term {
    const settings = this.current;
    const node = typeof input === "string" ? parse(input) : input;
    const values = Object.entries(bindings).map(([name, value]): [string, Term] => [
      name,
      numeric(toDecimal(name, value)),
    ]);

    const state = createEvaluationState(settings);
    const term = evaluate(node, this.requestScope(settings, values), settings, state);
    this.log.debug(`${toText(node)} -> ${renderTerm(term)}`);

    if (term.kind === "numeric") {
      if (BigDecOps.toNumber(BigDecOps.abs(term.value)) <= settings.zeroEpsilon) {
        return ZERO_TERM;
      }
      return numeric(BigDecOps.normalize(BigDecOps.roundSignificant(term.value, state.precision)));
    }
    return toTerm(simplify(parse(this.keepConstants(node, term, values, settings).text)));
  }

  /**
   * Symbolic results name `e` and `pi` instead of printing them at the
   * working precision, so the text re-evaluates to the same value. Where
   * only the substituted form evaluates (a series over `e^-n` next to a free
   * variable), the substituted result stands.
   */
  private keepConstants(
    node: AstNode,
    substituted: SymbolicTerm,
    values: ReadonlyArray<[string, Term]>,
    settings: EngineSettings
  ): SymbolicTerm {
    const names = freeVariables(node);
    const mentioned = [...CONSTANTS.keys()].some(
      (name) => names.has(name) && !values.some(([bound]) => bound === name)
    );
    if (!settings.substituteConstants || !mentioned) {
      return substituted;
    }

    const plain = { ...settings, substituteConstants: false };
    try {
      const named = evaluate(node, this.requestScope(plain, values), plain);
      return named.kind === "symbolic" ? named : substituted;
    } catch (e) {
      if (!(e instanceof SymcalcError)) throw e;
      this.log.debug(`keeping substituted constants: ${e.message}`);
      return substituted;
    }
  }

  render(term: Term): string {
    return renderTerm(term);
  }

  /**
   * @throws DefinitionError when the name is taken or built in
   */
  defineFunction(text: string): FunctionDefinition {
    const def = this.context.addFunction(text);
    this.log.debug(`defined ${def.source}`);
    return def;
  }

  /** User-defined functions, in definition order. */
  functions(): FunctionDefinition[] {
    return this.context.listFunctions();
  }

  simplify(text: string): AstNode {
    return simplify(parse(text));
  }

  factor(text: string): AstNode {
    return factor(parse(text));
  }

  // --------------------------------------------------------------------------
  // Calculus
  // --------------------------------------------------------------------------

  differentiate(text: string, variable: string): Term {
    return toTerm(simplify(derivative(parse(text), variable, this.context)));
  }

  nthDerivative(text: string, variable: string, n: number): Term {
    return toTerm(simplify(nthDerivative(parse(text), variable, n, this.context)));
  }

  integrate(text: string, variable: string): Term {
    return toTerm(simplify(integrate(parse(text), variable)));
  }

  /**
   * Real roots in ascending order. The first variable named is the unknown;
   * with none named, the expression's only free variable is.
   *
   * @throws ConvergenceError when no root is found
   */
  findRoots(text: string, ...variables: string[]): BigDecimal[] {
    const settings = this.current;
    const node = parse(text);
    if (variables.length > 1) {
      throw new UnsupportedOperationError("find roots", "only one unknown is supported");
    }
    const variable = variables[0] ?? this.soleVariable(node, settings);
    return findRoots(node, variable, this.requestScope(settings), settings);
  }

  private soleVariable(node: AstNode, settings: EngineSettings): string {
    const names = [...freeVariables(node)].filter(
      (name) => !(settings.substituteConstants && CONSTANTS.has(name))
    );
    if (names.length !== 1) {
      throw new UnknownIdentifierError(
        names[0] ?? "",
        `Expected exactly one unknown, found ${names.length === 0 ? "none" : names.join(", ")}`
      );
    }
    return names[0];
  }

  /**
   * Child scope for one request, with `e` and `pi` bound unless constant
   * substitution is off. Caller bindings win over constants.
   */
  private requestScope(
    settings: EngineSettings,
    values: ReadonlyArray<[string, Term]> = []
  ): Context {
    const scope = this.context.createChild();
    if (settings.substituteConstants) {
      for (const [name, value] of CONSTANTS) {
        scope.bind(name, numeric(value));
      }
    }
    for (const [name, term] of values) {
      scope.bind(name, term);
    }
    return scope;
  }

  // --------------------------------------------------------------------------
  // Matrices
  // --------------------------------------------------------------------------

  /**
   * Read `[1 3 5][8 30 2]` row by row. Entries may be any expression that
   * evaluates to a number.
   *
   * @throws ParseError when the text is not a bracketed literal
   */
  parseMatrix(text: string): Matrix {
    const node = parse(text);
    const rows =
      node.kind === "matrix"
        ? node.rows.map((r) => r.elements)
        : node.kind === "vector"
          ? [node.elements]
          : undefined;
    if (rows === undefined) {
      throw new ParseError(0, "matrix literal", text.trim());
    }

    return MatrixOps.fromRows(
      rows.map((elements) =>
        elements.map((element) => {
          const term = this.evaluate(element);
          if (term.kind === "symbolic") {
            throw new UnsupportedOperationError("build a matrix", `'${term.text}' is not a number`);
          }
          return BigDecOps.toNumber(term.value);
        })
      )
    );
  }

  rowReduce(m: Matrix): Matrix {
    return MatrixOps.rowReduce(m, this.current.matrixEpsilon);
  }

  echelon(m: Matrix): Matrix {
    return MatrixOps.echelon(m, this.current.matrixEpsilon);
  }

  /**
   * @throws SingularMatrixError
   */
  inverse(m: Matrix): Matrix {
    return MatrixOps.inverse(m, this.current.matrixEpsilon);
  }

  determinant(m: Matrix): Term {
    return this.decimal(MatrixOps.determinant(m, this.current.matrixEpsilon));
  }

  /**
   * det(vI − m) as a polynomial in `variable`, highest power first.
   */
  characteristicPolynomial(m: Matrix, variable = "x"): Term {
    const coefficients = MatrixOps.characteristicPolynomial(m);
    const degree = coefficients.length - 1;
    const v = var_(variable);

    const terms = coefficients.map((c, k): AstNode => {
      const power = degree - k;
      const coefficient = const_(this.round(c));
      if (power === 0) return coefficient;
      return binary("MULT", coefficient, power === 1 ? v : pow(v, const_(power)), true);
    });
    return toTerm(foldAdditive(terms.reduce((acc, t) => add(acc, t))));
  }

  formatMatrix(m: Matrix): string {
    return MatrixOps.formatMatrix(m, this.current.displayPlaces);
  }

  private round(value: number): BigDecimal {
    return BigDecOps.normalize(
      BigDecOps.roundSignificant(BigDecOps.fromNumber(value), this.current.precision)
    );
  }

  private decimal(value: number): Term {
    return Math.abs(value) <= this.current.zeroEpsilon ? ZERO_TERM : numeric(this.round(value));
  }
}

/**
 * @throws ParseError for text that is not a decimal number
 * @throws UnsupportedOperationError for NaN and infinities
 */
function toDecimal(name: string, value: BindingValue): BigDecimal {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new UnsupportedOperationError(`bind '${name}'`, `${value} is not a finite number`);
    }
    return BigDecOps.fromNumber(value);
  }
  if (typeof value === "string") {
    if (!BigDecOps.isDecimalText(value)) {
      throw new ParseError(0, `decimal number for '${name}'`, value.trim());
    }
    return BigDecOps.fromString(value);
  }
  return value;
}

/** A literal becomes a number; anything else its text without outer parentheses. */
function toTerm(node: AstNode): Term {
  return isLiteral(node) ? numeric(node.value) : symbolic(stripParens(toText(node)));
}
