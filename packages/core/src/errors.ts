/**
 * Error taxonomy shared by every symcalc package.
 *
 * Each error aborts the current request. The `reason` field is a stable
 * discriminant callers can switch on without `instanceof` chains.
 */

/** Reason codes for engine failures. */
export type SymcalcErrorReason =
  | "lexical"
  | "parse"
  | "definition"
  | "arity"
  | "unknown_identifier"
  | "division"
  | "domain"
  | "singular_matrix"
  | "convergence"
  | "unsupported";

/** Base class of every error raised by the engine. */
export class SymcalcError extends Error {
  constructor(
    readonly reason: SymcalcErrorReason,
    message: string
  ) {
    super(message);
    this.name = "SymcalcError";
  }
}

/** A character the tokenizer does not recognize. */
export class LexicalError extends SymcalcError {
  constructor(
    readonly position: number,
    readonly character: string
  ) {
    super("lexical", `Unexpected character '${character}' at offset ${position}`);
    this.name = "LexicalError";
  }
}

/** Malformed token sequence. */
export class ParseError extends SymcalcError {
  constructor(
    readonly position: number,
    readonly expected: string,
    found?: string
  ) {
    super(
      "parse",
      found === undefined
        ? `Parse error at offset ${position}: expected ${expected}`
        : `Parse error at offset ${position}: expected ${expected}, found '${found}'`
    );
    this.name = "ParseError";
  }
}

/** Duplicate or malformed function definition. */
export class DefinitionError extends SymcalcError {
  constructor(
    readonly functionName: string,
    message: string
  ) {
    super("definition", message);
    this.name = "DefinitionError";
  }
}

/** Call with the wrong number of arguments. */
export class ArityError extends SymcalcError {
  constructor(
    readonly functionName: string,
    readonly expected: number | string,
    readonly actual: number
  ) {
    super("arity", `${functionName} expects ${expected} argument(s), got ${actual}`);
    this.name = "ArityError";
  }
}

/** Call to a function that is neither user-defined nor native. */
export class UnknownIdentifierError extends SymcalcError {
  constructor(
    readonly identifier: string,
    message = `Unknown function '${identifier}'`
  ) {
    super("unknown_identifier", message);
    this.name = "UnknownIdentifierError";
  }
}

export class DivisionError extends SymcalcError {
  constructor(message = "Division by zero") {
    super("division", message);
    this.name = "DivisionError";
  }
}

/** Native function evaluated outside its domain, e.g. `sqrt(-1)`. */
export class DomainError extends SymcalcError {
  constructor(
    readonly functionName: string,
    readonly argument: number
  ) {
    super("domain", `${functionName}(${argument}) is outside the function's domain`);
    this.name = "DomainError";
  }
}

export class SingularMatrixError extends SymcalcError {
  constructor(readonly column: number) {
    super("singular_matrix", `Matrix is singular: no pivot in column ${column}`);
    this.name = "SingularMatrixError";
  }
}

/** An iterative procedure hit its ceiling without meeting its tolerance. */
export class ConvergenceError extends SymcalcError {
  constructor(
    readonly procedure: string,
    readonly iterations: number
  ) {
    super("convergence", `${procedure} did not converge after ${iterations} iterations`);
    this.name = "ConvergenceError";
  }
}

/** Operation requested on a shape the engine does not handle. */
export class UnsupportedOperationError extends SymcalcError {
  constructor(
    readonly operation: string,
    readonly detail: string
  ) {
    super("unsupported", `Cannot ${operation}: ${detail}`);
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Mark a code path as unreachable. Used as the default branch of
 * exhaustive switches over closed unions.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
