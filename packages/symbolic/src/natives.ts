/**
 * Native Functions
 *
 * Built-in functions invoked with already evaluated, numeric arguments.
 * Trigonometric functions read the angle mode from the request settings:
 * in degrees mode their input is converted to radians, and inverse
 * functions convert their result back to degrees.
 */

import { ArityError, DivisionError, DomainError, type EngineSettings } from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";

export type NativeFamily = "trigonometric" | "inverse" | "hyperbolic" | "algebraic";

export interface NativeFunction {
  /** Canonical name (aliases resolve to the same entry) */
  readonly name: string;
  readonly arity: number;
  readonly family: NativeFamily;
  apply(args: readonly BigDecimal[], settings: EngineSettings): BigDecimal;
}

export type NativeRegistry = ReadonlyMap<string, NativeFunction>;

/** Largest argument `fac` accepts. */
const MAX_FACTORIAL = BigDecOps.bigDecimal(5000);

// ============================================================================
// Floating point natives
// ============================================================================

function toRadians(x: number, settings: EngineSettings): number {
  return settings.angleMode === "degrees" ? (x * Math.PI) / 180 : x;
}

function fromRadians(x: number, settings: EngineSettings): number {
  return settings.angleMode === "degrees" ? (x * 180) / Math.PI : x;
}

function floating(
  name: string,
  family: NativeFamily,
  fn: (x: number) => number,
  inDomain: (x: number) => boolean = () => true
): NativeFunction {
  return {
    name,
    arity: 1,
    family,
    apply([arg], settings) {
      const x = BigDecOps.toNumber(arg);
      if (!inDomain(x)) {
        throw new DomainError(name, x);
      }
      const input = family === "trigonometric" ? toRadians(x, settings) : x;
      const raw = fn(input);
      const result = family === "inverse" ? fromRadians(raw, settings) : raw;
      if (!Number.isFinite(result)) {
        throw new DomainError(name, x);
      }
      return BigDecOps.fromNumber(result);
    },
  };
}

const unitInterval = (x: number): boolean => Math.abs(x) <= 1;
const outsideUnitInterval = (x: number): boolean => Math.abs(x) >= 1;

// ============================================================================
// Exact natives
// ============================================================================

/**
 * `n·(n−1)·…` while the factor stays positive; 1 for `n <= 0`.
 */
export function factorial(n: BigDecimal): BigDecimal {
  if (BigDecOps.compare(n, MAX_FACTORIAL) > 0) {
    throw new DomainError("fac", BigDecOps.toNumber(n));
  }
  let result = BigDecOps.ONE;
  for (let factor = n; BigDecOps.signum(factor) > 0; factor = BigDecOps.sub(factor, BigDecOps.ONE)) {
    result = BigDecOps.mul(result, factor);
  }
  return result;
}

// Enough digits for an integral quotient to come out exact.
function exactQuotient(a: BigDecimal, b: BigDecimal, settings: EngineSettings): BigDecimal {
  return BigDecOps.divide(a, b, BigDecOps.precisionOf(a) + settings.precision);
}

function permutations(n: BigDecimal, k: BigDecimal, settings: EngineSettings): BigDecimal {
  return exactQuotient(factorial(n), factorial(BigDecOps.sub(n, k)), settings);
}

function truncatedQuotient(name: string, a: BigDecimal, b: BigDecimal): BigDecimal {
  if (BigDecOps.isZero(b)) {
    throw new DivisionError(`${name}: division by zero`);
  }
  return BigDecOps.normalize(BigDecOps.divWithScale(a, b, 0));
}

function exact(
  name: string,
  arity: number,
  fn: (args: readonly BigDecimal[], settings: EngineSettings) => BigDecimal
): NativeFunction {
  return { name, arity, family: "algebraic", apply: fn };
}

const NATIVES: readonly NativeFunction[] = [
  floating("sin", "trigonometric", Math.sin),
  floating("cos", "trigonometric", Math.cos),
  floating("tan", "trigonometric", Math.tan),
  floating("cot", "trigonometric", (x) => 1 / Math.tan(x)),
  floating("sec", "trigonometric", (x) => 1 / Math.cos(x)),
  floating("csc", "trigonometric", (x) => 1 / Math.sin(x)),
  floating("asin", "inverse", Math.asin, unitInterval),
  floating("acos", "inverse", Math.acos, unitInterval),
  floating("atan", "inverse", Math.atan),
  floating("acot", "inverse", (x) => (x === 0 ? Math.PI / 2 : Math.atan(1 / x))),
  floating("asec", "inverse", (x) => Math.acos(1 / x), outsideUnitInterval),
  floating("acsc", "inverse", (x) => Math.asin(1 / x), outsideUnitInterval),
  floating("sinh", "hyperbolic", Math.sinh),
  floating("cosh", "hyperbolic", Math.cosh),
  floating("tanh", "hyperbolic", Math.tanh),
  floating("cbrt", "algebraic", Math.cbrt),
  floating("sqrt", "algebraic", Math.sqrt, (x) => x >= 0),
  floating("ln", "algebraic", Math.log, (x) => x > 0),
  floating("log", "algebraic", Math.log10, (x) => x > 0),
  exact("abs", 1, ([x]) => BigDecOps.abs(x)),
  exact("fac", 1, ([n]) => factorial(n)),
  exact("perm", 2, ([n, k], settings) => permutations(n, k, settings)),
  exact("comb", 2, ([n, k], settings) =>
    exactQuotient(permutations(n, k, settings), factorial(k), settings)
  ),
  exact("mod", 2, ([a, b]) =>
    BigDecOps.normalize(BigDecOps.sub(a, BigDecOps.mul(b, truncatedQuotient("mod", a, b))))
  ),
  exact("div", 2, ([a, b]) => truncatedQuotient("div", a, b)),
];

const ALIASES: Readonly<Record<string, string>> = {
  arcsin: "asin",
  arccos: "acos",
  arctan: "atan",
  arccot: "acot",
  arcsec: "asec",
  arccsc: "acsc",
};

/**
 * Build the registry of native functions, aliases included.
 */
export function createNativeRegistry(): NativeRegistry {
  const registry = new Map<string, NativeFunction>(NATIVES.map((fn) => [fn.name, fn]));
  for (const [alias, target] of Object.entries(ALIASES)) {
    const fn = registry.get(target);
    if (fn) registry.set(alias, fn);
  }
  return registry;
}

/**
 * Check the argument count, then apply the function.
 *
 * @throws ArityError for zero arguments or the wrong count
 */
export function invokeNative(
  fn: NativeFunction,
  calledAs: string,
  args: readonly BigDecimal[],
  settings: EngineSettings
): BigDecimal {
  if (args.length !== fn.arity) {
    throw new ArityError(calledAs, fn.arity, args.length);
  }
  return fn.apply(args, settings);
}
