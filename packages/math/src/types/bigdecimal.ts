/**
 * BigDecimal - Arbitrary Precision Decimals
 *
 * Exact decimal arithmetic using bigint storage with explicit scale.
 * Value = unscaled * 10^(-scale)
 *
 * Addition, subtraction and multiplication are exact. Division needs an
 * explicit target: a number of decimal places (`divWithScale`) or a number
 * of significant digits (`divide`).
 *
 * @example
 * ```typescript
 * const a = bigDecimal("123.456"); // unscaled=123456, scale=3
 * const b = bigDecimal(100n, 2);   // unscaled=100, scale=2 → 1.00
 * toString(add(a, b));             // "124.456"
 * toString(divide(ONE, bigDecimal(3), 5)); // "0.33333"
 * ```
 */

/**
 * Arbitrary precision decimal number.
 * value = unscaled * 10^(-scale)
 *
 * @example
 * - { unscaled: 123n, scale: 0 } = 123
 * - { unscaled: 123n, scale: 2 } = 1.23
 * - { unscaled: -456n, scale: 3 } = -0.456
 * - { unscaled: 12n, scale: -2 } = 1200
 */
export interface BigDecimal {
  readonly unscaled: bigint;
  readonly scale: number;
}

/**
 * Rounding mode: 'floor' (toward -∞), 'ceil' (toward +∞), 'round' (half-even),
 * 'halfUp' (half away from zero), 'down' (toward zero).
 */
export type RoundingMode = "floor" | "ceil" | "round" | "halfUp" | "down";

/**
 * Create a BigDecimal from various inputs.
 *
 * @param value - bigint, number, or string representation
 * @param scale - decimal places (for bigint input); ignored for string/number
 */
export function bigDecimal(value: bigint | number | string, scale?: number): BigDecimal {
  if (typeof value === "string") {
    return fromString(value);
  }

  if (typeof value === "number") {
    return fromNumber(value);
  }

  return { unscaled: value, scale: scale ?? 0 };
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check that `s` is decimal text `fromString` accepts (`12`, `-3.5`, `.5`, `2e3`).
 */
export function isDecimalText(s: string): boolean {
  return DECIMAL_PATTERN.test(s.trim());
}

/**
 * Parse a BigDecimal from a string like "123.456", "-0.001", ".5" or "1e-5".
 *
 * @throws SyntaxError if the text is not a decimal literal
 */
export function fromString(s: string): BigDecimal {
  s = s.trim();
  if (!DECIMAL_PATTERN.test(s)) {
    throw new SyntaxError(`BigDecimal: invalid decimal literal '${s}'`);
  }

  // Handle scientific notation
  const eIndex = s.toLowerCase().indexOf("e");
  if (eIndex !== -1) {
    const exponent = parseInt(s.slice(eIndex + 1), 10);
    const base = fromString(s.slice(0, eIndex));
    return { unscaled: base.unscaled, scale: base.scale - exponent };
  }

  const negative = s.startsWith("-");
  if (negative || s.startsWith("+")) {
    s = s.slice(1);
  }

  const dotIndex = s.indexOf(".");
  let unscaled: bigint;
  let scale: number;

  if (dotIndex === -1) {
    unscaled = BigInt(s);
    scale = 0;
  } else {
    const intPart = s.slice(0, dotIndex);
    const fracPart = s.slice(dotIndex + 1);
    unscaled = BigInt((intPart || "0") + fracPart);
    scale = fracPart.length;
  }

  return { unscaled: negative ? -unscaled : unscaled, scale };
}

/**
 * Create a BigDecimal from a JavaScript number.
 * Uses the shortest round-tripping decimal representation.
 *
 * @throws RangeError for NaN and infinities
 */
export function fromNumber(n: number): BigDecimal {
  if (!Number.isFinite(n)) {
    throw new RangeError("BigDecimal: cannot convert non-finite number");
  }
  return fromString(n.toString());
}

/**
 * Convert a BigDecimal to a JavaScript number.
 * May lose precision for large values.
 */
export function toNumber(bd: BigDecimal): number {
  return Number(toString(bd));
}

/**
 * Format a BigDecimal as a string with exactly the specified decimal places.
 */
export function toFixed(bd: BigDecimal, places: number): string {
  return formatWithScale(setScale(round(bd, places, "halfUp"), places));
}

/**
 * Convert a BigDecimal to plain (non-exponent) notation without trailing zeros.
 */
export function toString(bd: BigDecimal): string {
  return formatWithScale(normalize(bd));
}

function formatWithScale(bd: BigDecimal): string {
  if (bd.scale <= 0) {
    if (bd.unscaled === 0n) return "0";
    return bd.unscaled.toString() + "0".repeat(-bd.scale);
  }

  const negative = bd.unscaled < 0n;
  const absStr = (negative ? -bd.unscaled : bd.unscaled).toString();

  if (absStr.length <= bd.scale) {
    const leadingZeros = "0".repeat(bd.scale - absStr.length);
    return (negative ? "-" : "") + "0." + leadingZeros + absStr;
  }

  const intPart = absStr.slice(0, absStr.length - bd.scale);
  const fracPart = absStr.slice(absStr.length - bd.scale);
  return (negative ? "-" : "") + intPart + "." + fracPart;
}

/**
 * Remove trailing zeros from the fractional part.
 */
export function normalize(bd: BigDecimal): BigDecimal {
  if (bd.unscaled === 0n) {
    return ZERO;
  }

  let unscaled = bd.unscaled;
  let scale = bd.scale;

  while (scale > 0 && unscaled % 10n === 0n) {
    unscaled /= 10n;
    scale--;
  }

  return { unscaled, scale };
}

/**
 * Adjust a BigDecimal to a specific scale. Decreasing the scale truncates
 * toward zero.
 */
function setScale(bd: BigDecimal, newScale: number): BigDecimal {
  if (newScale === bd.scale) {
    return bd;
  }

  if (newScale > bd.scale) {
    const factor = 10n ** BigInt(newScale - bd.scale);
    return { unscaled: bd.unscaled * factor, scale: newScale };
  }

  const factor = 10n ** BigInt(bd.scale - newScale);
  return { unscaled: bd.unscaled / factor, scale: newScale };
}

function alignScales(a: BigDecimal, b: BigDecimal): [BigDecimal, BigDecimal] {
  const maxScale = Math.max(a.scale, b.scale);
  return [setScale(a, maxScale), setScale(b, maxScale)];
}

// ============================================================================
// Arithmetic
// ============================================================================

export function add(a: BigDecimal, b: BigDecimal): BigDecimal {
  const [aa, bb] = alignScales(a, b);
  return normalize({ unscaled: aa.unscaled + bb.unscaled, scale: aa.scale });
}

export function sub(a: BigDecimal, b: BigDecimal): BigDecimal {
  const [aa, bb] = alignScales(a, b);
  return normalize({ unscaled: aa.unscaled - bb.unscaled, scale: aa.scale });
}

export function mul(a: BigDecimal, b: BigDecimal): BigDecimal {
  return normalize({ unscaled: a.unscaled * b.unscaled, scale: a.scale + b.scale });
}

export function negate(a: BigDecimal): BigDecimal {
  return { unscaled: -a.unscaled, scale: a.scale };
}

export function abs(a: BigDecimal): BigDecimal {
  return a.unscaled < 0n ? negate(a) : a;
}

export function signum(a: BigDecimal): -1 | 0 | 1 {
  return a.unscaled < 0n ? -1 : a.unscaled > 0n ? 1 : 0;
}

/**
 * Divide two BigDecimals with explicit result scale, truncating toward zero.
 *
 * @param a - Dividend
 * @param b - Divisor
 * @param scale - Number of decimal places in result
 * @throws RangeError on division by zero
 */
export function divWithScale(a: BigDecimal, b: BigDecimal, scale: number): BigDecimal {
  if (b.unscaled === 0n) {
    throw new RangeError("BigDecimal division by zero");
  }

  // To get `scale` decimal places: multiply a by 10^(scale + b.scale - a.scale)
  // then divide by b.unscaled
  const scaleFactor = scale + b.scale - a.scale;
  let dividend = a.unscaled;

  if (scaleFactor > 0) {
    dividend *= 10n ** BigInt(scaleFactor);
  } else if (scaleFactor < 0) {
    dividend /= 10n ** BigInt(-scaleFactor);
  }

  return { unscaled: dividend / b.unscaled, scale };
}

/**
 * Divide to `digits` significant digits, rounding half away from zero.
 *
 * @throws RangeError on division by zero
 */
export function divide(a: BigDecimal, b: BigDecimal, digits: number): BigDecimal {
  if (b.unscaled === 0n) {
    throw new RangeError("BigDecimal division by zero");
  }
  if (a.unscaled === 0n) {
    return ZERO;
  }

  // The quotient's leading digit sits at exponent adj(a) - adj(b) or one below;
  // two guard digits keep the truncated quotient above `digits` significant digits.
  const leading = adjustedExponent(a) - adjustedExponent(b);
  const truncated = divWithScale(a, b, digits - leading + 2);
  return normalize(roundSignificant(truncated, digits));
}

/**
 * Compute the power of a BigDecimal to a non-negative integer exponent.
 */
export function pow(bd: BigDecimal, exp: number): BigDecimal {
  if (exp < 0 || !Number.isInteger(exp)) {
    throw new RangeError("BigDecimal.pow: exponent must be a non-negative integer");
  }

  if (exp === 0) return ONE;
  if (exp === 1) return bd;

  let result: BigDecimal = ONE;
  let base = bd;
  let e = exp;

  while (e > 0) {
    if (e & 1) {
      result = mul(result, base);
    }
    base = mul(base, base);
    e >>>= 1;
  }

  return normalize(result);
}

// ============================================================================
// Rounding
// ============================================================================

/**
 * Round a BigDecimal to a specified number of decimal places.
 */
export function round(bd: BigDecimal, places: number, mode: RoundingMode = "round"): BigDecimal {
  if (places >= bd.scale) {
    return bd;
  }

  const divisor = 10n ** BigInt(bd.scale - places);
  let quotient = bd.unscaled / divisor;
  const remainder = bd.unscaled % divisor;

  if (remainder === 0n) {
    return { unscaled: quotient, scale: places };
  }

  const negative = bd.unscaled < 0n;
  const absRemainder = remainder < 0n ? -remainder : remainder;
  const halfDivisor = divisor / 2n;
  const away = negative ? -1n : 1n;

  switch (mode) {
    case "floor":
      if (negative) quotient -= 1n;
      break;

    case "ceil":
      if (!negative) quotient += 1n;
      break;

    case "down":
      break;

    case "halfUp":
      if (absRemainder >= halfDivisor) quotient += away;
      break;

    case "round":
      // Round half to even (banker's rounding)
      if (absRemainder > halfDivisor) {
        quotient += away;
      } else if (absRemainder === halfDivisor && quotient % 2n !== 0n) {
        quotient += away;
      }
      break;
  }

  return { unscaled: quotient, scale: places };
}

/**
 * Number of significant digits in the unscaled value (1 for zero).
 */
export function precisionOf(bd: BigDecimal): number {
  const digits = (bd.unscaled < 0n ? -bd.unscaled : bd.unscaled).toString();
  return digits.length;
}

/**
 * Power of ten of the leading significant digit: 0 for 1.5, -2 for 0.042.
 */
export function adjustedExponent(bd: BigDecimal): number {
  return precisionOf(bd) - bd.scale - 1;
}

/**
 * Round to a number of significant digits.
 */
export function roundSignificant(
  bd: BigDecimal,
  digits: number,
  mode: RoundingMode = "halfUp"
): BigDecimal {
  const excess = precisionOf(bd) - digits;
  if (excess <= 0) {
    return bd;
  }
  return round(bd, bd.scale - excess, mode);
}

// ============================================================================
// Comparison and predicates
// ============================================================================

export function compare(a: BigDecimal, b: BigDecimal): -1 | 0 | 1 {
  const [aa, bb] = alignScales(a, b);
  return aa.unscaled < bb.unscaled ? -1 : aa.unscaled > bb.unscaled ? 1 : 0;
}

/**
 * Check if two BigDecimals are equal in value.
 */
export function equals(a: BigDecimal, b: BigDecimal): boolean {
  return compare(a, b) === 0;
}

export function isZero(bd: BigDecimal): boolean {
  return bd.unscaled === 0n;
}

export function isNegative(bd: BigDecimal): boolean {
  return bd.unscaled < 0n;
}

/**
 * Check if a BigDecimal represents an integer.
 */
export function isInteger(bd: BigDecimal): boolean {
  if (bd.scale <= 0) return true;
  return normalize(bd).scale <= 0;
}

/**
 * Get the integer part of a BigDecimal (truncated toward zero).
 */
export function integerPart(bd: BigDecimal): bigint {
  if (bd.scale <= 0) {
    return bd.unscaled * 10n ** BigInt(-bd.scale);
  }
  return bd.unscaled / 10n ** BigInt(bd.scale);
}

/**
 * Compare the magnitude (absolute value) of two BigDecimals.
 */
export function compareMagnitude(a: BigDecimal, b: BigDecimal): -1 | 0 | 1 {
  return compare(abs(a), abs(b));
}

/**
 * Common BigDecimal constants.
 */
export const ZERO: BigDecimal = { unscaled: 0n, scale: 0 };
export const ONE: BigDecimal = { unscaled: 1n, scale: 0 };
export const TEN: BigDecimal = { unscaled: 10n, scale: 0 };
