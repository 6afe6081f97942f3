/**
 * Expression Simplification
 *
 * Bottom-up rewriting repeated until the rendered text stops changing:
 * numeric folding, the usual identities (`x+0`, `x*1`, `x^1`, `x^0`),
 * additive folding of `+`/`-` chains and expansion of products.
 *
 * @example
 * ```typescript
 * toText(simplify(parse("x + 2 + x - 2")));  // "2x"
 * toText(factor(parse("(x+1)(x-1)")));       // "x^2-1"
 * toText(foldAdditive(parse("3 - x + 4")));  // "-x+7"
 * ```
 */

import { unreachable } from "@symcalc/core";
import { BigDecOps, type BigDecimal } from "@symcalc/math";
import {
  ONE,
  ZERO,
  add,
  binary,
  const_,
  div,
  isBinary,
  isLiteral,
  isLiteralValue,
  neg,
  pow,
  sub,
  toText,
  type AstNode,
  type BinaryNode,
} from "@symcalc/parser";

/**
 * Simplification options.
 */
export interface SimplifyOptions {
  /** Maximum rewrite rounds (default: 100) */
  maxIterations?: number;
  /** Products whose expansion has more terms than this are left alone (default: 256) */
  maxExpansion?: number;
}

const defaultOptions: Required<SimplifyOptions> = {
  maxIterations: 100,
  maxExpansion: 256,
};

/** Literal exponents up to this are folded into a coefficient. */
const MAX_FOLDED_EXPONENT = 64;

/**
 * Simplify a node by rewriting until nothing changes.
 */
export function simplify(node: AstNode, options: SimplifyOptions = {}): AstNode {
  const opts = { ...defaultOptions, ...options };

  let current = node;
  let text = toText(current);
  for (let i = 0; i < opts.maxIterations; i++) {
    const next = simplifyOnce(current, opts);
    const nextText = toText(next);
    if (nextText === text) break;
    current = next;
    text = nextText;
  }
  return current;
}

function simplifyOnce(node: AstNode, opts: Required<SimplifyOptions>): AstNode {
  switch (node.kind) {
    case "literal":
    case "variable":
    case "space":
      return node;

    case "unary": {
      const operand = simplifyOnce(node.operand, opts);
      if (node.sign === "positive") return operand;
      if (isLiteral(operand)) return const_(BigDecOps.negate(operand.value));
      if (operand.kind === "unary" && operand.sign === "negative") return operand.operand;
      return foldAdditive(neg(operand));
    }

    case "binary":
      return simplifyBinary(
        { ...node, left: simplifyOnce(node.left, opts), right: simplifyOnce(node.right, opts) },
        opts
      );

    case "call":
      return { ...node, args: node.args.map((a) => simplifyOnce(a, opts)) };

    case "definition":
      return { ...node, body: simplifyOnce(node.body, opts) };

    case "vector":
      return { ...node, elements: node.elements.map((e) => simplifyOnce(e, opts)) };

    case "matrix":
      return {
        ...node,
        rows: node.rows.map((r) => ({ ...r, elements: r.elements.map((e) => simplifyOnce(e, opts)) })),
      };

    default:
      return unreachable(node);
  }
}

function simplifyBinary(node: BinaryNode, opts: Required<SimplifyOptions>): AstNode {
  const { left, right } = node;

  switch (node.op) {
    case "PLUS":
    case "MINUS":
    case "PEQUAL":
      return foldAdditive(node);

    case "MULT":
      return factor(node, opts);

    case "DIV":
      if (isLiteralValue(right, 0)) return node;
      if (isLiteralValue(left, 0)) return ZERO;
      if (isLiteralValue(right, 1)) return left;
      if (isLiteral(left) && isLiteral(right)) {
        const q = exactQuotient(left.value, right.value);
        return q === undefined ? node : const_(q);
      }
      // `2x/4` -> `x/2`, `4x/2` -> `2x`
      if (isLiteral(right)) return foldAdditive(node);
      return node;

    case "EXP":
      if (isLiteralValue(right, 0)) return ONE;
      if (isLiteralValue(right, 1)) return left;
      if (isLiteralValue(left, 1)) return ONE;
      if (isLiteral(left) && isLiteral(right)) {
        const n = smallExponent(right.value);
        return n === undefined ? node : const_(BigDecOps.pow(left.value, n));
      }
      return node;

    case "GT":
    case "LT":
    case "GTE":
    case "LTE":
    case "NEQ":
    case "EQUAL":
      if (isLiteral(left) && isLiteral(right)) {
        return compareLiterals(node.op, left.value, right.value) ? ONE : ZERO;
      }
      return node;

    default:
      return unreachable(node.op);
  }
}

function exactQuotient(a: BigDecimal, b: BigDecimal): BigDecimal | undefined {
  const digits = BigDecOps.precisionOf(a) + BigDecOps.precisionOf(b) + 20;
  const q = BigDecOps.divide(a, b, digits);
  return BigDecOps.equals(BigDecOps.mul(q, b), a) ? q : undefined;
}

function smallExponent(value: BigDecimal): number | undefined {
  if (!BigDecOps.isInteger(value)) return undefined;
  const n = Number(BigDecOps.integerPart(value));
  return n >= 0 && n <= MAX_FOLDED_EXPONENT ? n : undefined;
}

function compareLiterals(op: BinaryNode["op"], a: BigDecimal, b: BigDecimal): boolean {
  const c = BigDecOps.compare(a, b);
  switch (op) {
    case "GT":
      return c > 0;
    case "LT":
      return c < 0;
    case "GTE":
      return c >= 0;
    case "LTE":
      return c <= 0;
    case "NEQ":
      return c !== 0;
    default:
      return c === 0;
  }
}

// ============================================================================
// Monomials
// ============================================================================

interface Factor {
  readonly base: AstNode;
  readonly exponent: AstNode;
  /** Rendered base; equal keys multiply by adding exponents */
  readonly key: string;
}

interface Monomial {
  readonly coefficient: BigDecimal;
  /** Literal denominator, always positive; 1 when there is none */
  readonly divisor: BigDecimal;
  readonly factors: readonly Factor[];
}

interface SignedTerm {
  readonly sign: 1 | -1;
  readonly node: AstNode;
}

/**
 * Flatten a `+`/`-` chain. `sign` is the sign the enclosing chain applies
 * to `node`; unary negation flips it for everything beneath.
 */
function signedTerms(node: AstNode, sign: 1 | -1): SignedTerm[] {
  if (node.kind === "binary") {
    if (node.op === "PLUS" || node.op === "PEQUAL") {
      return [...signedTerms(node.left, sign), ...signedTerms(node.right, sign)];
    }
    if (node.op === "MINUS") {
      return [...signedTerms(node.left, sign), ...signedTerms(node.right, flip(sign))];
    }
  }
  if (node.kind === "unary") {
    return signedTerms(node.operand, node.sign === "negative" ? flip(sign) : sign);
  }
  return [{ sign, node }];
}

function flip(sign: 1 | -1): 1 | -1 {
  return sign === 1 ? -1 : 1;
}

function monomialOf(node: AstNode): Monomial {
  if (isLiteral(node)) {
    return { coefficient: node.value, divisor: BigDecOps.ONE, factors: [] };
  }
  if (node.kind === "unary") {
    const inner = monomialOf(node.operand);
    return node.sign === "negative" ? scale(inner, -1) : inner;
  }
  if (isBinary(node, "MULT")) {
    return multiply(monomialOf(node.left), monomialOf(node.right));
  }
  if (
    isBinary(node, "DIV") &&
    !isLiteral(node.left) &&
    isLiteral(node.right) &&
    !BigDecOps.isZero(node.right.value)
  ) {
    const inner = monomialOf(node.left);
    const d = node.right.value;
    const sign = BigDecOps.isNegative(d) ? -1 : 1;
    return reduce(
      scale({ ...inner, divisor: BigDecOps.mul(inner.divisor, BigDecOps.abs(d)) }, sign)
    );
  }
  if (isBinary(node, "EXP")) {
    const n = isLiteral(node.right) ? smallExponent(node.right.value) : undefined;
    if (isLiteral(node.left) && n !== undefined) {
      return { coefficient: BigDecOps.pow(node.left.value, n), divisor: BigDecOps.ONE, factors: [] };
    }
    return unit([factorOf(node.left, node.right)]);
  }
  return unit([factorOf(node, ONE)]);
}

function unit(factors: readonly Factor[]): Monomial {
  return { coefficient: BigDecOps.ONE, divisor: BigDecOps.ONE, factors };
}

/**
 * Fold the divisor into the coefficient when it divides evenly, otherwise
 * cancel the common factor of integer parts.
 */
function reduce(m: Monomial): Monomial {
  if (isOne(m.divisor)) return m;
  const quotient = exactQuotient(m.coefficient, m.divisor);
  if (quotient !== undefined && BigDecOps.isInteger(quotient)) {
    return { ...m, coefficient: BigDecOps.normalize(quotient), divisor: BigDecOps.ONE };
  }
  if (!BigDecOps.isInteger(m.coefficient) || !BigDecOps.isInteger(m.divisor)) return m;

  const g = gcd(BigDecOps.integerPart(m.coefficient), BigDecOps.integerPart(m.divisor));
  if (g <= 1n) return m;
  return {
    ...m,
    coefficient: BigDecOps.bigDecimal(BigDecOps.integerPart(m.coefficient) / g),
    divisor: BigDecOps.bigDecimal(BigDecOps.integerPart(m.divisor) / g),
  };
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

function factorOf(base: AstNode, exponent: AstNode): Factor {
  return { base, exponent, key: toText(base) };
}

function scale(m: Monomial, sign: 1 | -1): Monomial {
  return sign === 1 ? m : { ...m, coefficient: BigDecOps.negate(m.coefficient) };
}

function multiply(a: Monomial, b: Monomial): Monomial {
  const factors = [...a.factors];
  for (const f of b.factors) {
    const index = factors.findIndex((g) => g.key === f.key);
    if (index < 0) {
      factors.push(f);
      continue;
    }
    const exponent = foldAdditive(add(factors[index].exponent, f.exponent));
    if (isLiteralValue(exponent, 0)) {
      factors.splice(index, 1);
    } else {
      factors[index] = { ...factors[index], exponent };
    }
  }
  return reduce({
    coefficient: BigDecOps.mul(a.coefficient, b.coefficient),
    divisor: BigDecOps.mul(a.divisor, b.divisor),
    factors,
  });
}

function signature(m: Monomial): string {
  return m.factors
    .map((f) => `${f.key}^${toText(f.exponent)}`)
    .sort()
    .join("*");
}

function monomialToAst(m: Monomial): AstNode {
  if (!isOne(m.divisor)) {
    return div(monomialToAst({ ...m, divisor: BigDecOps.ONE }), const_(m.divisor));
  }
  const parts = m.factors.map((f) => (isLiteralValue(f.exponent, 1) ? f.base : pow(f.base, f.exponent)));
  if (parts.length === 0) {
    return const_(m.coefficient);
  }

  const product = parts.reduce((acc, part) => binary("MULT", acc, part, true));
  if (isOne(m.coefficient)) return product;
  if (isOne(BigDecOps.negate(m.coefficient))) return neg(product);
  return binary("MULT", const_(m.coefficient), product, true);
}

function isOne(value: BigDecimal): boolean {
  return BigDecOps.equals(value, BigDecOps.ONE);
}

/** `a/b + c/d = (ad + cb)/bd`, for monomials with the same factors */
function addLike(a: Monomial, b: Monomial): Monomial {
  if (BigDecOps.equals(a.divisor, b.divisor)) {
    return { ...a, coefficient: BigDecOps.add(a.coefficient, b.coefficient) };
  }
  return reduce({
    ...a,
    coefficient: BigDecOps.add(
      BigDecOps.mul(a.coefficient, b.divisor),
      BigDecOps.mul(b.coefficient, a.divisor)
    ),
    divisor: BigDecOps.mul(a.divisor, b.divisor),
  });
}

/**
 * Add up like monomials and rebuild a left-associated `+`/`-` chain, the
 * numeric constant last. Everything cancelling gives literal 0.
 */
function sumOf(monomials: readonly Monomial[]): AstNode {
  let constant = BigDecOps.ZERO;
  const groups = new Map<string, Monomial>();

  for (const m of monomials) {
    if (m.factors.length === 0) {
      constant = BigDecOps.add(constant, m.coefficient);
      continue;
    }
    const key = signature(m);
    const existing = groups.get(key);
    groups.set(key, existing ? addLike(existing, m) : m);
  }

  let result: AstNode | undefined;
  const append = (m: Monomial): void => {
    if (result === undefined) {
      result = monomialToAst(m);
    } else if (BigDecOps.isNegative(m.coefficient)) {
      result = sub(result, monomialToAst(scale(m, -1)));
    } else {
      result = add(result, monomialToAst(m));
    }
  };

  for (const m of groups.values()) {
    if (!BigDecOps.isZero(m.coefficient)) append(reduce(m));
  }
  if (!BigDecOps.isZero(constant)) {
    append({ coefficient: constant, divisor: BigDecOps.ONE, factors: [] });
  }
  return result ?? ZERO;
}

// ============================================================================
// Public passes
// ============================================================================

/**
 * Flatten a `+`/`-` chain into signed terms, sum the numbers exactly and
 * merge like terms.
 */
export function foldAdditive(node: AstNode): AstNode {
  return sumOf(signedTerms(node, 1).map((t) => scale(monomialOf(t.node), t.sign)));
}

/**
 * Expand a product: every term of the left operand times every term of the
 * right, with exponents of equal bases added and like terms merged.
 * Anything that is not a product is returned unchanged.
 */
export function factor(node: AstNode, options: SimplifyOptions = {}): AstNode {
  if (!isBinary(node, "MULT")) {
    return node;
  }
  const opts = { ...defaultOptions, ...options };

  const leftTerms = signedTerms(factor(node.left, opts), 1);
  const rightTerms = signedTerms(factor(node.right, opts), 1);
  if (leftTerms.length * rightTerms.length > opts.maxExpansion) {
    return node;
  }

  const products: Monomial[] = [];
  for (const l of leftTerms) {
    for (const r of rightTerms) {
      const sign = l.sign === r.sign ? 1 : -1;
      products.push(scale(multiply(monomialOf(l.node), monomialOf(r.node)), sign));
    }
  }
  return sumOf(products);
}
