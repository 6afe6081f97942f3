/**
 * Operator table.
 *
 * Precedence tiers, lowest to highest: comparisons and `+=`, `+ -`,
 * `* /`, unary sign, `^`. Only `^` is right-associative.
 */

export const OPERATOR_NAMES = [
  "PLUS",
  "MINUS",
  "MULT",
  "DIV",
  "EXP",
  "GT",
  "LT",
  "GTE",
  "LTE",
  "NEQ",
  "EQUAL",
  "PEQUAL",
] as const;

export type Operator = (typeof OPERATOR_NAMES)[number];

export interface OperatorInfo {
  readonly symbol: string;
  readonly precedence: number;
  readonly associativity: "left" | "right";
}

export const OPERATORS: Readonly<Record<Operator, OperatorInfo>> = {
  PEQUAL: { symbol: "+=", precedence: 1, associativity: "left" },
  GT: { symbol: ">", precedence: 1, associativity: "left" },
  LT: { symbol: "<", precedence: 1, associativity: "left" },
  GTE: { symbol: ">=", precedence: 1, associativity: "left" },
  LTE: { symbol: "<=", precedence: 1, associativity: "left" },
  NEQ: { symbol: "!=", precedence: 1, associativity: "left" },
  EQUAL: { symbol: "==", precedence: 1, associativity: "left" },
  PLUS: { symbol: "+", precedence: 2, associativity: "left" },
  MINUS: { symbol: "-", precedence: 2, associativity: "left" },
  MULT: { symbol: "*", precedence: 3, associativity: "left" },
  DIV: { symbol: "/", precedence: 3, associativity: "left" },
  EXP: { symbol: "^", precedence: 5, associativity: "right" },
};

/** Binding strength of a leading `+` or `-` */
export const UNARY_PRECEDENCE = 4;

/** Binding strength of literals, variables, calls and bracketed groups */
export const ATOM_PRECEDENCE = 6;

const BY_SYMBOL: ReadonlyMap<string, Operator> = new Map(
  OPERATOR_NAMES.map((op): [string, Operator] => [OPERATORS[op].symbol, op])
);

/** Operator symbols, two-character symbols first for longest-match lexing. */
export const OPERATOR_SYMBOLS: readonly string[] = [...BY_SYMBOL.keys()].sort(
  (a, b) => b.length - a.length
);

export function operatorForSymbol(symbol: string): Operator | undefined {
  return BY_SYMBOL.get(symbol);
}

export function isComparison(op: Operator): boolean {
  return OPERATORS[op].precedence === 1 && op !== "PEQUAL";
}
