/**
 * Expression Parser
 *
 * Precedence climbing over the operator table. Besides the usual infix
 * grammar it handles:
 *
 * - implicit multiplication by adjacency: `2x`, `3(x+1)`, `(a)(b)`, `(a)2`
 * - function calls `f(x, y)` and top-level definitions `f(x, y) = body`
 * - vectors `[1 2 3]` / `[1, 2, 3]` and matrices `[1 2][3 4]`
 *
 * Outside brackets two operands separated only by whitespace are an error.
 * Inside brackets whitespace separates elements unless it surrounds an
 * operator on both sides: `[1 -3]` has two elements, `[1 - 3]` has one.
 *
 * @example
 * ```typescript
 * parse("2x^2 + 1");   // binary PLUS (binary MULT attached (2, x^2), 1)
 * parse("f(x) = x^2"); // definition f [x]
 * parse("");           // space
 * ```
 */

import { DefinitionError, ParseError } from "@symcalc/core";
import { BigDecOps } from "@symcalc/math";
import type { AstNode, DefinitionNode, VectorNode } from "./ast.js";
import { binary, definition, matrixNode, SPACE, vector } from "./builders.js";
import { OPERATORS, UNARY_PRECEDENCE, operatorForSymbol, type Operator } from "./operators.js";
import { tokenize, type Token } from "./tokenizer.js";

type InfixStep =
  | { readonly kind: "operator"; readonly op: Operator; readonly next: number }
  | { readonly kind: "implicit"; readonly next: number };

class Parser {
  private pos = 0;
  private inBrackets = false;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly source: string
  ) {}

  parseInput(): AstNode {
    this.skipSpaces();
    if (this.atEnd()) {
      return SPACE;
    }

    const node = this.tokens.some((t) => t.kind === "equals")
      ? this.parseDefinition()
      : this.parseExpression(0);

    this.skipSpaces();
    const trailing = this.peek();
    if (trailing) {
      throw new ParseError(trailing.offset, "end of input", trailing.text);
    }
    return node;
  }

  // --------------------------------------------------------------------------
  // Definitions
  // --------------------------------------------------------------------------

  private parseDefinition(): DefinitionNode {
    const name = this.expect("identifier", "function name");
    this.skipSpaces();
    this.expect("lparen", "'('");

    const params: string[] = [];
    this.skipSpaces();
    if (this.peek()?.kind !== "rparen") {
      for (;;) {
        this.skipSpaces();
        const param = this.expect("identifier", "parameter name");
        if (params.includes(param.text)) {
          throw new DefinitionError(
            name.text,
            `Duplicate parameter '${param.text}' in definition of ${name.text}`
          );
        }
        params.push(param.text);
        this.skipSpaces();
        if (this.peek()?.kind !== "comma") break;
        this.pos++;
      }
    }
    this.expect("rparen", "')'");
    this.skipSpaces();
    this.expect("equals", "'='");

    this.skipSpaces();
    if (this.atEnd()) {
      throw new ParseError(this.source.length, "function body");
    }
    const body = this.parseExpression(0);
    return definition(name.text, params, body, this.source.trim());
  }

  // --------------------------------------------------------------------------
  // Expressions
  // --------------------------------------------------------------------------

  private parseExpression(minPrecedence: number): AstNode {
    let left = this.parseUnary();

    for (;;) {
      const step = this.peekInfix();
      if (!step) break;

      const op: Operator = step.kind === "operator" ? step.op : "MULT";
      const { precedence, associativity } = OPERATORS[op];
      if (precedence < minPrecedence) break;

      this.pos = step.next;
      const right = this.parseExpression(
        associativity === "right" ? precedence : precedence + 1
      );
      left = binary(op, left, right, step.kind === "implicit");
    }

    return left;
  }

  private parseUnary(): AstNode {
    this.skipSpaces();
    const token = this.peek();
    if (token?.kind === "operator" && (token.text === "-" || token.text === "+")) {
      this.pos++;
      const operand = this.parseExpression(UNARY_PRECEDENCE);
      return { kind: "unary", sign: token.text === "-" ? "negative" : "positive", operand };
    }
    return this.parsePrimary();
  }

  /**
   * Decide whether the expression continues with an infix operator or an
   * implicit product, without consuming anything.
   */
  private peekInfix(): InfixStep | undefined {
    const previous = this.tokens[this.pos - 1];
    let index = this.pos;
    const spaced = this.tokens[index]?.kind === "space";
    if (spaced) index++;

    const token = this.tokens[index];
    if (!token) return undefined;

    switch (token.kind) {
      case "operator": {
        const op = operatorForSymbol(token.text);
        if (op === undefined) return undefined;
        // `[1 -3]`: a spaced operator glued to its right operand opens a new element
        if (this.inBrackets && spaced && this.tokens[index + 1]?.kind !== "space") {
          return undefined;
        }
        return { kind: "operator", op, next: index + 1 };
      }

      case "identifier":
      case "lparen":
      case "number":
      case "lbracket":
        if (spaced) {
          if (this.inBrackets) return undefined;
          throw new ParseError(token.offset, "operator", token.text);
        }
        if (
          token.kind === "identifier" ||
          token.kind === "lparen" ||
          (token.kind === "number" && previous?.kind === "rparen")
        ) {
          return { kind: "implicit", next: index };
        }
        throw new ParseError(token.offset, "operator", token.text);

      default:
        return undefined;
    }
  }

  private parsePrimary(): AstNode {
    const token = this.peek();
    if (!token) {
      throw new ParseError(this.source.length, "operand");
    }

    switch (token.kind) {
      case "number":
        this.pos++;
        return { kind: "literal", value: BigDecOps.fromString(token.text) };

      case "identifier":
        this.pos++;
        if (this.peek()?.kind === "lparen") {
          return { kind: "call", name: token.text, args: this.parseArguments() };
        }
        return { kind: "variable", name: token.text };

      case "lparen": {
        this.pos++;
        const inner = this.withBrackets(false, () => this.parseExpression(0));
        this.skipSpaces();
        this.expect("rparen", "')'");
        return inner;
      }

      case "lbracket":
        return this.parseBracketGroups();

      default:
        throw new ParseError(token.offset, "operand", token.text);
    }
  }

  private parseArguments(): AstNode[] {
    this.expect("lparen", "'('");
    return this.withBrackets(false, () => {
      const args: AstNode[] = [];
      this.skipSpaces();
      if (this.peek()?.kind === "rparen") {
        this.pos++;
        return args;
      }
      for (;;) {
        args.push(this.parseExpression(0));
        this.skipSpaces();
        if (this.peek()?.kind === "comma") {
          this.pos++;
          continue;
        }
        this.expect("rparen", "',' or ')'");
        return args;
      }
    });
  }

  // --------------------------------------------------------------------------
  // Vectors and Matrices
  // --------------------------------------------------------------------------

  private parseBracketGroups(): AstNode {
    const groups: VectorNode[] = [this.parseBracketGroup()];

    for (;;) {
      const mark = this.pos;
      this.skipSpaces();
      if (this.peek()?.kind !== "lbracket") {
        this.pos = mark;
        break;
      }
      const offset = this.peek()?.offset ?? this.source.length;
      const row = this.parseBracketGroup();
      if (row.elements.length !== groups[0].elements.length) {
        throw new ParseError(offset, `a row of ${groups[0].elements.length} elements`);
      }
      groups.push(row);
    }

    return groups.length === 1 ? groups[0] : matrixNode(groups);
  }

  private parseBracketGroup(): VectorNode {
    this.expect("lbracket", "'['");
    return this.withBrackets(true, () => {
      const elements: AstNode[] = [];
      let expectElement = true;

      for (;;) {
        this.skipSpaces();
        const token = this.peek();
        if (token?.kind === "rbracket" && elements.length > 0 && !expectElement) {
          this.pos++;
          return vector(elements);
        }
        if (token?.kind === "comma" && !expectElement) {
          this.pos++;
          expectElement = true;
          continue;
        }
        if (token?.kind === "rbracket" || token?.kind === "comma") {
          throw new ParseError(token.offset, "element", token.text);
        }
        elements.push(this.parseExpression(0));
        expectElement = false;
      }
    });
  }

  // --------------------------------------------------------------------------
  // Cursor helpers
  // --------------------------------------------------------------------------

  private withBrackets<T>(inBrackets: boolean, body: () => T): T {
    const saved = this.inBrackets;
    this.inBrackets = inBrackets;
    try {
      return body();
    } finally {
      this.inBrackets = saved;
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  private skipSpaces(): void {
    while (this.tokens[this.pos]?.kind === "space") {
      this.pos++;
    }
  }

  private expect(kind: Token["kind"], description: string): Token {
    const token = this.peek();
    if (!token) {
      throw new ParseError(this.source.length, description);
    }
    if (token.kind !== kind) {
      throw new ParseError(token.offset, description, token.text);
    }
    this.pos++;
    return token;
  }
}

/**
 * Parse expression text (or an already tokenized form of `text`).
 *
 * @throws LexicalError for characters outside the expression alphabet
 * @throws ParseError for malformed input
 * @throws DefinitionError for duplicate parameter names
 */
export function parse(text: string, tokens: readonly Token[] = tokenize(text)): AstNode {
  return new Parser(tokens, text).parseInput();
}
