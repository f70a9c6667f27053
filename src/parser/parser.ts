import { TokenKind, type Token } from "../lexer/tokens.js";
import type { Diagnostic, Position, Span } from "../errors/diagnostic.js";
import { START_POSITION, advancePosition, makeSpan } from "../errors/diagnostic.js";
import { InternalError } from "../errors/internal.js";
import { SyntaxKind, syntaxKindFromToken } from "../syntax/kinds.js";
import { GreenNodeBuilder, type GreenNode, type NodeCache } from "../syntax/green.js";
import { SyntaxNode } from "../syntax/red.js";
import {
  EXPECTED_EOF, UNEXPECTED_EOF, UNEXPECTED_TOKEN,
  expectedEof, nestingTooDeep, unexpectedEof, unexpectedToken,
} from "./errors.js";

const EQUALITY_OPERATORS: ReadonlySet<TokenKind> = new Set([TokenKind.BangEqual, TokenKind.EqualEqual]);
const COMPARISON_OPERATORS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Greater, TokenKind.GreaterEqual, TokenKind.Less, TokenKind.LessEqual,
]);
const TERM_OPERATORS: ReadonlySet<TokenKind> = new Set([TokenKind.Minus, TokenKind.Plus]);
const FACTOR_OPERATORS: ReadonlySet<TokenKind> = new Set([TokenKind.Slash, TokenKind.Star]);
const UNARY_OPERATORS: ReadonlySet<TokenKind> = new Set([TokenKind.Bang, TokenKind.Minus]);
const LITERALS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Number, TokenKind.StringLiteral, TokenKind.True, TokenKind.False, TokenKind.Nil,
]);
const TRAILING_TRIVIA: ReadonlySet<TokenKind> = new Set([TokenKind.Whitespace, TokenKind.Newline]);

/** Groups and prefix operators that may enclose one another before the parser gives up on them. */
export const MAX_NESTING_DEPTH = 256;

/** A finished parse: the green tree plus every syntax error found on the way. */
export class ParseResult {
  readonly tree: GreenNode;
  /** Messages in source order: "Unexpected token", "Unexpected EOF" or "Expected EOF". */
  readonly errors: readonly string[];
  readonly diagnostics: readonly Diagnostic[];

  constructor(tree: GreenNode, errors: string[], diagnostics: Diagnostic[]) {
    this.tree = tree;
    this.errors = Object.freeze([...errors]);
    this.diagnostics = Object.freeze([...diagnostics]);
  }

  /** A fresh navigable view of the tree. */
  syntax(): SyntaxNode {
    return SyntaxNode.newRoot(this.tree);
  }
}

export class Parser {
  private tokens: readonly Token[];
  private pos: number = 0;
  private builder: GreenNodeBuilder;
  private errors: string[] = [];
  private diagnostics: Diagnostic[] = [];
  private filename: string;
  // Source position of tokens[pos]
  private position: Position = START_POSITION;
  // Open groups and prefix operators around the current token
  private depth: number = 0;
  private result: ParseResult | null = null;

  constructor(tokens: readonly Token[], filename: string = "<stdin>", cache?: NodeCache) {
    this.tokens = tokens;
    this.filename = filename;
    this.builder = new GreenNodeBuilder(cache);
  }

  parse(): ParseResult {
    if (this.result) return this.result;

    this.builder.startNode(SyntaxKind.Root);
    this.parseExpression();

    // Trailing whitespace and newlines end the input legitimately.
    while (this.atAny(TRAILING_TRIVIA)) this.bump();

    const rest = this.peek();
    if (rest) {
      const start = this.position;
      this.builder.startNode(SyntaxKind.ErrorUnexpected);
      while (!this.isAtEnd()) this.bump();
      this.builder.finishNode();
      this.report(EXPECTED_EOF, expectedEof(rest, this.spanFrom(start)));
    }
    this.builder.finishNode();

    this.result = new ParseResult(this.builder.finish(), this.errors, this.diagnostics);
    return this.result;
  }

  // ============================================================
  // Expressions
  // ============================================================

  private parseExpression(): void {
    this.skipWhitespace();
    this.parseEquality();
  }

  private parseEquality(): void {
    this.parseBinary(SyntaxKind.Equality, EQUALITY_OPERATORS, () => this.parseComparison());
  }

  private parseComparison(): void {
    this.parseBinary(SyntaxKind.Comparison, COMPARISON_OPERATORS, () => this.parseTerm());
  }

  private parseTerm(): void {
    this.parseBinary(SyntaxKind.Term, TERM_OPERATORS, () => this.parseFactor());
  }

  private parseFactor(): void {
    this.parseBinary(SyntaxKind.Factor, FACTOR_OPERATORS, () => this.parseUnary());
  }

  /**
   * One left-associative precedence level. The node is emitted even for a
   * single operand. Whitespace before an operator is only consumed once the
   * operator is known to belong to this level, so it never ends up inside
   * the operand to its left.
   */
  private parseBinary(kind: SyntaxKind, operators: ReadonlySet<TokenKind>, operand: () => void): void {
    this.builder.startNode(kind);
    operand();
    while (this.significantIsAny(operators)) {
      this.skipWhitespace();
      this.bump();
      this.skipWhitespace();
      operand();
    }
    this.builder.finishNode();
  }

  private parseUnary(): void {
    this.skipWhitespace();
    const tok = this.peek();
    if (tok && UNARY_OPERATORS.has(tok.kind)) {
      if (this.depth >= MAX_NESTING_DEPTH) {
        this.tooDeep(tok);
        return;
      }
      this.builder.startNode(SyntaxKind.Unary);
      this.bump();
      this.depth++;
      this.parseUnary();
      this.depth--;
      this.builder.finishNode();
      return;
    }
    this.parsePrimary();
  }

  private parsePrimary(): void {
    this.skipWhitespace();
    const tok = this.peek();

    if (!tok) {
      this.unexpectedEof("an expression");
    } else if (LITERALS.has(tok.kind)) {
      this.bump();
    } else if (tok.kind === TokenKind.LParen) {
      if (this.depth >= MAX_NESTING_DEPTH) {
        this.tooDeep(tok);
        return;
      }
      this.depth++;
      this.parseGroup();
      this.depth--;
    } else {
      this.unexpected(tok, "an expression");
    }
  }

  // '(' expression ')'. The parentheses sit in the enclosing node next to the inner Equality.
  private parseGroup(): void {
    this.bump(); // '('
    this.parseExpression();
    this.skipWhitespace();

    const tok = this.peek();
    if (!tok) {
      this.unexpectedEof("')'");
    } else if (tok.kind === TokenKind.RParen) {
      this.bump();
    } else {
      this.unexpected(tok, "')'");
    }
  }

  // ============================================================
  // Error recovery
  // ============================================================

  private unexpected(tok: Token, expected: string): void {
    this.wrapUnexpected((span) => unexpectedToken(tok, span, expected));
  }

  // The operator or '(' that would nest past the limit is dropped, not descended into.
  private tooDeep(tok: Token): void {
    this.wrapUnexpected((span) => nestingTooDeep(tok, span, MAX_NESTING_DEPTH));
  }

  // Wraps the offending token in an error node and moves past it.
  private wrapUnexpected(diagnose: (span: Span) => Diagnostic): void {
    const start = this.position;
    this.builder.startNode(SyntaxKind.ErrorUnexpected);
    this.bump();
    this.builder.finishNode();
    this.report(UNEXPECTED_TOKEN, diagnose(this.spanFrom(start)));
  }

  // Nothing to consume; callers' loops all stop at the end of input.
  private unexpectedEof(expected: string): void {
    this.report(UNEXPECTED_EOF, unexpectedEof(this.spanFrom(this.position), expected));
  }

  private report(message: string, diagnostic: Diagnostic): void {
    this.errors.push(message);
    this.diagnostics.push(diagnostic);
  }

  // ============================================================
  // Helpers
  // ============================================================

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isAtEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  private atAny(kinds: ReadonlySet<TokenKind>): boolean {
    const tok = this.peek();
    return tok !== undefined && kinds.has(tok.kind);
  }

  // Looks past whitespace without consuming it.
  private significantIsAny(kinds: ReadonlySet<TokenKind>): boolean {
    let i = this.pos;
    while (i < this.tokens.length && this.tokens[i].kind === TokenKind.Whitespace) i++;
    return i < this.tokens.length && kinds.has(this.tokens[i].kind);
  }

  private skipWhitespace(): void {
    while (this.peek()?.kind === TokenKind.Whitespace) this.bump();
  }

  /** Moves one token into the node currently being built. */
  private bump(): void {
    const tok = this.peek();
    if (!tok) throw new InternalError("bump() past the end of input");
    this.builder.token(syntaxKindFromToken(tok.kind), tok.text);
    this.position = advancePosition(this.position, tok.text);
    this.pos++;
  }

  private spanFrom(start: Position): Span {
    return makeSpan(this.filename, start, this.position);
  }
}

export function parse(tokens: readonly Token[]): ParseResult {
  return new Parser(tokens).parse();
}
