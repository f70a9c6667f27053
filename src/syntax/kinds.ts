import { TokenKind } from "../lexer/tokens.js";
import { InternalError } from "../errors/internal.js";

/**
 * Kinds of every element in the syntax tree. The terminal members repeat
 * `TokenKind` in the same order, so a terminal has the same numeric value
 * in both enums; composite kinds follow, and `Root` is always the largest.
 */
export enum SyntaxKind {
  LParen,
  RParen,
  LBrace,
  RBrace,
  Comma,
  Dot,
  Minus,
  Plus,
  Semicolon,
  Slash,
  Star,

  Bang,
  BangEqual,
  Equal,
  EqualEqual,
  Greater,
  GreaterEqual,
  Less,
  LessEqual,

  Identifier,
  StringLiteral,
  Number,

  And,
  Class,
  Else,
  False,
  Fn,
  For,
  If,
  Nil,
  Or,
  Print,
  Return,
  Super,
  This,
  True,
  Var,
  While,

  LineComment,
  BlockComment,
  Whitespace,
  Newline,

  ErrorUnexpected,
  ErrorUnterminatedString,

  // Composite nodes, produced only by the parser
  Unary,
  Factor,
  Term,
  Comparison,
  Equality,

  // Must stay last: decoding checks against it
  Root,
}

// Keyed by TokenKind so the compiler rejects a terminal without a syntax kind.
const TOKEN_SYNTAX_KINDS: Readonly<Record<TokenKind, SyntaxKind>> = {
  [TokenKind.LParen]: SyntaxKind.LParen,
  [TokenKind.RParen]: SyntaxKind.RParen,
  [TokenKind.LBrace]: SyntaxKind.LBrace,
  [TokenKind.RBrace]: SyntaxKind.RBrace,
  [TokenKind.Comma]: SyntaxKind.Comma,
  [TokenKind.Dot]: SyntaxKind.Dot,
  [TokenKind.Minus]: SyntaxKind.Minus,
  [TokenKind.Plus]: SyntaxKind.Plus,
  [TokenKind.Semicolon]: SyntaxKind.Semicolon,
  [TokenKind.Slash]: SyntaxKind.Slash,
  [TokenKind.Star]: SyntaxKind.Star,
  [TokenKind.Bang]: SyntaxKind.Bang,
  [TokenKind.BangEqual]: SyntaxKind.BangEqual,
  [TokenKind.Equal]: SyntaxKind.Equal,
  [TokenKind.EqualEqual]: SyntaxKind.EqualEqual,
  [TokenKind.Greater]: SyntaxKind.Greater,
  [TokenKind.GreaterEqual]: SyntaxKind.GreaterEqual,
  [TokenKind.Less]: SyntaxKind.Less,
  [TokenKind.LessEqual]: SyntaxKind.LessEqual,
  [TokenKind.Identifier]: SyntaxKind.Identifier,
  [TokenKind.StringLiteral]: SyntaxKind.StringLiteral,
  [TokenKind.Number]: SyntaxKind.Number,
  [TokenKind.And]: SyntaxKind.And,
  [TokenKind.Class]: SyntaxKind.Class,
  [TokenKind.Else]: SyntaxKind.Else,
  [TokenKind.False]: SyntaxKind.False,
  [TokenKind.Fn]: SyntaxKind.Fn,
  [TokenKind.For]: SyntaxKind.For,
  [TokenKind.If]: SyntaxKind.If,
  [TokenKind.Nil]: SyntaxKind.Nil,
  [TokenKind.Or]: SyntaxKind.Or,
  [TokenKind.Print]: SyntaxKind.Print,
  [TokenKind.Return]: SyntaxKind.Return,
  [TokenKind.Super]: SyntaxKind.Super,
  [TokenKind.This]: SyntaxKind.This,
  [TokenKind.True]: SyntaxKind.True,
  [TokenKind.Var]: SyntaxKind.Var,
  [TokenKind.While]: SyntaxKind.While,
  [TokenKind.LineComment]: SyntaxKind.LineComment,
  [TokenKind.BlockComment]: SyntaxKind.BlockComment,
  [TokenKind.Whitespace]: SyntaxKind.Whitespace,
  [TokenKind.Newline]: SyntaxKind.Newline,
  [TokenKind.ErrorUnexpected]: SyntaxKind.ErrorUnexpected,
  [TokenKind.ErrorUnterminatedString]: SyntaxKind.ErrorUnterminatedString,
};

export function syntaxKindFromToken(kind: TokenKind): SyntaxKind {
  return TOKEN_SYNTAX_KINDS[kind];
}

/** Decodes a raw integer, throwing `InternalError` outside `0..=Root`. */
export function syntaxKindFromRaw(raw: number): SyntaxKind {
  if (!Number.isInteger(raw) || raw < 0 || raw > SyntaxKind.Root) {
    throw new InternalError(`${raw} is not a syntax kind (expected 0..=${SyntaxKind.Root})`);
  }
  return raw;
}

export function syntaxKindName(kind: SyntaxKind): string {
  return SyntaxKind[kind];
}

export function isTrivia(kind: SyntaxKind): boolean {
  return (
    kind === SyntaxKind.Whitespace ||
    kind === SyntaxKind.Newline ||
    kind === SyntaxKind.LineComment ||
    kind === SyntaxKind.BlockComment
  );
}

export function isError(kind: SyntaxKind): boolean {
  return kind === SyntaxKind.ErrorUnexpected || kind === SyntaxKind.ErrorUnterminatedString;
}
