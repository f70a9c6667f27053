export enum TokenKind {
  // Single character
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

  // One or two characters
  Bang,
  BangEqual,
  Equal,
  EqualEqual,
  Greater,
  GreaterEqual,
  Less,
  LessEqual,

  // Literals
  Identifier,
  StringLiteral,
  Number,

  // Keywords
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

  // Trivia
  LineComment,
  BlockComment,
  Whitespace,
  Newline,

  // Errors
  ErrorUnexpected,
  ErrorUnterminatedString,
}

export interface Token {
  readonly kind: TokenKind;
  // Exact slice of the source; concatenating every token's text gives back the input.
  readonly text: string;
}

export function makeToken(kind: TokenKind, text: string): Token {
  return Object.freeze({ kind, text });
}
