import { TokenKind, makeToken, type Token } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";
import type { Diagnostic, Position } from "../errors/diagnostic.js";
import { START_POSITION, advancePosition, error, makeSpan, warning } from "../errors/diagnostic.js";
import { InternalError } from "../errors/internal.js";

const SINGLE_CHAR: ReadonlyMap<string, TokenKind> = new Map([
  ["(", TokenKind.LParen],
  [")", TokenKind.RParen],
  ["{", TokenKind.LBrace],
  ["}", TokenKind.RBrace],
  [",", TokenKind.Comma],
  [".", TokenKind.Dot],
  ["-", TokenKind.Minus],
  ["+", TokenKind.Plus],
  [";", TokenKind.Semicolon],
  ["*", TokenKind.Star],
  ["\n", TokenKind.Newline],
]);

// Operators that become a different token when followed by '='.
const EQUAL_SUFFIXED: ReadonlyMap<string, readonly [TokenKind, TokenKind]> = new Map([
  ["!", [TokenKind.Bang, TokenKind.BangEqual]],
  ["=", [TokenKind.Equal, TokenKind.EqualEqual]],
  ["<", [TokenKind.Less, TokenKind.LessEqual]],
  [">", [TokenKind.Greater, TokenKind.GreaterEqual]],
]);

const NUMERIC = /^\p{N}$/u;
const ALPHABETIC = /^\p{Alphabetic}$/u;

export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private position: Position = START_POSITION;
  private diagnostics: Diagnostic[] = [];

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
  }

  /** Lexes the whole source from the start; each call replaces the previous diagnostics. */
  tokenize(): Token[] {
    this.pos = 0;
    this.position = START_POSITION;
    this.diagnostics = [];

    const tokens: Token[] = [];
    while (this.pos < this.source.length) {
      const start = this.pos;
      const kind = this.startsToken(this.charAt(start)) ? this.readToken() : this.readInvalid();
      const token = makeToken(kind, this.source.slice(start, this.pos));
      this.report(token);
      tokens.push(token);
    }

    if (tokens.map((t) => t.text).join("") !== this.source) {
      throw new InternalError("tokens do not reproduce the lexed source");
    }
    return tokens;
  }

  /** Lexical problems found by the last `tokenize()` call. */
  getDiagnostics(): Diagnostic[] {
    return this.diagnostics;
  }

  private readToken(): TokenKind {
    const ch = this.charAt(this.pos);
    const next = this.charAt(this.pos + ch.length);

    const single = SINGLE_CHAR.get(ch);
    if (single !== undefined) {
      this.pos += ch.length;
      return single;
    }

    const pair = EQUAL_SUFFIXED.get(ch);
    if (pair !== undefined) {
      if (next === "=") {
        this.pos += 2;
        return pair[1];
      }
      this.pos += 1;
      return pair[0];
    }

    if (ch === "/") {
      if (next === "/") return this.readLineComment();
      if (next === "*") return this.readBlockComment();
      this.pos += 1;
      return TokenKind.Slash;
    }
    if (this.isWhitespace(ch)) return this.readWhitespace();
    if (ch === '"') return this.readString();
    if (this.isNumeric(ch)) return this.readNumber();
    return this.readIdentOrKeyword();
  }

  private readLineComment(): TokenKind {
    const end = this.source.indexOf("\n", this.pos);
    this.pos = end === -1 ? this.source.length : end;
    return TokenKind.LineComment;
  }

  private readBlockComment(): TokenKind {
    const close = this.source.indexOf("*/", this.pos + 2);
    this.pos = close === -1 ? this.source.length : close + 2;
    return TokenKind.BlockComment;
  }

  private readWhitespace(): TokenKind {
    while (this.pos < this.source.length && this.isWhitespace(this.source[this.pos])) {
      this.pos++;
    }
    return TokenKind.Whitespace;
  }

  private readString(): TokenKind {
    const close = this.source.indexOf('"', this.pos + 1);
    if (close === -1) {
      this.pos = this.source.length;
      return TokenKind.ErrorUnterminatedString;
    }
    this.pos = close + 1;
    return TokenKind.StringLiteral;
  }

  private readNumber(): TokenKind {
    this.skipDigits();

    // A '.' only belongs to the number when a digit follows it; "1." is Number then Dot.
    if (this.charAt(this.pos) === "." && this.isNumeric(this.charAt(this.pos + 1))) {
      this.pos += 1;
      this.skipDigits();
    }
    return TokenKind.Number;
  }

  private skipDigits(): void {
    let ch = this.charAt(this.pos);
    while (ch !== "" && (this.isNumeric(ch) || ch === "_")) {
      this.pos += ch.length;
      ch = this.charAt(this.pos);
    }
  }

  private readIdentOrKeyword(): TokenKind {
    const start = this.pos;
    let ch = this.charAt(this.pos);
    while (ch !== "" && (this.isAlphaNum(ch) || ch === "_")) {
      this.pos += ch.length;
      ch = this.charAt(this.pos);
    }
    return KEYWORDS.get(this.source.slice(start, this.pos)) ?? TokenKind.Identifier;
  }

  // Consumes code points until one could start a valid token, so a run of
  // garbage becomes a single error token. Always consumes at least one.
  private readInvalid(): TokenKind {
    do {
      this.pos += this.charAt(this.pos).length;
    } while (this.pos < this.source.length && !this.startsToken(this.charAt(this.pos)));
    return TokenKind.ErrorUnexpected;
  }

  private startsToken(ch: string): boolean {
    return (
      SINGLE_CHAR.has(ch) ||
      EQUAL_SUFFIXED.has(ch) ||
      ch === "/" ||
      ch === '"' ||
      this.isWhitespace(ch) ||
      this.isNumeric(ch) ||
      this.isAlpha(ch) ||
      ch === "_"
    );
  }

  private report(token: Token): void {
    const start = this.position;
    const end = advancePosition(start, token.text);
    this.position = end;
    const span = makeSpan(this.filename, start, end);

    switch (token.kind) {
      case TokenKind.ErrorUnexpected: {
        const plural = Array.from(token.text).length > 1 ? "s" : "";
        this.diagnostics.push(error(`Unexpected character${plural} '${token.text}'`, span));
        break;
      }
      case TokenKind.ErrorUnterminatedString:
        this.diagnostics.push(error("Unterminated string literal", span, "add a closing '\"'"));
        break;
      case TokenKind.BlockComment:
        if (!token.text.endsWith("*/") || token.text.length < 4) {
          this.diagnostics.push(warning("Unterminated block comment", span, "add a closing '*/'"));
        }
        break;
    }
  }

  /** The full code point at `pos` (one or two UTF-16 units), or "" past the end. */
  private charAt(pos: number): string {
    const cp = this.source.codePointAt(pos);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  private isWhitespace(ch: string): boolean {
    return ch === " " || ch === "\r" || ch === "\t";
  }

  private isNumeric(ch: string): boolean {
    return NUMERIC.test(ch);
  }

  private isAlpha(ch: string): boolean {
    return ALPHABETIC.test(ch);
  }

  private isAlphaNum(ch: string): boolean {
    return this.isNumeric(ch) || this.isAlpha(ch);
  }
}

export function lex(source: string): Token[] {
  return new Lexer(source).tokenize();
}
