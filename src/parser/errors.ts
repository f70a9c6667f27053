import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import type { Token } from "../lexer/tokens.js";

export const UNEXPECTED_TOKEN = "Unexpected token";
export const UNEXPECTED_EOF = "Unexpected EOF";
export const EXPECTED_EOF = "Expected EOF";

export function unexpectedToken(token: Token, span: Span, expected: string): Diagnostic {
  return error(UNEXPECTED_TOKEN, span, `expected ${expected}, found ${describeToken(token)}`);
}

export function nestingTooDeep(token: Token, span: Span, limit: number): Diagnostic {
  return error(UNEXPECTED_TOKEN, span, `${describeToken(token)} nests deeper than ${limit} levels`);
}

export function unexpectedEof(span: Span, expected: string): Diagnostic {
  return error(UNEXPECTED_EOF, span, `expected ${expected} before the end of input`);
}

export function expectedEof(first: Token, span: Span): Diagnostic {
  return error(EXPECTED_EOF, span, `input continues with ${describeToken(first)} after the expression`);
}

function describeToken(token: Token): string {
  return JSON.stringify(token.text);
}
