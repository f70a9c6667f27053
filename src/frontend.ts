import { Lexer } from "./lexer/lexer.js";
import { Parser, type ParseResult } from "./parser/parser.js";
import { TokenKind, type Token } from "./lexer/tokens.js";
import type { Diagnostic } from "./errors/diagnostic.js";
import { debugTree } from "./syntax/debug.js";

export interface AnalyzeOptions {
  /** Stop after lexing. */
  tokensOnly?: boolean;
}

export interface AnalyzeResult {
  tokens: Token[];
  parse?: ParseResult;
  /** Lexical errors first, then syntax errors. */
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Lex and parse one source text. Never throws on bad input: every problem
 * comes back as a diagnostic next to the best-effort tree.
 */
export function analyze(
  source: string,
  filename: string,
  options: AnalyzeOptions = {},
): AnalyzeResult {
  const lexer = new Lexer(source, filename);
  const tokens = lexer.tokenize();
  const lexDiags = lexer.getDiagnostics();

  const errors = lexDiags.filter((d) => d.severity === "error");
  const warnings = lexDiags.filter((d) => d.severity !== "error");

  if (options.tokensOnly) {
    return { tokens, errors, warnings };
  }

  const parse = new Parser(tokens, filename).parse();
  return { tokens, parse, errors: errors.concat(parse.diagnostics), warnings };
}

/** One token per line: kind, a tab, then the JSON-quoted text. */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens.map((t) => `${TokenKind[t.kind]}\t${JSON.stringify(t.text)}`).join("\n");
}

export interface RenderOptions {
  tokens?: boolean;
  tree?: boolean;
}

export function renderAnalysis(result: AnalyzeResult, options: RenderOptions = {}): string {
  const sections: string[] = [];
  if (options.tokens) sections.push(formatTokens(result.tokens));
  if (options.tree !== false && result.parse) sections.push(debugTree(result.parse.syntax()));
  return sections.join("\n");
}
