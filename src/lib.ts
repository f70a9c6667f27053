export { TokenKind, type Token } from "./lexer/tokens.js";
export { KEYWORDS } from "./lexer/keywords.js";
export { Lexer, lex } from "./lexer/lexer.js";
export {
  SyntaxKind, syntaxKindFromToken, syntaxKindFromRaw, syntaxKindName, isTrivia, isError,
} from "./syntax/kinds.js";
export {
  GreenNodeBuilder, NodeCache, greenText, greenTextLength,
  type GreenNode, type GreenToken, type GreenElement,
} from "./syntax/green.js";
export { SyntaxNode, SyntaxToken, type SyntaxElement, type TextRange } from "./syntax/red.js";
export { debugTree } from "./syntax/debug.js";
export { MAX_NESTING_DEPTH, Parser, ParseResult, parse } from "./parser/parser.js";
export { analyze, formatTokens, renderAnalysis, type AnalyzeOptions, type AnalyzeResult } from "./frontend.js";
export type { Diagnostic, Position, Severity, Span } from "./errors/diagnostic.js";
export { InternalError } from "./errors/internal.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
