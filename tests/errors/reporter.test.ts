import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { Lexer } from "../../src/lexer/lexer.js";
import { Parser } from "../../src/parser/parser.js";
import { formatDiagnostic, formatDiagnostics } from "../../src/errors/reporter.js";
import type { Diagnostic } from "../../src/errors/diagnostic.js";

function lexDiagnostics(source: string): Diagnostic[] {
  const lexer = new Lexer(source, "test.lox");
  lexer.tokenize();
  return lexer.getDiagnostics();
}

function parseDiagnostics(source: string): readonly Diagnostic[] {
  const lexer = new Lexer(source, "test.lox");
  return new Parser(lexer.tokenize(), "test.lox").parse().diagnostics;
}

describe("reporter", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("underlines a single character", () => {
    const [diag] = lexDiagnostics("1 ? 2");
    expect(formatDiagnostic("1 ? 2", diag)).toBe(
      "error: Unexpected character '?'\n" +
        "  --> test.lox:1:3\n" +
        "  |\n" +
        "1 | 1 ? 2\n" +
        "  |   ^\n",
    );
  });

  it("underlines the whole span and prints the help line", () => {
    const [diag] = parseDiagnostics("1 ? 2");
    expect(formatDiagnostic("1 ? 2", diag)).toBe(
      "error: Expected EOF\n" +
        "  --> test.lox:1:3\n" +
        "  |\n" +
        "1 | 1 ? 2\n" +
        "  |   ^^^\n" +
        '  = help: input continues with "?" after the expression\n',
    );
  });

  it("stops the underline at the end of the first line", () => {
    const source = '"ab\ncd';
    const [diag] = lexDiagnostics(source);
    const lines = formatDiagnostic(source, diag).split("\n");
    expect(lines[3]).toBe('1 | "ab');
    expect(lines[4]).toBe("  | ^^^");
  });

  it("draws one caret for an empty span", () => {
    const [diag] = parseDiagnostics("(1");
    const lines = formatDiagnostic("(1", diag).split("\n");
    expect(lines[0]).toBe("error: Unexpected EOF");
    expect(lines[4]).toBe("  |   ^");
  });

  it("labels warnings", () => {
    const [diag] = lexDiagnostics("/* x");
    expect(formatDiagnostic("/* x", diag).split("\n").slice(0, 5)).toEqual([
      "warning: Unterminated block comment",
      "  --> test.lox:1:1",
      "  |",
      "1 | /* x",
      "  | ^^^^",
    ]);
  });

  it("separates several diagnostics with a blank line", () => {
    const diagnostics = [...lexDiagnostics("1 ? 2"), ...parseDiagnostics("1 ? 2")];
    const output = formatDiagnostics("1 ? 2", diagnostics);
    expect(output.split("\n\n")).toHaveLength(2);
    expect(output.startsWith("error: Unexpected character '?'\n")).toBe(true);
    expect(output.split("\n\n")[1].startsWith("error: Expected EOF\n")).toBe(true);
  });

  it("returns an empty string for no diagnostics", () => {
    expect(formatDiagnostics("1", [])).toBe("");
  });
});
