import chalk from "chalk";
import type { Diagnostic, Severity } from "./diagnostic.js";

function severityLabel(severity: Severity): string {
  switch (severity) {
    case "error": return chalk.red.bold("error");
    case "warning": return chalk.yellow.bold("warning");
    case "info": return chalk.blue.bold("info");
  }
}

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const { start, end } = diag.span;
  const line = source.split("\n")[start.line - 1] ?? "";
  const lineNum = String(start.line);
  const padding = " ".repeat(lineNum.length);

  // Spans running onto later lines are underlined to the end of their first line.
  const lastColumn = end.line === start.line ? end.column : Array.from(line).length + 1;
  const carets = "^".repeat(Math.max(1, lastColumn - start.column));

  let output = `${severityLabel(diag.severity)}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(start.column - 1)}${chalk.red(carets)}\n`;

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: readonly Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}
