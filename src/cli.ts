import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { analyze, renderAnalysis, type AnalyzeResult } from "./frontend.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { TokenKind } from "./lexer/tokens.js";

function printReport(source: string, result: AnalyzeResult): void {
  const diagnostics = [...result.errors, ...result.warnings];
  if (diagnostics.length > 0) {
    console.error(formatDiagnostics(source, diagnostics));
  }
}

function toJson(result: AnalyzeResult): string {
  return JSON.stringify(
    {
      tokens: result.tokens.map((t) => ({ kind: TokenKind[t.kind], text: t.text })),
      errors: result.parse?.errors ?? [],
      diagnostics: [...result.errors, ...result.warnings],
    },
    null,
    2,
  );
}

export function createProgram(): Command {
  const program = new Command()
    .name("loxcst")
    .description("Lossless tokenizer and error-tolerant CST parser for Lox expressions")
    .version("0.1.0");

  program
    .command("parse <file>")
    .description("Parse a .lox file and print its syntax tree")
    .option("--emit-tokens", "Print the token stream before the tree")
    .option("--no-tree", "Do not print the syntax tree")
    .option("--json", "Print tokens and errors as JSON")
    .action(async (file: string, opts: { emitTokens?: boolean; tree: boolean; json?: boolean }) => {
      try {
        const source = await readFile(file, "utf-8");
        const result = analyze(source, file);

        if (opts.json) {
          console.log(toJson(result));
        } else {
          const output = renderAnalysis(result, { tokens: opts.emitTokens, tree: opts.tree });
          if (output) console.log(output);
          printReport(source, result);
        }

        if (result.errors.length > 0) process.exitCode = 1;
      } catch (e) {
        console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
        process.exit(1);
      }
    });

  program
    .command("repl")
    .description("Parse expressions interactively, one per line")
    .option("--emit-tokens", "Print the token stream before each tree")
    .action(async (opts: { emitTokens?: boolean }) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });
      rl.prompt();
      for await (const line of rl) {
        const result = analyze(line, "<repl>");
        console.log(renderAnalysis(result, { tokens: opts.emitTokens }));
        printReport(line, result);
        rl.prompt();
      }
    });

  return program;
}
