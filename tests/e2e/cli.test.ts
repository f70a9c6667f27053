import { describe, it, expect, vi, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import type { Command } from "commander";
import { createProgram } from "../../src/cli.js";

const SUM_FILE = fileURLToPath(new URL("../fixtures/sum.lox", import.meta.url));

function quietProgram(): Command {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => {}, outputError: () => {} });
  }
  return program;
}

describe("loxcst", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requires a file for parse", async () => {
    await expect(quietProgram().parseAsync(["parse"], { from: "user" })).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
  });

  it("prints tokens and then the tree", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});

    await quietProgram().parseAsync(["parse", SUM_FILE, "--emit-tokens"], { from: "user" });

    expect(log).toHaveBeenCalledTimes(1);
    const lines = String(log.mock.calls[0][0]).split("\n");
    expect(lines.slice(0, 7)).toEqual([
      'Number\t"1"',
      'Whitespace\t" "',
      'Plus\t"+"',
      'Whitespace\t" "',
      'Number\t"2"',
      'Newline\t"\\n"',
      "Root@0..6",
    ]);
    expect(errorLog).not.toHaveBeenCalled();
  });

  it("prints JSON instead of the tree", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await quietProgram().parseAsync(["parse", SUM_FILE, "--json"], { from: "user" });

    const output: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(output).toMatchObject({ errors: [], diagnostics: [] });
    expect(output).toHaveProperty("tokens.0", { kind: "Number", text: "1" });
  });
});
