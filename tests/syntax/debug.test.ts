import { describe, it, expect } from "vitest";
import { lex } from "../../src/lexer/lexer.js";
import { parse } from "../../src/parser/parser.js";
import { debugTree } from "../../src/syntax/debug.js";

describe("debugTree", () => {
  it("prints one indented line per element", () => {
    expect(debugTree(parse(lex("-1")).syntax())).toBe(
      [
        "Root@0..2",
        "  Equality@0..2",
        "    Comparison@0..2",
        "      Term@0..2",
        "        Factor@0..2",
        "          Unary@0..2",
        '            Minus@0..1 "-"',
        '            Number@1..2 "1"',
      ].join("\n"),
    );
  });

  it("quotes token text and keeps empty nodes", () => {
    expect(debugTree(parse(lex("\n")).syntax())).toBe(
      [
        "Root@0..1",
        "  Equality@0..1",
        "    Comparison@0..1",
        "      Term@0..1",
        "        Factor@0..1",
        "          ErrorUnexpected@0..1",
        '            Newline@0..1 "\\n"',
      ].join("\n"),
    );
  });
});
