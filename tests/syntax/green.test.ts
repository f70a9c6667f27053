import { describe, it, expect } from "vitest";
import { SyntaxKind } from "../../src/syntax/kinds.js";
import { GreenNodeBuilder, NodeCache, greenText, type GreenElement, type GreenNode } from "../../src/syntax/green.js";
import { InternalError } from "../../src/errors/internal.js";

function child(node: GreenNode, index: number): GreenElement {
  return node.children[index];
}

function buildSum(builder: GreenNodeBuilder): GreenNode {
  builder.startNode(SyntaxKind.Term);
  builder.startNode(SyntaxKind.Factor);
  builder.token(SyntaxKind.Number, "1");
  builder.finishNode();
  builder.token(SyntaxKind.Plus, "+");
  builder.startNode(SyntaxKind.Factor);
  builder.token(SyntaxKind.Number, "1");
  builder.finishNode();
  builder.finishNode();
  return builder.finish();
}

describe("GreenNodeBuilder", () => {
  it("nests nodes in the order they are opened and closed", () => {
    const tree = buildSum(new GreenNodeBuilder());
    expect(tree.kind).toBe(SyntaxKind.Term);
    expect(tree.children.map((c) => c.kind)).toEqual([SyntaxKind.Factor, SyntaxKind.Plus, SyntaxKind.Factor]);
    expect(greenText(tree)).toBe("1+1");
    expect(tree.textLength).toBe(3);
  });

  it("freezes finished nodes", () => {
    const tree = buildSum(new GreenNodeBuilder());
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.children)).toBe(true);
    expect(Object.isFrozen(child(tree, 1))).toBe(true);
  });

  it("shares identical tokens and small subtrees", () => {
    const tree = buildSum(new GreenNodeBuilder());
    expect(child(tree, 0)).toBe(child(tree, 2));
  });

  it("shares elements between builders using one cache", () => {
    const cache = new NodeCache();
    const first = buildSum(new GreenNodeBuilder(cache));
    const second = buildSum(new GreenNodeBuilder(cache));
    expect(second).toBe(first);
    expect(buildSum(new GreenNodeBuilder())).not.toBe(first);
  });

  it("builds nodes with many children without sharing them", () => {
    const builder = new GreenNodeBuilder();
    builder.startNode(SyntaxKind.Root);
    for (let i = 0; i < 2; i++) {
      builder.startNode(SyntaxKind.Factor);
      for (const text of ["2", "*", "3", "*", "4"]) {
        builder.token(text === "*" ? SyntaxKind.Star : SyntaxKind.Number, text);
      }
      builder.finishNode();
    }
    builder.finishNode();
    const tree = builder.finish();

    expect(child(tree, 0)).not.toBe(child(tree, 1));
    expect(greenText(child(tree, 0))).toBe(greenText(child(tree, 1)));
    expect(greenText(tree)).toBe("2*3*42*3*4");
  });

  it("keeps an empty node", () => {
    const builder = new GreenNodeBuilder();
    builder.startNode(SyntaxKind.Root);
    builder.startNode(SyntaxKind.Factor);
    builder.finishNode();
    builder.finishNode();
    const tree = builder.finish();
    expect(tree.children).toHaveLength(1);
    expect(tree.textLength).toBe(0);
  });

  describe("misuse", () => {
    it("rejects finishNode without an open node", () => {
      expect(() => new GreenNodeBuilder().finishNode()).toThrow(InternalError);
    });

    it("rejects tokens outside a node", () => {
      expect(() => new GreenNodeBuilder().token(SyntaxKind.Number, "1")).toThrow(
        "internal error: token(Number) outside of any node",
      );
    });

    it("rejects finish with open nodes", () => {
      const builder = new GreenNodeBuilder();
      builder.startNode(SyntaxKind.Root);
      builder.startNode(SyntaxKind.Equality);
      expect(() => builder.finish()).toThrow("internal error: finish() with unclosed nodes: Root, Equality");
    });

    it("rejects finish before anything was built", () => {
      expect(() => new GreenNodeBuilder().finish()).toThrow(InternalError);
    });

    it("rejects a second root", () => {
      const builder = new GreenNodeBuilder();
      builder.startNode(SyntaxKind.Root);
      builder.finishNode();
      expect(() => builder.startNode(SyntaxKind.Root)).toThrow(InternalError);
    });
  });
});
