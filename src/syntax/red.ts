import type { SyntaxKind } from "./kinds.js";
import { greenText, greenTextLength, type GreenNode, type GreenToken } from "./green.js";

/** Half-open range of UTF-16 offsets into the source text. */
export interface TextRange {
  readonly start: number;
  readonly end: number;
}

export type SyntaxElement = SyntaxNode | SyntaxToken;

/**
 * Read-only view of a green node at a concrete position: knows its parent
 * and absolute offset. Children are materialized on first access; the green
 * tree underneath is never touched.
 */
export class SyntaxNode {
  readonly green: GreenNode;
  readonly parent: SyntaxNode | null;
  readonly offset: number;
  readonly indexInParent: number;
  private childCache: readonly SyntaxElement[] | null = null;

  private constructor(green: GreenNode, parent: SyntaxNode | null, offset: number, indexInParent: number) {
    this.green = green;
    this.parent = parent;
    this.offset = offset;
    this.indexInParent = indexInParent;
  }

  static newRoot(green: GreenNode): SyntaxNode {
    return new SyntaxNode(green, null, 0, 0);
  }

  get kind(): SyntaxKind {
    return this.green.kind;
  }

  get textRange(): TextRange {
    return { start: this.offset, end: this.offset + this.green.textLength };
  }

  text(): string {
    return greenText(this.green);
  }

  childrenWithTokens(): readonly SyntaxElement[] {
    if (this.childCache) return this.childCache;

    const children: SyntaxElement[] = [];
    let offset = this.offset;
    this.green.children.forEach((child, index) => {
      children.push(
        child.type === "node"
          ? new SyntaxNode(child, this, offset, index)
          : new SyntaxToken(child, this, offset, index),
      );
      offset += greenTextLength(child);
    });
    this.childCache = children;
    return children;
  }

  children(): SyntaxNode[] {
    return this.childrenWithTokens().filter((c): c is SyntaxNode => c instanceof SyntaxNode);
  }

  get firstChild(): SyntaxNode | null {
    return this.children()[0] ?? null;
  }

  get lastChild(): SyntaxNode | null {
    const nodes = this.children();
    return nodes[nodes.length - 1] ?? null;
  }

  get nextSibling(): SyntaxNode | null {
    return siblingNode(this, 1);
  }

  get prevSibling(): SyntaxNode | null {
    return siblingNode(this, -1);
  }

  get nextSiblingOrToken(): SyntaxElement | null {
    return this.parent?.childrenWithTokens()[this.indexInParent + 1] ?? null;
  }

  get prevSiblingOrToken(): SyntaxElement | null {
    return this.parent?.childrenWithTokens()[this.indexInParent - 1] ?? null;
  }

  /** This node, then each parent up to the root. */
  *ancestors(): Generator<SyntaxNode> {
    let node: SyntaxNode | null = this;
    while (node) {
      yield node;
      node = node.parent;
    }
  }

  /** Nodes in preorder, starting with this one. */
  *descendants(): Generator<SyntaxNode> {
    for (const element of this.descendantsWithTokens()) {
      if (element instanceof SyntaxNode) yield element;
    }
  }

  *descendantsWithTokens(): Generator<SyntaxElement> {
    const stack: SyntaxElement[] = [this];
    for (let element = stack.pop(); element; element = stack.pop()) {
      yield element;
      if (element instanceof SyntaxNode) {
        const children = element.childrenWithTokens();
        for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
      }
    }
  }

  *tokens(): Generator<SyntaxToken> {
    for (const element of this.descendantsWithTokens()) {
      if (element instanceof SyntaxToken) yield element;
    }
  }

  get firstToken(): SyntaxToken | null {
    for (const token of this.tokens()) return token;
    return null;
  }

  get lastToken(): SyntaxToken | null {
    // Popping from the end visits the subtree in reverse preorder.
    const stack: SyntaxElement[] = [];
    pushAll(stack, this.childrenWithTokens());
    for (let element = stack.pop(); element; element = stack.pop()) {
      if (element instanceof SyntaxToken) return element;
      pushAll(stack, element.childrenWithTokens());
    }
    return null;
  }

  /**
   * The token covering `offset`. At a boundary the token starting there wins;
   * the end of the node maps to its last token.
   */
  tokenAtOffset(offset: number): SyntaxToken | null {
    const { start, end } = this.textRange;
    if (offset < start || offset > end) return null;
    if (offset === end) return this.lastToken;

    let node: SyntaxNode = this;
    for (;;) {
      const child = node.childrenWithTokens().find((c) => offset >= c.offset && offset < c.textRange.end);
      if (!child) return null;
      if (child instanceof SyntaxToken) return child;
      node = child;
    }
  }

  /** Same green node at the same position; views from separate `newRoot` calls compare equal. */
  equals(other: SyntaxNode): boolean {
    return this.green === other.green && this.offset === other.offset;
  }
}

export class SyntaxToken {
  readonly green: GreenToken;
  readonly parent: SyntaxNode;
  readonly offset: number;
  readonly indexInParent: number;

  constructor(green: GreenToken, parent: SyntaxNode, offset: number, indexInParent: number) {
    this.green = green;
    this.parent = parent;
    this.offset = offset;
    this.indexInParent = indexInParent;
  }

  get kind(): SyntaxKind {
    return this.green.kind;
  }

  get text(): string {
    return this.green.text;
  }

  get textRange(): TextRange {
    return { start: this.offset, end: this.offset + this.green.text.length };
  }

  get nextSiblingOrToken(): SyntaxElement | null {
    return this.parent.childrenWithTokens()[this.indexInParent + 1] ?? null;
  }

  get prevSiblingOrToken(): SyntaxElement | null {
    return this.parent.childrenWithTokens()[this.indexInParent - 1] ?? null;
  }

  /** The token that follows this one in the whole tree, crossing node boundaries. */
  get nextToken(): SyntaxToken | null {
    let element: SyntaxElement = this;
    for (;;) {
      let next: SyntaxElement | null = element.nextSiblingOrToken;
      while (next) {
        const token = next instanceof SyntaxNode ? next.firstToken : next;
        if (token) return token;
        next = next.nextSiblingOrToken;
      }
      if (!element.parent) return null;
      element = element.parent;
    }
  }
}

function pushAll(stack: SyntaxElement[], elements: readonly SyntaxElement[]): void {
  for (const element of elements) stack.push(element);
}

function siblingNode(node: SyntaxNode, step: 1 | -1): SyntaxNode | null {
  if (!node.parent) return null;
  const siblings = node.parent.childrenWithTokens();
  for (let i = node.indexInParent + step; i >= 0 && i < siblings.length; i += step) {
    const sibling = siblings[i];
    if (sibling instanceof SyntaxNode) return sibling;
  }
  return null;
}
