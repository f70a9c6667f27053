import { SyntaxKind, syntaxKindName } from "./kinds.js";
import { InternalError } from "../errors/internal.js";

// =============================================================================
// Green elements: immutable, position-free, shareable between trees
// =============================================================================

export interface GreenToken {
  readonly type: "token";
  readonly kind: SyntaxKind;
  readonly text: string;
}

export interface GreenNode {
  readonly type: "node";
  readonly kind: SyntaxKind;
  readonly children: readonly GreenElement[];
  /** Sum of the text lengths of all leaves below this node. */
  readonly textLength: number;
}

export type GreenElement = GreenNode | GreenToken;

export function greenTextLength(element: GreenElement): number {
  return element.type === "token" ? element.text.length : element.textLength;
}

/** Concatenated leaf text, depth first. */
export function greenText(element: GreenElement): string {
  const parts: string[] = [];
  const stack: GreenElement[] = [element];
  for (let next = stack.pop(); next; next = stack.pop()) {
    if (next.type === "token") {
      parts.push(next.text);
    } else {
      for (let i = next.children.length - 1; i >= 0; i--) stack.push(next.children[i]);
    }
  }
  return parts.join("");
}

// =============================================================================
// Interning
// =============================================================================

// Larger nodes are rarely repeated, and keying them costs more than sharing saves.
const MAX_CACHED_CHILDREN = 3;

/**
 * Hash-conses green elements so that equal tokens and small equal subtrees
 * are the same object. Can be shared by several builders.
 */
export class NodeCache {
  private tokens = new Map<string, GreenToken>();
  private nodes = new Map<string, GreenNode>();
  private ids = new WeakMap<GreenElement, number>();
  private nextId = 0;

  token(kind: SyntaxKind, text: string): GreenToken {
    const key = `${kind}:${text}`;
    const cached = this.tokens.get(key);
    if (cached) return cached;

    const token: GreenToken = Object.freeze({ type: "token", kind, text });
    this.tokens.set(key, token);
    return token;
  }

  node(kind: SyntaxKind, children: readonly GreenElement[]): GreenNode {
    if (children.length > MAX_CACHED_CHILDREN) return makeNode(kind, children);

    const key = `${kind}(${children.map((c) => this.idOf(c)).join(",")})`;
    const cached = this.nodes.get(key);
    if (cached) return cached;

    const node = makeNode(kind, children);
    this.nodes.set(key, node);
    return node;
  }

  private idOf(element: GreenElement): number {
    let id = this.ids.get(element);
    if (id === undefined) {
      id = this.nextId++;
      this.ids.set(element, id);
    }
    return id;
  }
}

function makeNode(kind: SyntaxKind, children: readonly GreenElement[]): GreenNode {
  const textLength = children.reduce((sum, c) => sum + greenTextLength(c), 0);
  return Object.freeze({ type: "node", kind, children: Object.freeze([...children]), textLength });
}

// =============================================================================
// Builder
// =============================================================================

interface OpenNode {
  kind: SyntaxKind;
  /** Index into `children` where this node's children begin. */
  firstChild: number;
}

/**
 * Assembles a green tree from start/token/finish events. Children of every
 * open node live on one flat stack; finishing a node pops its slice and
 * pushes the frozen node in its place.
 */
export class GreenNodeBuilder {
  private parents: OpenNode[] = [];
  private children: GreenElement[] = [];
  private root: GreenNode | null = null;
  private cache: NodeCache;

  constructor(cache: NodeCache = new NodeCache()) {
    this.cache = cache;
  }

  startNode(kind: SyntaxKind): void {
    if (this.root) {
      throw new InternalError(`startNode(${syntaxKindName(kind)}) after the root node was finished`);
    }
    this.parents.push({ kind, firstChild: this.children.length });
  }

  token(kind: SyntaxKind, text: string): void {
    if (this.parents.length === 0) {
      throw new InternalError(`token(${syntaxKindName(kind)}) outside of any node`);
    }
    this.children.push(this.cache.token(kind, text));
  }

  finishNode(): void {
    const open = this.parents.pop();
    if (!open) throw new InternalError("finishNode() without a matching startNode()");

    const node = this.cache.node(open.kind, this.children.splice(open.firstChild));
    if (this.parents.length === 0) {
      this.root = node;
    } else {
      this.children.push(node);
    }
  }

  finish(): GreenNode {
    if (this.parents.length > 0) {
      const open = this.parents.map((p) => syntaxKindName(p.kind)).join(", ");
      throw new InternalError(`finish() with unclosed nodes: ${open}`);
    }
    if (!this.root) throw new InternalError("finish() before any node was built");
    return this.root;
  }
}
