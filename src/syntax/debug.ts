import { syntaxKindName } from "./kinds.js";
import { SyntaxNode, type SyntaxElement } from "./red.js";

/**
 * Indented outline of a tree, one element per line:
 *
 *   Root@0..5
 *     Equality@0..5
 *       ...
 *           Number@0..1 "1"
 */
export function debugTree(root: SyntaxNode): string {
  const lines: string[] = [];
  const stack: [SyntaxElement, number][] = [[root, 0]];

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const [element, depth] = entry;
    const { start, end } = element.textRange;
    const label = `${"  ".repeat(depth)}${syntaxKindName(element.kind)}@${start}..${end}`;
    if (element instanceof SyntaxNode) {
      lines.push(label);
      const children = element.childrenWithTokens();
      for (let i = children.length - 1; i >= 0; i--) stack.push([children[i], depth + 1]);
    } else {
      lines.push(`${label} ${JSON.stringify(element.text)}`);
    }
  }
  return lines.join("\n");
}
