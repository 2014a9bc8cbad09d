import { PathNode } from "./node.js";

/**
 * Recursively consolidate sibling nodes that share a key.
 *
 * - A key seen only without parentheses stays terminal.
 * - A key seen at least once with a sub-path list gets the union of every
 *   such list, merged in turn. An earlier terminal occurrence is dropped.
 * - Keys keep their first-seen order.
 */
export function mergeNode(node: PathNode): PathNode;
export function mergeNode(node: PathNode | undefined): PathNode | undefined;
export function mergeNode(node: PathNode | undefined): PathNode | undefined {
  if (!node) return undefined;
  const nodes = node.nodes;
  if (nodes === undefined) return PathNode.terminal(node.key);
  return PathNode.branch(node.key, mergeSiblings(nodes));
}

function mergeSiblings(nodes: readonly PathNode[]): PathNode[] {
  // undefined = terminal so far
  const byKey = new Map<string, PathNode[] | undefined>();

  for (const node of nodes) {
    const children = node.nodes;
    if (children === undefined) {
      if (!byKey.has(node.key)) byKey.set(node.key, undefined);
      continue;
    }
    let accumulated = byKey.get(node.key);
    if (accumulated === undefined) {
      accumulated = [];
      byKey.set(node.key, accumulated);
    }
    accumulated.push(...children);
  }

  return Array.from(byKey, ([key, accumulated]) =>
    accumulated === undefined
      ? PathNode.terminal(key)
      : PathNode.branch(key, mergeSiblings(accumulated))
  );
}
