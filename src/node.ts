export const ROOT_KEY = "ROOT";

/**
 * Children of a path node. "absent" (written `key`) and an empty list
 * (written `key()`) mean different things to the filters and must never be
 * collapsed into one another.
 */
export type NodeChildren =
  | { readonly kind: "absent" }
  | { readonly kind: "list"; readonly nodes: readonly PathNode[] };

export interface PathNodeJson {
  key: string;
  children: PathNodeJson[] | null;
}

const ABSENT: NodeChildren = Object.freeze({ kind: "absent" });

/**
 * One parsed path segment plus its sub-paths. Instances are frozen; merging
 * and parsing always build new nodes.
 */
export class PathNode {
  readonly key: string;
  readonly children: NodeChildren;

  private constructor(key: string, children: NodeChildren) {
    this.key = key;
    this.children = children;
    Object.freeze(this);
  }

  static terminal(key: string): PathNode {
    return new PathNode(key, ABSENT);
  }

  static branch(key: string, nodes: readonly PathNode[]): PathNode {
    return new PathNode(key, Object.freeze({ kind: "list", nodes: Object.freeze([...nodes]) }));
  }

  static of(key: string, children: NodeChildren): PathNode {
    return children.kind === "absent"
      ? PathNode.terminal(key)
      : PathNode.branch(key, children.nodes);
  }

  isTerminal(): boolean {
    return this.children.kind === "absent";
  }

  /** Sub-nodes, or `undefined` when none were stated. */
  get nodes(): readonly PathNode[] | undefined {
    return this.children.kind === "list" ? this.children.nodes : undefined;
  }

  equals(other: PathNode): boolean {
    if (this === other) return true;
    if (this.key !== other.key) return false;
    const mine = this.nodes;
    const theirs = other.nodes;
    if (mine === undefined || theirs === undefined) return mine === theirs;
    if (mine.length !== theirs.length) return false;
    return mine.every((node, i) => node.equals(theirs[i]));
  }

  /**
   * Renders back to path-expression syntax: `a`, `a()`, `a(b,c(d))`.
   */
  toString(): string {
    const nodes = this.nodes;
    if (nodes === undefined) return this.key;
    return `${this.key}(${nodes.map((node) => node.toString()).join(",")})`;
  }

  toJSON(): PathNodeJson {
    const nodes = this.nodes;
    return {
      key: this.key,
      children: nodes === undefined ? null : nodes.map((node) => node.toJSON()),
    };
  }
}
