import { deepCopy, hasKey, setKey, view } from "./json-value.js";
import type { JsonArray, JsonObject, JsonValue } from "./json-value.js";
import type { PathNode } from "./node.js";
import { parsePathExpression } from "./node-parser.js";
import type { JsonFilter } from "./types.js";

/**
 * Keeps only the fields named by a path expression.
 *
 * ```ts
 * inclusionFilter.apply({ a: 1, b: 2, c: 3 }, "a,b");             // { a: 1, b: 2 }
 * inclusionFilter.apply({ x: { y: { z: 5 }, w: 10 }, v: 20 }, "x(y)"); // { x: { y: { z: 5 } } }
 * inclusionFilter.apply([[[{ name: "john", type: 0 }]]], "name");  // [[[{ name: "john" }]]]
 * ```
 *
 * A terminal node copies everything below it. A node with a sub-path list,
 * even an empty one, admits only the listed keys. Arrays are walked element
 * by element with the same node; primitives pass through.
 */
export class InclusionFilter implements JsonFilter {
  readonly type = "inclusion";

  apply(source: JsonValue | undefined, expression: string | null | undefined): JsonValue {
    return this.applyNode(source, parsePathExpression(expression));
  }

  applyNode(source: JsonValue | undefined, node: PathNode | undefined): JsonValue {
    if (source === undefined) return null;
    if (node === undefined) return deepCopy(source);

    const v = view(source);
    switch (v.kind) {
      case "null":
        return null;
      case "object":
        return this.filterObject(v.value, node);
      case "array":
        return this.filterArray(v.value, node);
      case "string":
      case "number":
      case "boolean":
        return v.value;
    }
  }

  private filterObject(source: JsonObject, node: PathNode): JsonValue {
    const children = node.nodes;
    if (children === undefined) return deepCopy(source);

    const target: JsonObject = {};
    for (const child of children) {
      if (hasKey(source, child.key)) {
        setKey(target, child.key, this.applyNode(source[child.key], child));
      }
    }
    return target;
  }

  private filterArray(source: JsonArray, node: PathNode): JsonArray {
    return source.map((element) => this.applyNode(element, node));
  }
}

export const inclusionFilter = new InclusionFilter();

export function applyInclusion(
  source: JsonValue | undefined,
  expression: string | null | undefined
): JsonValue {
  return inclusionFilter.apply(source, expression);
}
