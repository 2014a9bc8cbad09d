import { copyObject, deepCopy, hasKey, removeKey, setKey, view } from "./json-value.js";
import type { JsonArray, JsonObject, JsonValue } from "./json-value.js";
import type { PathNode } from "./node.js";
import { parsePathExpression } from "./node-parser.js";
import type { JsonFilter } from "./types.js";

/**
 * Removes the fields named by terminal nodes of a path expression and keeps
 * everything else.
 *
 * ```ts
 * exclusionFilter.apply({ a: 1, b: 2, c: 3 }, "a,b");                 // { c: 3 }
 * exclusionFilter.apply({ x: { y: { z: 5 }, w: 10 }, v: 20 }, "x(y)"); // { x: { w: 10 }, v: 20 }
 * exclusionFilter.apply({ prop: { key1: "v" } }, "prop()");           // unchanged
 * ```
 *
 * `null` doubles as the "drop this key" signal between levels: a property
 * whose filtered value comes back `null` is removed from its object, even
 * when the source value was a literal `null` reached through a sub-path.
 */
export class ExclusionFilter implements JsonFilter {
  readonly type = "exclusion";

  apply(source: JsonValue | undefined, expression: string | null | undefined): JsonValue {
    return this.applyNode(source, parsePathExpression(expression));
  }

  applyNode(source: JsonValue | undefined, node: PathNode | undefined): JsonValue {
    if (source === undefined || source === null) return null;
    if (node === undefined) return deepCopy(source);
    if (node.isTerminal()) return null;

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

  private filterObject(source: JsonObject, node: PathNode): JsonObject {
    const target = copyObject(source);
    for (const child of node.nodes ?? []) {
      if (!hasKey(target, child.key)) continue;
      const filtered = this.applyNode(target[child.key], child);
      if (filtered === null) {
        removeKey(target, child.key);
      } else {
        setKey(target, child.key, filtered);
      }
    }
    return target;
  }

  private filterArray(source: JsonArray, node: PathNode): JsonArray {
    return source.map((element) => this.applyNode(element, node));
  }
}

export const exclusionFilter = new ExclusionFilter();

export function applyExclusion(
  source: JsonValue | undefined,
  expression: string | null | undefined
): JsonValue {
  return exclusionFilter.apply(source, expression);
}
