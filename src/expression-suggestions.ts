import { view } from "./json-value.js";
import type { JsonObject, JsonValue } from "./json-value.js";
import type { ExpressionSuggestion } from "./types.js";

const MAX_DEPTH = 2;
const MAX_FIELDS_PER_LEVEL = 8;
const EXPRESSIBLE_KEY = /^[A-Za-z0-9_]+(?:[ \t]+[A-Za-z0-9_]+)*$/;

/**
 * Walk down through arrays to the first object they contain, the shape the
 * filters see once they map over array elements.
 */
function firstObject(value: JsonValue): JsonObject | null {
  const v = view(value);
  switch (v.kind) {
    case "object":
      return v.value;
    case "array":
      for (const element of v.value) {
        const found = firstObject(element);
        if (found) return found;
      }
      return null;
    default:
      return null;
  }
}

function expressibleKeys(obj: JsonObject): string[] {
  return Object.keys(obj).filter((key) => EXPRESSIBLE_KEY.test(key));
}

function buildDepthLimitedExpression(obj: JsonObject, depth: number): string | null {
  const parts: string[] = [];
  for (const key of expressibleKeys(obj).slice(0, MAX_FIELDS_PER_LEVEL)) {
    const nested = depth < MAX_DEPTH ? firstObject(obj[key]) : null;
    const inner = nested ? buildDepthLimitedExpression(nested, depth + 1) : null;
    parts.push(inner ? `${key}(${inner})` : key);
  }
  return parts.length > 0 ? parts.join(",") : null;
}

function scalarKeys(obj: JsonObject): string[] {
  return expressibleKeys(obj).filter((key) => firstObject(obj[key]) === null);
}

function nestedKeys(obj: JsonObject): string[] {
  return expressibleKeys(obj).filter((key) => firstObject(obj[key]) !== null);
}

export function suggestExpressions(value: JsonValue): ExpressionSuggestion[] {
  const suggestions: ExpressionSuggestion[] = [];
  const root = firstObject(value);
  if (!root) return suggestions;

  const scalars = scalarKeys(root).slice(0, MAX_FIELDS_PER_LEVEL);
  if (scalars.length > 0) {
    suggestions.push({
      name: "scalar_fields",
      expression: scalars.join(","),
      filter: "inclusion",
      description: "Keep only top-level fields that hold plain values",
    });
  }

  const nested = nestedKeys(root);
  if (nested.length > 0) {
    suggestions.push({
      name: "drop_nested",
      expression: nested.slice(0, MAX_FIELDS_PER_LEVEL).join(","),
      filter: "exclusion",
      description: "Remove top-level fields that hold objects or arrays of objects",
    });
  }

  const deep = buildDepthLimitedExpression(root, 1);
  if (deep && deep !== scalars.join(",")) {
    suggestions.push({
      name: "outline",
      expression: deep,
      filter: "inclusion",
      description: `Keep up to ${MAX_FIELDS_PER_LEVEL} fields per level, ${MAX_DEPTH} levels deep`,
    });
  }

  return suggestions;
}
