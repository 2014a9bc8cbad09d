import type { JsonValue } from "./json-value.js";
import type { PathNode } from "./node.js";

export type FilterType = "inclusion" | "exclusion";

export const FILTER_TYPES: readonly FilterType[] = ["inclusion", "exclusion"];

/**
 * A filtering strategy. Implementations never mutate `source` and always
 * return a newly allocated value.
 */
export interface JsonFilter {
  readonly type: FilterType;
  apply(source: JsonValue | undefined, expression: string | null | undefined): JsonValue;
  applyNode(source: JsonValue | undefined, node: PathNode | undefined): JsonValue;
}

export type DocumentFormat = "json" | "yaml" | "xml" | "csv";

export type InputFormat = DocumentFormat | "auto";

export type OutputFormat = "json" | "yaml";

export interface ExpressionSuggestion {
  name: string;
  expression: string;
  filter: FilterType;
  description: string;
}
