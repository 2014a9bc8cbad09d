export { PathNode, ROOT_KEY } from "./node.js";
export type { NodeChildren, PathNodeJson } from "./node.js";
export { parsePathExpression, splitTopLevel } from "./node-parser.js";
export { mergeNode } from "./node-merger.js";
export { InclusionFilter, inclusionFilter, applyInclusion } from "./inclusion-filter.js";
export { ExclusionFilter, exclusionFilter, applyExclusion } from "./exclusion-filter.js";
export { selectFilter, isFilterType } from "./filter.js";
export { FILTER_TYPES } from "./types.js";
export type { FilterType, JsonFilter } from "./types.js";
export { ParseError, InvalidArgumentError, DocumentFormatError } from "./error-context.js";
export { deepCopy, isJsonValue, kindOf } from "./json-value.js";
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive, JsonKind } from "./json-value.js";
