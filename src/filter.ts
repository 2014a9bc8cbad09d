import { InvalidArgumentError } from "./error-context.js";
import { exclusionFilter } from "./exclusion-filter.js";
import { inclusionFilter } from "./inclusion-filter.js";
import { FILTER_TYPES } from "./types.js";
import type { FilterType, JsonFilter } from "./types.js";

const FILTERS: Record<FilterType, JsonFilter> = {
  inclusion: inclusionFilter,
  exclusion: exclusionFilter,
};

export function isFilterType(value: unknown): value is FilterType {
  return FILTER_TYPES.some((type) => type === value);
}

/**
 * Map a filter type to its strategy. Throws `InvalidArgumentError` when the
 * type is missing or unknown.
 */
export function selectFilter(type: string | null | undefined): JsonFilter {
  if (type === null || type === undefined) {
    throw new InvalidArgumentError("The filter type can't be empty.", "filter", type);
  }
  if (!isFilterType(type)) {
    throw new InvalidArgumentError(`Unknown filter type: ${type}.`, "filter", type);
  }
  return FILTERS[type];
}
