export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonKind = "object" | "array" | "string" | "number" | "boolean" | "null";

/**
 * Tagged view of a JSON value. Switching on `kind` narrows `value`, so tree
 * walks can match exhaustively instead of casting.
 */
export type JsonView =
  | { kind: "object"; value: JsonObject }
  | { kind: "array"; value: JsonArray }
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null"; value: null };

export function view(value: JsonValue): JsonView {
  if (value === null) return { kind: "null", value };
  if (Array.isArray(value)) return { kind: "array", value };
  switch (typeof value) {
    case "string":
      return { kind: "string", value };
    case "number":
      return { kind: "number", value };
    case "boolean":
      return { kind: "boolean", value };
    default:
      return { kind: "object", value };
  }
}

export function kindOf(value: JsonValue): JsonKind {
  return view(value).kind;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Runtime guard for values arriving from text parsers or tool arguments.
 * Non-finite numbers and class instances (Date, Map, ...) are rejected.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (!isPlainObject(value)) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Writes as an own data property, so keys like "__proto__" stay plain keys. */
export function setKey(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function removeKey(obj: JsonObject, key: string): void {
  delete obj[key];
}

export function deepCopy(value: JsonValue): JsonValue {
  const v = view(value);
  switch (v.kind) {
    case "array":
      return v.value.map(deepCopy);
    case "object":
      return copyObject(v.value);
    default:
      return v.value;
  }
}

export function copyObject(source: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [key, child] of Object.entries(source)) {
    setKey(copy, key, deepCopy(child));
  }
  return copy;
}
