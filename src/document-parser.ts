import { XMLParser } from "fast-xml-parser";
import yaml from "js-yaml";
import { DocumentFormatError } from "./error-context.js";
import { isJsonValue, setKey } from "./json-value.js";
import type { JsonObject, JsonValue } from "./json-value.js";
import type { DocumentFormat, InputFormat, OutputFormat } from "./types.js";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
});

export function parseDocument(text: string, format: InputFormat = "auto"): JsonValue {
  if (format === "auto") {
    return parseDocument(text, detectFormat(text));
  }

  let parsed: unknown;
  try {
    parsed = parseAs(text, format);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DocumentFormatError(format, detail);
  }

  // YAML timestamps load as Date; keep them as ISO strings.
  const normalized = normalizeDates(parsed);
  if (!isJsonValue(normalized)) {
    throw new DocumentFormatError(format, "document contains values that are not JSON");
  }
  return normalized;
}

export function detectFormat(text: string): DocumentFormat {
  const trimmed = text.trim();
  if (trimmed.startsWith("<")) return "xml";
  try {
    JSON.parse(trimmed);
    return "json";
  } catch {
    // not JSON, fall through to YAML
  }
  return "yaml";
}

function parseAs(text: string, format: DocumentFormat): unknown {
  switch (format) {
    case "json":
      return JSON.parse(text);
    case "yaml":
      return yaml.load(text) ?? null;
    case "xml":
      return xmlParser.parse(text, true);
    case "csv":
      return parseCsv(text);
  }
}

function normalizeDates(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(normalizeDates);
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      Object.defineProperty(out, key, {
        value: normalizeDates(child),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
  return value;
}

export function serializeDocument(
  value: JsonValue,
  format: OutputFormat = "json",
  indent = 2
): string {
  if (format === "yaml") {
    return yaml.dump(value, { indent, noRefs: true });
  }
  return JSON.stringify(value, null, indent);
}

function parseCsv(csv: string): JsonObject[] {
  const lines = csv.split("\n").filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];

  const headers = parseCsvLine(lines[0]);
  const rows: JsonObject[] = [];

  for (let i = 1; i < lines.length; i++) {
    const values = parseCsvLine(lines[i]);
    const row: JsonObject = {};
    for (let j = 0; j < headers.length; j++) {
      setKey(row, headers[j], values[j] ?? "");
    }
    rows.push(row);
  }

  return rows;
}

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else {
      if (char === '"') {
        inQuotes = true;
      } else if (char === ",") {
        fields.push(current.trim());
        current = "";
      } else {
        current += char;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}
