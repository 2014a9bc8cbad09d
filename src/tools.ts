import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { FilterServerConfig } from "./config.js";
import { loadDocument, storeDocument } from "./data-cache.js";
import { parseDocument, serializeDocument } from "./document-parser.js";
import { buildErrorContext, InvalidArgumentError } from "./error-context.js";
import { getParsedExpression } from "./expression-cache.js";
import { suggestExpressions } from "./expression-suggestions.js";
import { selectFilter } from "./filter.js";
import { kindOf } from "./json-value.js";
import type { JsonValue } from "./json-value.js";
import { logEntry } from "./logger.js";
import { parsePathExpression } from "./node-parser.js";
import type { FilterType, InputFormat, OutputFormat } from "./types.js";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: true;
}

export interface FilterJsonArgs {
  data?: string;
  dataKey?: string;
  expression?: string;
  preset?: string;
  filter?: FilterType;
  inputFormat?: InputFormat;
  outputFormat?: OutputFormat;
}

export interface LoadDocumentArgs {
  path?: string;
  text?: string;
  format?: InputFormat;
}

function textResult(value: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(error: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(buildErrorContext(error), null, 2) }],
    isError: true,
  };
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf-8");
}

export function createToolHandlers(config: FilterServerConfig) {
  function checkSize(text: string): number {
    const size = byteLength(text);
    if (size > config.maxInputBytes) {
      throw new InvalidArgumentError(
        `Document is ${size} bytes; the limit is ${config.maxInputBytes}.`,
        "data",
        size
      );
    }
    return size;
  }

  function resolveExpression(args: FilterJsonArgs): string | undefined {
    if (args.expression !== undefined && args.preset !== undefined) {
      throw new InvalidArgumentError(
        "Provide either 'expression' or 'preset', not both.",
        "preset",
        args.preset
      );
    }
    if (args.preset === undefined) return args.expression;
    if (!Object.hasOwn(config.presets, args.preset)) {
      throw new InvalidArgumentError(
        `Unknown preset "${args.preset}". Use list_presets to see configured presets.`,
        "preset",
        args.preset
      );
    }
    return config.presets[args.preset];
  }

  function resolveDocument(args: FilterJsonArgs): { document: JsonValue; inputBytes: number } {
    if (args.data !== undefined && args.dataKey !== undefined) {
      throw new InvalidArgumentError("Provide either 'data' or 'dataKey', not both.", "dataKey", args.dataKey);
    }
    if (args.data !== undefined) {
      const inputBytes = checkSize(args.data);
      return { document: parseDocument(args.data, args.inputFormat ?? "auto"), inputBytes };
    }
    if (args.dataKey !== undefined) {
      const stored = loadDocument(args.dataKey);
      if (!stored) {
        throw new InvalidArgumentError(
          `No document stored under "${args.dataKey}" (it may have expired). Use load_document again.`,
          "dataKey",
          args.dataKey
        );
      }
      return { document: stored.data, inputBytes: byteLength(JSON.stringify(stored.data)) };
    }
    throw new InvalidArgumentError("Provide 'data' or 'dataKey'.", "data", undefined);
  }

  async function filterJson(args: FilterJsonArgs): Promise<ToolResult> {
    const started = Date.now();
    const filterType = args.filter ?? config.defaultFilter;
    let expression: string | undefined;
    let inputBytes = 0;
    try {
      expression = resolveExpression(args);
      const resolved = resolveDocument(args);
      inputBytes = resolved.inputBytes;

      const filter = selectFilter(filterType);
      const node =
        expression === undefined ? parsePathExpression(undefined) : getParsedExpression(expression);
      const result = filter.applyNode(resolved.document, node);
      const text = serializeDocument(result, args.outputFormat ?? "json");

      await logEntry({
        timestamp: new Date(started).toISOString(),
        tool: "filter_json",
        filterType,
        expression,
        inputBytes,
        outputBytes: byteLength(text),
        document: result,
        durationMs: Date.now() - started,
      });
      return { content: [{ type: "text" as const, text }] };
    } catch (error: unknown) {
      await logEntry({
        timestamp: new Date(started).toISOString(),
        tool: "filter_json",
        filterType,
        expression,
        inputBytes,
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - started,
      });
      return errorResult(error);
    }
  }

  async function loadDocumentTool(args: LoadDocumentArgs): Promise<ToolResult> {
    const started = Date.now();
    try {
      if ((args.path === undefined) === (args.text === undefined)) {
        throw new InvalidArgumentError("Provide exactly one of 'path' or 'text'.", "path", args.path);
      }
      const source = args.path !== undefined ? resolve(args.path) : "inline";
      const text = args.path !== undefined ? await readFile(source, "utf-8") : (args.text ?? "");
      const inputBytes = checkSize(text);
      const format = args.format ?? "auto";
      const document = parseDocument(text, format);
      const dataKey = storeDocument({ source, format, data: document });

      await logEntry({
        timestamp: new Date(started).toISOString(),
        tool: "load_document",
        inputBytes,
        durationMs: Date.now() - started,
      });
      return textResult({
        dataKey,
        source,
        kind: kindOf(document),
        suggestions: suggestExpressions(document),
      });
    } catch (error: unknown) {
      return errorResult(error);
    }
  }

  function parseExpression(args: { expression: string }): ToolResult {
    try {
      const node = parsePathExpression(args.expression);
      const nodes = node.nodes ?? [];
      return textResult({
        normalized: nodes.map((child) => child.toString()).join(","),
        tree: nodes.map((child) => child.toJSON()),
      });
    } catch (error: unknown) {
      return errorResult(error);
    }
  }

  function listPresets(): ToolResult {
    return textResult({
      defaultFilter: config.defaultFilter,
      presets: Object.entries(config.presets).map(([name, expression]) => ({ name, expression })),
    });
  }

  return { filterJson, loadDocument: loadDocumentTool, parseExpression, listPresets };
}
