#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { initLogger } from "./logger.js";
import { createToolHandlers } from "./tools.js";

const config = loadConfig();
initLogger(config.logPath ?? null);
const handlers = createToolHandlers(config);

const filterTypeSchema = z.enum(["inclusion", "exclusion"]);
const inputFormatSchema = z.enum(["auto", "json", "yaml", "xml", "csv"]);
const outputFormatSchema = z.enum(["json", "yaml"]);

const server = new McpServer({
  name: config.name,
  version: "1.0.0",
});

// --- Tool 1: filter_json ---
server.tool(
  "filter_json",
  "Filter a JSON document with a path expression. " +
    "Expressions list keys separated by commas; nest sub-keys in parentheses, e.g. 'id,owner(login,url),items(name)'. " +
    "With filter 'inclusion' only the named fields are kept; with 'exclusion' they are removed and everything else is kept. " +
    "A key without parentheses selects its whole value; 'key()' selects nothing inside it. " +
    "Arrays are filtered element by element. " +
    `Default filter: ${config.defaultFilter}.`,
  {
    data: z
      .string()
      .optional()
      .describe("Document text (JSON, YAML, XML or CSV). Omit when using dataKey."),
    dataKey: z
      .string()
      .optional()
      .describe("Key returned by load_document. Omit when passing data."),
    expression: z
      .string()
      .optional()
      .describe("Path expression, e.g. 'a,b(c,d)'. Omit to select the whole document."),
    preset: z
      .string()
      .optional()
      .describe("Name of a configured preset expression (see list_presets)"),
    filter: filterTypeSchema
      .optional()
      .describe("'inclusion' keeps the named fields, 'exclusion' removes them"),
    inputFormat: inputFormatSchema
      .optional()
      .describe("Format of data (default: auto-detect)"),
    outputFormat: outputFormatSchema
      .optional()
      .describe("Format of the result (default: json)"),
  },
  async (args) => handlers.filterJson(args)
);

// --- Tool 2: load_document ---
server.tool(
  "load_document",
  "Load a document from a file path or inline text and keep it for 5 minutes. " +
    "Returns a dataKey for filter_json plus suggested expressions built from the document's fields.",
  {
    path: z.string().optional().describe("Path to a JSON, YAML, XML or CSV file"),
    text: z.string().optional().describe("Inline document text"),
    format: inputFormatSchema.optional().describe("Document format (default: auto-detect)"),
  },
  async (args) => handlers.loadDocument(args)
);

// --- Tool 3: parse_expression ---
server.tool(
  "parse_expression",
  "Validate a path expression and show it after duplicate keys are merged, " +
    "e.g. 'a(b(c),b(d))' normalizes to 'a(b(c,d))'.",
  {
    expression: z.string().describe("Path expression to check"),
  },
  async (args) => handlers.parseExpression(args)
);

// --- Tool 4: list_presets ---
server.tool(
  "list_presets",
  "List the preset expressions configured with --preset and the default filter.",
  {},
  async () => handlers.listPresets()
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${config.name} MCP Server running on stdio`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
