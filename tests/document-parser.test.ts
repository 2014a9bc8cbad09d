import { describe, it, expect } from "vitest";
import { detectFormat, parseDocument, serializeDocument } from "../src/document-parser.js";
import { DocumentFormatError } from "../src/error-context.js";

describe("parseDocument", () => {
  describe("JSON", () => {
    it("parses JSON text", () => {
      expect(parseDocument('{"a":1}', "json")).toEqual({ a: 1 });
    });

    it("throws DocumentFormatError on malformed JSON", () => {
      expect(() => parseDocument("not json", "json")).toThrow(DocumentFormatError);
    });
  });

  describe("YAML", () => {
    it("parses a mapping", () => {
      expect(parseDocument("name: test\ncount: 3\n", "yaml")).toEqual({ name: "test", count: 3 });
    });

    it("turns timestamps into ISO strings", () => {
      expect(parseDocument("at: 2024-01-02\n", "yaml")).toEqual({ at: "2024-01-02T00:00:00.000Z" });
    });

    it("reads an empty document as null", () => {
      expect(parseDocument("", "yaml")).toBeNull();
    });
  });

  describe("XML", () => {
    it("parses elements", () => {
      expect(parseDocument("<root><name>test</name></root>", "xml")).toEqual({ root: { name: "test" } });
    });

    it("keeps attributes with a prefix", () => {
      expect(parseDocument('<item id="x">val</item>', "xml")).toEqual({
        item: { "@_id": "x", "#text": "val" },
      });
    });
  });

  describe("CSV", () => {
    it("parses simple CSV with headers", () => {
      expect(parseDocument("name,age\nAlice,30\nBob,25", "csv")).toEqual([
        { name: "Alice", age: "30" },
        { name: "Bob", age: "25" },
      ]);
    });

    it("handles quoted fields", () => {
      expect(parseDocument('a,b\n"x, y","say ""hi"""', "csv")).toEqual([{ a: "x, y", b: 'say "hi"' }]);
    });

    it("keeps a __proto__ header as a data column", () => {
      const rows = parseDocument("__proto__,b\nx,y", "csv");
      expect(Array.isArray(rows)).toBe(true);
      const row = Array.isArray(rows) ? rows[0] : null;
      expect(Object.keys(row ?? {})).toEqual(["__proto__", "b"]);
      expect(Object.getOwnPropertyDescriptor(row, "__proto__")?.value).toBe("x");
      expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
    });

    it("returns an empty array for empty input", () => {
      expect(parseDocument("", "csv")).toEqual([]);
    });
  });

  describe("auto", () => {
    it("detects JSON", () => {
      expect(parseDocument("[1,2]")).toEqual([1, 2]);
    });

    it("detects XML", () => {
      expect(parseDocument("<a>1</a>")).toEqual({ a: 1 });
    });

    it("falls back to YAML", () => {
      expect(parseDocument("a:\n  - b\n")).toEqual({ a: ["b"] });
    });
  });
});

describe("detectFormat", () => {
  it("recognizes each format", () => {
    expect(detectFormat('{"a":1}')).toBe("json");
    expect(detectFormat("<x/>")).toBe("xml");
    expect(detectFormat("a: 1")).toBe("yaml");
  });
});

describe("serializeDocument", () => {
  it("writes indented JSON by default", () => {
    expect(serializeDocument({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
  });

  it("writes compact JSON with indent 0", () => {
    expect(serializeDocument({ a: 1 }, "json", 0)).toBe('{"a":1}');
  });

  it("writes YAML", () => {
    expect(serializeDocument({ a: 1, b: ["x"] }, "yaml")).toBe("a: 1\nb:\n  - x\n");
  });
});
