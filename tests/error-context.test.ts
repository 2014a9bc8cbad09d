import { describe, it, expect } from "vitest";
import {
  buildErrorContext,
  DocumentFormatError,
  errorKind,
  InvalidArgumentError,
  ParseError,
} from "../src/error-context.js";

describe("error classes", () => {
  it("ParseError carries the token and expression", () => {
    const error = new ParseError("a(b", "x,a(b");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ParseError");
    expect(error.message).toBe("The path expression is invalid at 'a(b'.");
    expect(error.token).toBe("a(b");
    expect(error.expression).toBe("x,a(b");
  });

  it("InvalidArgumentError carries the argument", () => {
    const error = new InvalidArgumentError("bad", "filter", "both");
    expect(error.name).toBe("InvalidArgumentError");
    expect(error.argument).toBe("filter");
    expect(error.value).toBe("both");
  });

  it("DocumentFormatError names the format", () => {
    const error = new DocumentFormatError("yaml", "bad indentation");
    expect(error.message).toBe("Could not read document as yaml: bad indentation");
  });
});

describe("errorKind", () => {
  it("classifies known errors", () => {
    expect(errorKind(new ParseError("(", "("))).toBe("parse");
    expect(errorKind(new InvalidArgumentError("x", "filter", 1))).toBe("invalid_argument");
    expect(errorKind(new DocumentFormatError("json", "x"))).toBe("document_format");
    expect(errorKind(new Error("boom"))).toBe("internal");
    expect(errorKind("boom")).toBe("internal");
  });
});

describe("buildErrorContext", () => {
  it("includes token and expression for parse errors", () => {
    const context = buildErrorContext(new ParseError("a(b", "a(b"));
    expect(context).toEqual({
      error: "The path expression is invalid at 'a(b'.",
      kind: "parse",
      token: "a(b",
      expression: "a(b",
      suggestion:
        "Keys may only contain letters, digits, underscores and spaces. " +
        "Nest sub-paths in balanced parentheses and separate siblings with commas, e.g. 'a,b(c,d(e))'.",
    });
  });

  it("includes the argument for invalid arguments", () => {
    const context = buildErrorContext(new InvalidArgumentError("Unknown filter type: x.", "filter", "x"));
    expect(context.argument).toBe("filter");
    expect(context.kind).toBe("invalid_argument");
    expect(context.error).toBe("Unknown filter type: x.");
  });

  it("stringifies non-Error values", () => {
    const context = buildErrorContext(42);
    expect(context.error).toBe("42");
    expect(context.kind).toBe("internal");
  });
});
