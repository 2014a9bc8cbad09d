/**
 * Raised when a path-expression token does not match the segment grammar
 * in its entirety (unbalanced parentheses, disallowed characters, ...).
 */
export class ParseError extends Error {
  constructor(
    public readonly token: string,
    public readonly expression: string
  ) {
    super(`The path expression is invalid at '${token}'.`);
    this.name = "ParseError";
  }
}

export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** Text could not be read as the declared document format. */
export class DocumentFormatError extends Error {
  constructor(
    public readonly format: string,
    public readonly detail: string
  ) {
    super(`Could not read document as ${format}: ${detail}`);
    this.name = "DocumentFormatError";
  }
}

export type ErrorKind = "parse" | "invalid_argument" | "document_format" | "internal";

export function errorKind(error: unknown): ErrorKind {
  if (error instanceof ParseError) return "parse";
  if (error instanceof InvalidArgumentError) return "invalid_argument";
  if (error instanceof DocumentFormatError) return "document_format";
  return "internal";
}

function getSuggestion(error: unknown): string {
  switch (errorKind(error)) {
    case "parse":
      return (
        "Keys may only contain letters, digits, underscores and spaces. " +
        "Nest sub-paths in balanced parentheses and separate siblings with commas, e.g. 'a,b(c,d(e))'."
      );
    case "invalid_argument":
      return "Use filter 'inclusion' to keep the named fields or 'exclusion' to remove them.";
    case "document_format":
      return "Check that inputFormat matches the document, or use 'auto' to detect it.";
    default:
      return "Unexpected failure. Retry with a smaller document or a simpler expression.";
  }
}

/**
 * Build a structured error object for tool responses.
 */
export function buildErrorContext(error: unknown): Record<string, unknown> {
  const message = error instanceof Error ? error.message : String(error);
  const result: Record<string, unknown> = {
    error: message,
    kind: errorKind(error),
  };

  if (error instanceof ParseError) {
    result.token = error.token;
    result.expression = error.expression;
  }
  if (error instanceof InvalidArgumentError) {
    result.argument = error.argument;
  }

  result.suggestion = getSuggestion(error);
  return result;
}
