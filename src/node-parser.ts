import { ParseError } from "./error-context.js";
import { mergeNode } from "./node-merger.js";
import { PathNode, ROOT_KEY } from "./node.js";

/**
 * A single segment: a key, optionally followed by a parenthesized list.
 * The list body is only checked for allowed characters here; balance and
 * nesting are checked when it is split and matched in turn.
 */
const SEGMENT_PATTERN = /^([A-Za-z0-9_ \t\n\v\f\r]*)(\(([A-Za-z0-9,()_ \t\n\v\f\r]*)\))?$/;

const EDGE_WHITESPACE = /^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g;

/** Trims ASCII whitespace only; other Unicode spaces are not key characters. */
function trimAscii(text: string): string {
  return text.replace(EDGE_WHITESPACE, "");
}

/**
 * Parse a path expression such as `"a,b(c,d(e))"` into a merged node tree
 * rooted at `ROOT`.
 *
 * - `undefined`/`null` gives a terminal root (no sub-paths stated).
 * - `""` gives a root with an empty sub-path list.
 *
 * Throws `ParseError` when any segment is malformed.
 */
export function parsePathExpression(input: string | null | undefined): PathNode {
  if (input === undefined || input === null) return PathNode.terminal(ROOT_KEY);
  const root = PathNode.branch(ROOT_KEY, parseSegmentList(input, input));
  return mergeNode(root);
}

/**
 * Split on commas at parenthesis depth 0, trimming ASCII whitespace from
 * each token. Always
 * returns at least one token.
 */
export function splitTopLevel(input: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];
    if (char === "(") {
      depth++;
    } else if (char === ")") {
      depth--;
    } else if (char === "," && depth === 0) {
      tokens.push(trimAscii(input.slice(start, i)));
      start = i + 1;
    }
  }
  tokens.push(trimAscii(input.slice(start)));

  return tokens;
}

function parseSegmentList(input: string, expression: string): PathNode[] {
  const nodes: PathNode[] = [];
  for (const token of splitTopLevel(input)) {
    // Empty tokens ("", "a,", "a()") contribute nothing.
    if (token === "") continue;
    nodes.push(parseSegment(token, expression));
  }
  return nodes;
}

function parseSegment(token: string, expression: string): PathNode {
  const match = SEGMENT_PATTERN.exec(token);
  if (!match) {
    throw new ParseError(token, expression);
  }

  const key = trimAscii(match[1]);
  const body: string | undefined = match[3];
  if (body === undefined) return PathNode.terminal(key);
  return PathNode.branch(key, parseSegmentList(body, expression));
}
