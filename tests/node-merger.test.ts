import { describe, it, expect } from "vitest";
import { mergeNode } from "../src/node-merger.js";
import { PathNode } from "../src/node.js";
import { parsePathExpression } from "../src/node-parser.js";

const t = PathNode.terminal;
const b = PathNode.branch;

describe("mergeNode", () => {
  it("returns undefined for undefined", () => {
    expect(mergeNode(undefined)).toBeUndefined();
  });

  it("keeps a single terminal node", () => {
    expect(mergeNode(t("a")).toString()).toBe("a");
  });

  it("keeps an empty list", () => {
    expect(mergeNode(b("a", [])).toString()).toBe("a()");
  });

  it("unions the lists of duplicate keys", () => {
    const root = b("ROOT", [b("a", [t("b")]), b("a", [t("c")])]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(b,c))");
  });

  it("lets a later list replace an earlier terminal", () => {
    const root = b("ROOT", [t("a"), b("a", [t("b")])]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(b))");
  });

  it("keeps the list when a terminal comes later", () => {
    const root = b("ROOT", [b("a", [t("b")]), t("a")]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(b))");
  });

  it("collapses repeated terminals", () => {
    const root = b("ROOT", [t("a"), t("a"), t("b")]);
    expect(mergeNode(root).toString()).toBe("ROOT(a,b)");
  });

  it("merges nested duplicates recursively", () => {
    const a = b("a", [b("b", [t("c")]), b("b", [t("d")])]);
    expect(mergeNode(a).toString()).toBe("a(b(c,d))");
  });

  it("keeps first-seen key order", () => {
    const root = b("ROOT", [t("a"), b("b", [t("c")]), b("a", [t("d")])]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(d),b(c))");
  });

  it("merges children collected from different duplicates", () => {
    const root = b("ROOT", [
      b("a", [b("x", [t("p")])]),
      b("a", [b("x", [t("q")]), t("y")]),
    ]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(x(p,q),y))");
  });

  it("combines an empty list with a populated one", () => {
    const root = b("ROOT", [b("a", []), b("a", [t("b")])]);
    expect(mergeNode(root).toString()).toBe("ROOT(a(b))");
  });

  it("does not modify its input", () => {
    const root = b("ROOT", [b("a", [t("b")]), b("a", [t("c")])]);
    const before = root.toString();
    const merged = mergeNode(root);
    expect(root.toString()).toBe(before);
    expect(merged).not.toBe(root);
  });

  it("is idempotent", () => {
    const root = b("ROOT", [t("a"), b("b", [t("c"), t("c")]), b("a", [t("d")]), b("b", [t("e")])]);
    const once = mergeNode(root);
    expect(mergeNode(once).equals(once)).toBe(true);
    expect(once.toString()).toBe("ROOT(a(d),b(c,e))");
  });

  it("parses duplicate sub-paths to the same tree as the combined form", () => {
    const split = parsePathExpression("a(b(c),b(d))");
    const combined = parsePathExpression("a(b(c,d))");
    expect(split.equals(combined)).toBe(true);
    expect(split.nodes?.[0].toString()).toBe("a(b(c,d))");
  });
});
