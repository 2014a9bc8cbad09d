import type { PathNode } from "./node.js";
import { parsePathExpression } from "./node-parser.js";

interface CacheEntry {
  node: PathNode;
  expiresAt: number;
}

const DEFAULT_TTL_MS = 10 * 60 * 1000;
const MAX_ENTRIES = 256;

// Map iteration order doubles as recency order.
const cache = new Map<string, CacheEntry>();

export function getCached(expression: string): PathNode | undefined {
  const entry = cache.get(expression);
  if (!entry) return undefined;
  if (Date.now() > entry.expiresAt) {
    cache.delete(expression);
    return undefined;
  }
  cache.delete(expression);
  cache.set(expression, entry);
  return entry.node;
}

export function setCache(expression: string, node: PathNode, ttlMs: number = DEFAULT_TTL_MS): void {
  cache.delete(expression);
  cache.set(expression, { node, expiresAt: Date.now() + ttlMs });
  while (cache.size > MAX_ENTRIES) {
    const oldest = cache.keys().next();
    if (oldest.done) break;
    cache.delete(oldest.value);
  }
}

/**
 * Parse an expression, reusing the node tree from an earlier call when the
 * same text was seen recently. Parse failures are not cached.
 */
export function getParsedExpression(expression: string): PathNode {
  const cached = getCached(expression);
  if (cached) return cached;
  const node = parsePathExpression(expression);
  setCache(expression, node);
  return node;
}

export function evictExpired(): void {
  const now = Date.now();
  for (const [key, entry] of cache) {
    if (now > entry.expiresAt) {
      cache.delete(key);
    }
  }
}

export function cacheSize(): number {
  return cache.size;
}

export function clearExpressionCache(): void {
  cache.clear();
}
