import { randomBytes } from "node:crypto";
import { mkdirSync, writeFileSync, readFileSync, readdirSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import { platform, env } from "node:process";
import { isJsonValue } from "./json-value.js";
import type { JsonValue } from "./json-value.js";

const TTL_MS = 5 * 60 * 1000; // 5 minutes

export interface StoredDocument {
  source: string;
  format: string;
  data: JsonValue;
}

interface CachedDocument extends StoredDocument {
  expiresAt: number;
}

function defaultDocumentDir(): string {
  if (platform === "win32") {
    const base = env.LOCALAPPDATA ?? join(env.USERPROFILE ?? "", "AppData", "Local");
    return join(base, "json-path-filter", "documents");
  }
  return join(env.HOME ?? "/tmp", ".cache", "json-path-filter", "documents");
}

let documentDir = defaultDocumentDir();

export function _setDocumentDirForTests(dir: string): void {
  documentDir = dir;
}

function readEntry(filePath: string): CachedDocument | null {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  const { source, format, data, expiresAt } = parsed as Record<string, unknown>;
  if (
    typeof source !== "string" ||
    typeof format !== "string" ||
    typeof expiresAt !== "number" ||
    !isJsonValue(data)
  ) {
    return null;
  }
  return { source, format, data, expiresAt };
}

export function cleanupExpired(): void {
  let files: string[];
  try {
    files = readdirSync(documentDir);
  } catch {
    return; // dir may not exist yet
  }
  const now = Date.now();
  for (const file of files) {
    if (!file.endsWith(".json")) continue;
    const filePath = join(documentDir, file);
    try {
      const entry = readEntry(filePath);
      if (!entry || entry.expiresAt < now) {
        unlinkSync(filePath);
      }
    } catch (err) {
      process.stderr.write(`data-cache: skipping ${file}: ${err}\n`);
    }
  }
}

/**
 * Persist a document for later filter calls. Returns an 8-char hex key.
 */
export function storeDocument(document: StoredDocument): string {
  const dataKey = randomBytes(4).toString("hex");
  const entry: CachedDocument = { ...document, expiresAt: Date.now() + TTL_MS };
  mkdirSync(documentDir, { recursive: true });
  writeFileSync(join(documentDir, `${dataKey}.json`), JSON.stringify(entry));
  cleanupExpired();
  return dataKey;
}

export function loadDocument(dataKey: string): StoredDocument | null {
  if (!/^[0-9a-f]{8}$/.test(dataKey)) return null;
  const filePath = join(documentDir, `${dataKey}.json`);
  let entry: CachedDocument | null;
  try {
    entry = readEntry(filePath);
  } catch {
    return null; // missing or unreadable
  }
  if (!entry) return null;
  if (entry.expiresAt < Date.now()) {
    try {
      unlinkSync(filePath);
    } catch (err) {
      // cleanupExpired may have removed it already
      process.stderr.write(`data-cache: could not remove ${dataKey}: ${err}\n`);
    }
    return null;
  }
  return { source: entry.source, format: entry.format, data: entry.data };
}
