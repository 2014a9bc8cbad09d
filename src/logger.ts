import { appendFile } from "node:fs/promises";

export interface LogEntry {
  timestamp: string;
  tool: string;
  filterType?: string;
  expression?: string;
  inputBytes: number;
  outputBytes?: number;
  document?: unknown;
  error?: string;
  durationMs: number;
}

const SENSITIVE_KEYS = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
]);

const MAX_DOCUMENT_LOG_LENGTH = 10_000;

let logFilePath: string | null = null;

export function initLogger(path: string | null): void {
  logFilePath = path;
}

export function isLoggingEnabled(): boolean {
  return logFilePath !== null;
}

function maskValue(value: unknown): unknown {
  if (typeof value !== "string") return "****";
  return value.length > 4 ? value.slice(0, 4) + "****" : "****";
}

function maskSensitive(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(maskSensitive);
  if (typeof value !== "object" || value === null) return value;

  const masked: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const next = SENSITIVE_KEYS.has(key.toLowerCase()) ? maskValue(child) : maskSensitive(child);
    Object.defineProperty(masked, key, {
      value: next,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return masked;
}

function truncateDocument(document: unknown): unknown {
  const str = typeof document === "string" ? document : JSON.stringify(document);
  if (str && str.length > MAX_DOCUMENT_LOG_LENGTH) {
    return str.slice(0, MAX_DOCUMENT_LOG_LENGTH) + `... [truncated, ${str.length} total chars]`;
  }
  return document;
}

export async function logEntry(entry: LogEntry): Promise<void> {
  if (!logFilePath) return;
  try {
    const sanitized = {
      ...entry,
      ...(entry.document !== undefined
        ? { document: truncateDocument(maskSensitive(entry.document)) }
        : {}),
    };
    const line = JSON.stringify(sanitized) + "\n";
    await appendFile(logFilePath, line, "utf-8");
  } catch {
    // Logging failure should never crash the server
  }
}
