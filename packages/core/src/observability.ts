import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  event: string;
  payload?: unknown;
}

export interface GatewayLogger {
  debug: (event: string, payload?: Record<string, unknown>) => void;
  info: (event: string, payload?: Record<string, unknown>) => void;
  warn: (event: string, payload?: Record<string, unknown>) => void;
  error: (event: string, payload?: Record<string, unknown>) => void;
}

export interface ObservabilityLoggerOptions {
  level?: LogLevel;
  /** Defaults to process.stderr; stdout carries the MCP stream. */
  stream?: Pick<NodeJS.WritableStream, "write">;
  /** When set, records are also appended to `<directory>/gateway-events.jsonl`. */
  directory?: string;
  now?: () => Date;
}

export const OBSERVABILITY_FILE_NAME = "gateway-events.jsonl";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const OBS_MAX_TEXT_CHARS = 8_000;
const OBS_REDACTED_TEXT = "[REDACTED]";
const OBS_MAX_REDACTION_DEPTH = 10;
const OBS_SENSITIVE_KEY_NAMES = new Set([
  "authorization",
  "cookie",
  "x-api-key",
  "apikey",
  "api_key",
  "password",
  "passwd",
  "secret",
  "access_token",
  "refresh_token",
  "token"
]);

function clipText(value: string, maxChars = OBS_MAX_TEXT_CHARS): string {
  if (value.length <= maxChars) {
    return value;
  }
  const dropped = value.length - maxChars;
  return `${value.slice(0, maxChars)}...[truncated ${dropped} chars]`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  if (OBS_SENSITIVE_KEY_NAMES.has(normalized)) {
    return true;
  }
  return (
    normalized.includes("secret") ||
    normalized.includes("password") ||
    normalized.includes("apikey") ||
    normalized.includes("api_key")
  );
}

function redactStringSecrets(value: string): string {
  let sanitized = value;
  sanitized = sanitized.replace(/\bBearer\s+[A-Za-z0-9._~+/=-]{8,}\b/gi, `Bearer ${OBS_REDACTED_TEXT}`);
  sanitized = sanitized.replace(
    /\b(secret|password|passphrase|api[_-]?key)\s*[:=]\s*([^\s,;]+)/gi,
    (_, label: string) => `${label}=${OBS_REDACTED_TEXT}`
  );
  return sanitized;
}

export function sanitizeLogValue(value: unknown, depth = 0, seen?: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return redactStringSecrets(value);
  }
  if (value === null || value === undefined || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (depth >= OBS_MAX_REDACTION_DEPTH) {
    return "[Truncated depth]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogValue(entry, depth + 1, seen));
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringSecrets(value.message)
    };
  }
  if (typeof value === "object") {
    const references = seen ?? new WeakSet<object>();
    if (references.has(value)) {
      return "[Circular]";
    }
    references.add(value);
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? OBS_REDACTED_TEXT : sanitizeLogValue(entry, depth + 1, references);
    }
    return sanitized;
  }
  return redactStringSecrets(String(value));
}

export function summarizeForLog(value: unknown): unknown {
  const sanitized = sanitizeLogValue(value);
  if (typeof sanitized === "string") {
    return clipText(sanitized);
  }
  if (sanitized === null || sanitized === undefined) {
    return sanitized;
  }
  const serialized = JSON.stringify(sanitized);
  if (serialized.length <= OBS_MAX_TEXT_CHARS) {
    return sanitized;
  }
  return clipText(serialized);
}

export function createObservabilityLogger(options: ObservabilityLoggerOptions = {}): GatewayLogger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());
  let fileWriteFailed = false;

  const appendToFile = (line: string): void => {
    if (!options.directory || fileWriteFailed) {
      return;
    }
    try {
      fs.mkdirSync(options.directory, { recursive: true });
      fs.appendFileSync(path.join(options.directory, OBSERVABILITY_FILE_NAME), line, "utf8");
    } catch (error) {
      fileWriteFailed = true;
      stream.write(
        `${JSON.stringify({
          timestamp: now().toISOString(),
          level: "warn",
          event: "observability.file_write_failed",
          payload: { message: error instanceof Error ? error.message : String(error) }
        } satisfies LogRecord)}\n`
      );
    }
  };

  const emit = (level: LogLevel, event: string, payload?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const record: LogRecord = {
      timestamp: now().toISOString(),
      level,
      event
    };
    if (payload !== undefined) {
      record.payload = summarizeForLog(payload);
    }
    const line = `${JSON.stringify(record)}\n`;
    stream.write(line);
    appendToFile(line);
  };

  return {
    debug: (event, payload) => emit("debug", event, payload),
    info: (event, payload) => emit("info", event, payload),
    warn: (event, payload) => emit("warn", event, payload),
    error: (event, payload) => emit("error", event, payload)
  };
}

export const silentLogger: GatewayLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
