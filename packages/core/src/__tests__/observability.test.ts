import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  OBSERVABILITY_FILE_NAME,
  createObservabilityLogger,
  sanitizeLogValue,
  summarizeForLog
} from "../observability.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "flink-sql-mcp-observability-"));
  tempDirs.push(dir);
  return dir;
}

function memoryStream() {
  const lines: string[] = [];
  return {
    lines,
    stream: {
      write: (chunk: string | Uint8Array): boolean => {
        lines.push(String(chunk));
        return true;
      }
    }
  };
}

function readJsonl(text: string): unknown[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

const fixedNow = () => new Date("2026-03-04T05:06:07.000Z");

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("observability logger", () => {
  it("writes JSON lines at or above the configured level", () => {
    const { lines, stream } = memoryStream();
    const logger = createObservabilityLogger({ level: "info", stream, now: fixedNow });

    logger.debug("gateway.http", { method: "GET" });
    logger.info("session.opened", { generation: 1 });
    logger.error("mcp.server.start_failed");

    expect(readJsonl(lines.join(""))).toEqual([
      { timestamp: "2026-03-04T05:06:07.000Z", level: "info", event: "session.opened", payload: { generation: 1 } },
      { timestamp: "2026-03-04T05:06:07.000Z", level: "error", event: "mcp.server.start_failed" }
    ]);
  });

  it("appends records to the observability file when a directory is set", () => {
    const directory = path.join(makeTempDir(), "logs");
    const { stream } = memoryStream();
    const logger = createObservabilityLogger({ stream, directory, now: fixedNow });

    logger.warn("session.invalidated", { reason: "expired", lostStatements: 2 });

    expect(readJsonl(fs.readFileSync(path.join(directory, OBSERVABILITY_FILE_NAME), "utf8"))).toEqual([
      {
        timestamp: "2026-03-04T05:06:07.000Z",
        level: "warn",
        event: "session.invalidated",
        payload: { reason: "expired", lostStatements: 2 }
      }
    ]);
  });

  it("falls back to the stream alone when the file cannot be written", () => {
    const root = makeTempDir();
    const blocker = path.join(root, "not-a-directory");
    fs.writeFileSync(blocker, "x");
    const { lines, stream } = memoryStream();
    const logger = createObservabilityLogger({ stream, directory: blocker, now: fixedNow });

    logger.info("first");
    logger.info("second");

    const events = readJsonl(lines.join("")).map((record) =>
      record && typeof record === "object" && "event" in record ? record.event : undefined
    );
    expect(events).toEqual(["first", "observability.file_write_failed", "second"]);
  });
});

describe("log sanitizing", () => {
  it("redacts sensitive keys and inline secrets", () => {
    expect(
      sanitizeLogValue({
        authorization: "Bearer test-secret-value",
        nested: { password: "test-secret", user: "analyst" },
        note: "connect with password=test-secret now",
        header: "Bearer abcdefghijkl"
      })
    ).toEqual({
      authorization: "[REDACTED]",
      nested: { password: "[REDACTED]", user: "analyst" },
      note: "connect with password=[REDACTED] now",
      header: "Bearer [REDACTED]"
    });
  });

  it("marks circular references", () => {
    const value: Record<string, unknown> = { name: "loop" };
    value.self = value;

    expect(sanitizeLogValue(value)).toEqual({ name: "loop", self: "[Circular]" });
  });

  it("clips long text", () => {
    const clipped = summarizeForLog("x".repeat(8_010));

    expect(clipped).toBe(`${"x".repeat(8_000)}...[truncated 10 chars]`);
  });
});
