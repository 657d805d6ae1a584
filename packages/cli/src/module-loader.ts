import fs from "node:fs";
import { pathToFileURL } from "node:url";

const MAX_DEFAULT_HOPS = 8;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

/**
 * Follows `default` exports through interop wrappers such as
 * `{ __esModule, default }` until a real value is reached.
 */
export function unwrapDefaultExport(value: unknown): unknown {
  let current = value;
  for (let hop = 0; hop < MAX_DEFAULT_HOPS; hop += 1) {
    if (!isRecord(current) || !("default" in current)) {
      return current;
    }
    const extraKeys = Object.keys(current).filter((key) => key !== "default" && key !== "__esModule");
    if (extraKeys.length > 0 || current.default === undefined || current.default === current) {
      return current;
    }
    current = current.default;
  }
  return current;
}

async function importModule(filePath: string): Promise<unknown> {
  const moduleUrl = pathToFileURL(filePath).href;
  if (filePath.endsWith(".ts") || filePath.endsWith(".mts")) {
    const { tsImport } = await import("tsx/esm/api");
    return await tsImport(moduleUrl, { parentURL: moduleUrl });
  }
  return await import(moduleUrl);
}

/**
 * Reads a config file: JSON is parsed, modules are imported (TypeScript via
 * tsx) and their `config` or default export returned.
 */
export async function readConfigModule(filePath: string): Promise<unknown> {
  if (filePath.endsWith(".json")) {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return parsed;
  }
  const loaded = await importModule(filePath);
  if (isRecord(loaded) && loaded.config !== undefined) {
    return unwrapDefaultExport(loaded.config);
  }
  return unwrapDefaultExport(loaded);
}
