import fs from "node:fs";
import path from "node:path";
import {
  flinkSqlMcpConfigSchema,
  resolveConfig,
  type FlinkSqlMcpConfig,
  type LogLevel,
  type ResolvedFlinkSqlMcpConfig
} from "@flink-sql-mcp/core";
import { parse as parseDotEnv } from "dotenv";
import { readConfigModule } from "./module-loader.js";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  config: ResolvedFlinkSqlMcpConfig;
}

export const BASE_URL_ENV = "SQL_GATEWAY_API_BASE_URL";
export const LOG_LEVEL_ENV = "FLINK_SQL_MCP_LOG_LEVEL";

const CONFIG_CANDIDATES = [
  "flink-sql-mcp.config.ts",
  "flink-sql-mcp.config.mts",
  "flink-sql-mcp.config.js",
  "flink-sql-mcp.config.mjs",
  "flink-sql-mcp.config.json"
];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class CliConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliConfigError";
  }
}

function isFile(filePath: string): boolean {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

function loadProjectEnvFiles(projectRoot: string): void {
  // Shell and CI variables stay authoritative over .env files.
  const shellDefined = new Set(Object.keys(process.env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!isFile(filePath)) {
      continue;
    }
    Object.assign(merged, parseDotEnv(fs.readFileSync(filePath, "utf8")));
  }

  for (const [key, value] of Object.entries(merged)) {
    if (!shellDefined.has(key)) {
      process.env[key] = value;
    }
  }
}

function findConfigFile(projectRoot: string): string | null {
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(projectRoot, candidate);
    if (isFile(absolute)) {
      return absolute;
    }
  }
  return null;
}

function parseConfig(raw: unknown, source: string): FlinkSqlMcpConfig {
  const parsed = flinkSqlMcpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "$"}: ${issue.message}`)
      .join("; ");
    throw new CliConfigError(`Invalid config in ${source}: ${details}`);
  }
  return parsed.data;
}

function readLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new CliConfigError(`${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return level;
}

function applyEnvOverrides(config: FlinkSqlMcpConfig, env: NodeJS.ProcessEnv): FlinkSqlMcpConfig {
  const baseUrl = env[BASE_URL_ENV]?.trim();
  const logLevel = env[LOG_LEVEL_ENV]?.trim();
  const merged: FlinkSqlMcpConfig = {
    ...config,
    gateway: baseUrl ? { ...config.gateway, baseUrl } : config.gateway,
    observability: logLevel ? { ...config.observability, level: readLogLevel(logLevel) } : config.observability
  };
  // Environment values pass through the same checks as file values.
  return parseConfig(merged, "environment");
}

export async function loadCliConfig(projectRoot = process.cwd()): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot);

  const configPath = findConfigFile(resolvedRoot);
  let fileConfig: FlinkSqlMcpConfig = {};
  if (configPath) {
    const raw = await readConfigModule(configPath);
    if (!raw || typeof raw !== "object") {
      throw new CliConfigError(`Invalid config export from ${configPath}`);
    }
    fileConfig = parseConfig(raw, configPath);
  }

  const config = resolveConfig(applyEnvOverrides(fileConfig, process.env));
  if (config.observability.directory && !path.isAbsolute(config.observability.directory)) {
    config.observability.directory = path.resolve(resolvedRoot, config.observability.directory);
  }

  return {
    projectRoot: resolvedRoot,
    configPath,
    config
  };
}
