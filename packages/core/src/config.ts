import { z } from "zod";
import {
  DEFAULT_GATEWAY_API_VERSION,
  DEFAULT_GATEWAY_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS
} from "./constants.js";
import type { LogLevel } from "./observability.js";

export type GatewayApiVersion = "v1" | "v2" | "v3";

export interface SqlGatewayConnectionConfig {
  baseUrl?: string;
  apiVersion?: GatewayApiVersion;
  requestTimeoutMs?: number;
  sessionName?: string;
  /** Properties sent when the session is opened. */
  sessionProperties?: Record<string, string>;
}

export interface QueryExecutionConfig {
  /** Sent as `executionConfig` with every query statement. */
  executionConfig?: Record<string, string>;
}

export interface ObservabilityConfig {
  level?: LogLevel;
  directory?: string;
}

export interface FlinkSqlMcpConfig {
  gateway?: SqlGatewayConnectionConfig;
  query?: QueryExecutionConfig;
  observability?: ObservabilityConfig;
}

export interface ResolvedFlinkSqlMcpConfig {
  gateway: Required<Omit<SqlGatewayConnectionConfig, "sessionName">> & { sessionName?: string };
  query: QueryExecutionConfig;
  observability: { level: LogLevel; directory?: string };
}

const stringRecord = z.record(z.string());

export const flinkSqlMcpConfigSchema = z
  .object({
    gateway: z
      .object({
        baseUrl: z
          .string()
          .url()
          .refine((value) => value.startsWith("http://") || value.startsWith("https://"), {
            message: "baseUrl must start with http:// or https://"
          })
          .optional(),
        apiVersion: z.enum(["v1", "v2", "v3"]).optional(),
        requestTimeoutMs: z.number().int().positive().optional(),
        sessionName: z.string().min(1).optional(),
        sessionProperties: stringRecord.optional()
      })
      .strict()
      .optional(),
    query: z
      .object({
        executionConfig: stringRecord.optional()
      })
      .strict()
      .optional(),
    observability: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).optional(),
        directory: z.string().min(1).optional()
      })
      .strict()
      .optional()
  })
  .strict();

export function resolveConfig(config: FlinkSqlMcpConfig = {}): ResolvedFlinkSqlMcpConfig {
  const gateway = config.gateway ?? {};
  return {
    gateway: {
      baseUrl: (gateway.baseUrl ?? DEFAULT_GATEWAY_BASE_URL).replace(/\/+$/, ""),
      apiVersion: gateway.apiVersion ?? DEFAULT_GATEWAY_API_VERSION,
      requestTimeoutMs: gateway.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      sessionName: gateway.sessionName,
      sessionProperties: gateway.sessionProperties ?? {}
    },
    query: {
      executionConfig: config.query?.executionConfig
    },
    observability: {
      level: config.observability?.level ?? "info",
      directory: config.observability?.directory
    }
  };
}

export function defineConfig<T extends FlinkSqlMcpConfig>(config: T): T {
  return config;
}
