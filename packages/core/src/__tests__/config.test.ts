import { describe, expect, it } from "vitest";
import { flinkSqlMcpConfigSchema, resolveConfig } from "../config.js";

describe("config", () => {
  it("fills defaults", () => {
    expect(resolveConfig()).toEqual({
      gateway: {
        baseUrl: "http://localhost:8083",
        apiVersion: "v3",
        requestTimeoutMs: 30_000,
        sessionName: undefined,
        sessionProperties: {}
      },
      query: { executionConfig: undefined },
      observability: { level: "info", directory: undefined }
    });
  });

  it("strips trailing slashes from the base URL", () => {
    expect(resolveConfig({ gateway: { baseUrl: "https://gateway.test/flink//" } }).gateway.baseUrl).toBe(
      "https://gateway.test/flink"
    );
  });

  it("rejects non-HTTP base URLs and unknown keys", () => {
    const badScheme = flinkSqlMcpConfigSchema.safeParse({ gateway: { baseUrl: "ftp://gateway.test" } });
    expect(badScheme.success).toBe(false);
    expect(badScheme.error?.issues[0]?.message).toBe("baseUrl must start with http:// or https://");

    expect(flinkSqlMcpConfigSchema.safeParse({ gateway: { host: "x" } }).success).toBe(false);
    expect(flinkSqlMcpConfigSchema.safeParse({ gateway: { apiVersion: "v4" } }).success).toBe(false);
  });
});
