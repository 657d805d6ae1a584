import { defineConfig } from "@flink-sql-mcp/core";

export default defineConfig({
  gateway: {
    baseUrl: "http://localhost:8083",
    apiVersion: "v3",
    requestTimeoutMs: 30_000,
    sessionProperties: {
      "execution.runtime-mode": "streaming"
    }
  },
  query: {
    executionConfig: {}
  },
  observability: {
    level: "info"
  }
});
