import { randomUUID } from "node:crypto";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  buildToolRegistry,
  createSqlGatewayTools,
  executeToolDefinition,
  silentLogger,
  type GatewayLogger,
  type SqlGatewayService,
  type ToolDefinition,
  type ToolExecutionResult
} from "@flink-sql-mcp/core";

export const SERVER_NAME = "flink-sql-mcp";
export const SERVER_VERSION = "0.2.0";
export const CLUSTER_INFO_RESOURCE_URI = "flink://info";

export interface CreateMcpServerParams {
  service: SqlGatewayService;
  /** Defaults to the built-in SQL Gateway tools. */
  tools?: readonly unknown[];
  logger?: GatewayLogger;
}

interface TextToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function toTextResult(result: ToolExecutionResult): TextToolResult {
  if (result.ok) {
    return {
      content: [{ type: "text", text: JSON.stringify(result.output ?? null, null, 2) }]
    };
  }
  const failure = result.error;
  const body =
    failure?.code === "execution_error"
      ? { code: failure.code, kind: failure.kind, message: failure.message }
      : { code: failure?.code ?? "execution_error", message: failure?.message ?? "Tool failed", issues: failure?.issues };
  return {
    content: [{ type: "text", text: JSON.stringify(body, null, 2) }],
    isError: true
  };
}

function registerTool(server: McpServer, tool: ToolDefinition, logger: GatewayLogger): void {
  server.tool(tool.name, tool.description ?? tool.name, tool.parameters.shape, async (args: Record<string, unknown>) => {
    const callId = randomUUID();
    const startedAt = Date.now();
    logger.info("tool.call.started", { callId, tool: tool.name });
    const result = await executeToolDefinition({ tool, input: args, context: { callId } });
    const payload: Record<string, unknown> = {
      callId,
      tool: tool.name,
      ok: result.ok,
      durationMs: Date.now() - startedAt
    };
    if (result.error) {
      payload.errorCode = result.error.code;
      payload.message = result.error.message;
    }
    if (result.ok) {
      logger.info("tool.call.completed", payload);
    } else {
      logger.warn("tool.call.failed", payload);
    }
    return toTextResult(result);
  });
}

export function createMcpServer(params: CreateMcpServerParams): McpServer {
  const logger = params.logger ?? silentLogger;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  const { tools, diagnostics } = buildToolRegistry(params.tools ?? createSqlGatewayTools(params.service));
  for (const skipped of diagnostics.skipped) {
    logger.warn("tool.registry.skipped", { ...skipped });
  }
  for (const tool of tools.values()) {
    registerTool(server, tool, logger);
  }

  server.resource("cluster-info", CLUSTER_INFO_RESOURCE_URI, async (uri) => ({
    contents: [
      {
        uri: uri.href,
        mimeType: "application/json",
        text: JSON.stringify(await params.service.getClusterInfo(), null, 2)
      }
    ]
  }));

  logger.debug("mcp.server.created", { tools: diagnostics.loadedCount });
  return server;
}
