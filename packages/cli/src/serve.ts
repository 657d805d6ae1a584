import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { toErrorText, type GatewayLogger, type SqlGatewayService } from "@flink-sql-mcp/core";
import { createMcpServer } from "./mcp-server.js";

/**
 * Serves the tools over stdio until a signal arrives or the client closes
 * stdin, then closes the gateway session.
 */
export async function runServe(params: { service: SqlGatewayService; logger: GatewayLogger }): Promise<number> {
  const { service, logger } = params;
  const server = createMcpServer({ service, logger });
  const transport = new StdioServerTransport();

  return await new Promise<number>((resolve, reject) => {
    let settled = false;

    const settle = async (reason: string): Promise<void> => {
      if (settled) {
        return;
      }
      settled = true;
      process.off("SIGINT", onSigInt);
      process.off("SIGTERM", onSigTerm);
      process.stdin.off("end", onStdinEnd);
      logger.info("mcp.server.stopping", { reason });
      try {
        await server.close();
      } catch (error) {
        logger.warn("mcp.server.close_failed", { message: toErrorText(error) });
      }
      await service.shutdown();
      resolve(0);
    };

    const stop = (reason: string): void => {
      settle(reason).catch(reject);
    };
    const onSigInt = (): void => stop("SIGINT");
    const onSigTerm = (): void => stop("SIGTERM");
    const onStdinEnd = (): void => stop("stdin closed");

    process.on("SIGINT", onSigInt);
    process.on("SIGTERM", onSigTerm);
    process.stdin.on("end", onStdinEnd);

    server
      .connect(transport)
      .then(() => {
        logger.info("mcp.server.started", {
          baseUrl: service.config.gateway.baseUrl,
          apiVersion: service.config.gateway.apiVersion
        });
      })
      .catch((error: unknown) => {
        logger.error("mcp.server.start_failed", { message: toErrorText(error) });
        settled = true;
        process.off("SIGINT", onSigInt);
        process.off("SIGTERM", onSigTerm);
        process.stdin.off("end", onStdinEnd);
        reject(error);
      });
  });
}
