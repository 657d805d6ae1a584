#!/usr/bin/env tsx

import {
  createObservabilityLogger,
  createSqlGatewayService,
  createSqlGatewayTools,
  toErrorText
} from "@flink-sql-mcp/core";
import { CliConfigError, loadCliConfig, type LoadedCliConfig } from "./config.js";
import { runServe } from "./serve.js";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

function printHelp(stream: NodeJS.WritableStream = process.stdout): void {
  stream.write(
    [
      "flink-sql-mcp commands:",
      "  flink-sql-mcp [serve]   run the MCP server on stdio",
      "  flink-sql-mcp info      print SQL Gateway cluster information",
      "  flink-sql-mcp tools     list the tools the server exposes",
      "  flink-sql-mcp help",
      "",
      "environment:",
      "  SQL_GATEWAY_API_BASE_URL   SQL Gateway base URL (default http://localhost:8083)",
      "  FLINK_SQL_MCP_LOG_LEVEL    debug | info | warn | error"
    ].join("\n") + "\n"
  );
}

function buildService(loaded: LoadedCliConfig) {
  const logger = createObservabilityLogger({
    level: loaded.config.observability.level,
    directory: loaded.config.observability.directory
  });
  const service = createSqlGatewayService({ config: loaded.config, logger });
  return { logger, service };
}

async function main(): Promise<number> {
  const [command = "serve", ...args] = process.argv.slice(2);

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return EXIT_OK;
  }
  if (!["serve", "info", "tools"].includes(command) || args.length > 0) {
    process.stderr.write(`Unknown command: ${[command, ...args].join(" ")}\n`);
    printHelp(process.stderr);
    return EXIT_USAGE;
  }

  let loaded: LoadedCliConfig;
  try {
    loaded = await loadCliConfig();
  } catch (error) {
    if (error instanceof CliConfigError) {
      process.stderr.write(`${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }
  const { logger, service } = buildService(loaded);
  if (loaded.configPath) {
    logger.debug("config.loaded", { configPath: loaded.configPath });
  }

  if (command === "tools") {
    for (const tool of createSqlGatewayTools(service)) {
      process.stdout.write(`${tool.name}\t${tool.description ?? ""}\n`);
    }
    return EXIT_OK;
  }

  if (command === "info") {
    try {
      const info = await service.getClusterInfo();
      process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
      return EXIT_OK;
    } catch (error) {
      process.stderr.write(`Could not reach the SQL Gateway at ${loaded.config.gateway.baseUrl}: ${toErrorText(error)}\n`);
      return EXIT_FAILURE;
    }
  }

  return await runServe({ service, logger });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
