import type { SqlGatewayService } from "../service.js";
import { defineTool } from "./definition.js";
import {
  cancelJobToolSchema,
  collectAndStopToolSchema,
  configureSessionToolSchema,
  fetchByJobIdToolSchema,
  flinkInfoToolSchema,
  getConfigToolSchema,
  listTrackedJobsToolSchema,
  streamStartToolSchema
} from "./schemas.js";
import type { ToolDefinition } from "./types.js";

/** Adds any pending session re-open notices to a tool result. */
function withNotices<T extends object>(service: SqlGatewayService, output: T): T & { notices?: string[] } {
  const notices = service.drainNotices();
  return notices.length > 0 ? { ...output, notices } : output;
}

export function createSqlGatewayTools(service: SqlGatewayService): ToolDefinition[] {
  const flinkInfoTool = defineTool({
    name: "flink_info",
    description: "Return cluster information (product name, version) reported by the Flink SQL Gateway",
    parameters: flinkInfoToolSchema,
    execute: async () => await service.getClusterInfo()
  });

  const getConfigTool = defineTool({
    name: "get_config",
    description: "Return the configuration properties of the server-managed SQL Gateway session",
    parameters: getConfigToolSchema,
    execute: async () => withNotices(service, { properties: await service.getConfig() })
  });

  const configureSessionTool = defineTool({
    name: "configure_session",
    description:
      "Apply one session-scoped statement (CREATE, USE, SET, RESET, LOAD, UNLOAD, ADD JAR, ...) to the managed session",
    parameters: configureSessionToolSchema,
    execute: async (input) => withNotices(service, await service.configureSession(input.statement))
  });

  const collectAndStopTool = defineTool({
    name: "run_query_collect_and_stop",
    description:
      "Run a query, collect at most maxRows rows within maxSeconds, then stop the cluster job it started (if any)",
    parameters: collectAndStopToolSchema,
    execute: async (input) =>
      withNotices(
        service,
        await service.runQueryCollectAndStop(input.query, {
          maxRows: input.maxRows,
          maxSeconds: input.maxSeconds
        })
      )
  });

  const streamStartTool = defineTool({
    name: "run_query_stream_start",
    description:
      "Start a long-running (streaming) statement and return its cluster jobID; the job keeps running until cancel_job",
    parameters: streamStartToolSchema,
    execute: async (input) => {
      const started = await service.runQueryStreamStart(input.query);
      return withNotices(service, { jobID: started.jobId });
    }
  });

  const fetchByJobIdTool = defineTool({
    name: "fetch_result_by_jobid",
    description: "Fetch the next result page of a job started with run_query_stream_start",
    parameters: fetchByJobIdToolSchema,
    execute: async (input) => await service.fetchResultByJobId(input.jobId, input.token)
  });

  const cancelJobTool = defineTool({
    name: "cancel_job",
    description: "Stop a tracked job, wait for it to reach a terminal state, and stop tracking it",
    parameters: cancelJobToolSchema,
    execute: async (input) => await service.cancelJob(input.jobId)
  });

  const listTrackedJobsTool = defineTool({
    name: "list_tracked_jobs",
    description: "List the job ids this server is tracking for fetch_result_by_jobid and cancel_job",
    parameters: listTrackedJobsToolSchema,
    execute: () => ({ jobs: service.listTrackedJobs() })
  });

  return [
    flinkInfoTool,
    getConfigTool,
    configureSessionTool,
    collectAndStopTool,
    streamStartTool,
    fetchByJobIdTool,
    cancelJobTool,
    listTrackedJobsTool
  ];
}
