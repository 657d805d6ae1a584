export {
  CANCEL_TIMEOUT_MS,
  CONFIGURE_TIMEOUT_MS,
  DEFAULT_GATEWAY_API_VERSION,
  DEFAULT_GATEWAY_BASE_URL,
  DEFAULT_MAX_ROWS,
  DEFAULT_MAX_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  POLL_INTERVAL_MS,
  STREAM_START_TIMEOUT_MS
} from "./constants.js";
export { defineConfig, flinkSqlMcpConfigSchema, resolveConfig } from "./config.js";
export type {
  FlinkSqlMcpConfig,
  GatewayApiVersion,
  ObservabilityConfig,
  QueryExecutionConfig,
  ResolvedFlinkSqlMcpConfig,
  SqlGatewayConnectionConfig
} from "./config.js";

export { systemClock, pollUntil } from "./clock.js";
export type { Clock, PollResult } from "./clock.js";

export {
  GatewayError,
  JobTrackingError,
  NoJobIdError,
  StatementError,
  isGatewayError,
  toErrorText
} from "./errors.js";
export type { GatewayErrorCode } from "./errors.js";

export {
  OBSERVABILITY_FILE_NAME,
  createObservabilityLogger,
  sanitizeLogValue,
  silentLogger,
  summarizeForLog
} from "./observability.js";
export type { GatewayLogger, LogLevel, LogRecord, ObservabilityLoggerOptions } from "./observability.js";

export { SqlGatewayClient, isSessionInvalidMessage } from "./gateway-client/client.js";
export type { SqlGatewayClientOptions } from "./gateway-client/client.js";
export { parseOperationStatus, parseResultPage, quoteSqlLiteral } from "./gateway-client/payloads.js";
export { IN_FLIGHT_STATUSES } from "./gateway-client/types.js";
export type {
  ClusterInfo,
  OperationStatus,
  OperationStatusSnapshot,
  ResultColumn,
  ResultPage,
  ResultRow,
  ResultType,
  SessionProperties,
  SqlGatewayApi
} from "./gateway-client/types.js";

export { SessionOwner } from "./session/owner.js";
export type { ConfigurationResult, SessionState, StatementHandles } from "./session/owner.js";
export { JobTracker } from "./jobs/tracker.js";
export type { TrackedJob, TrackJobParams } from "./jobs/tracker.js";
export { JobCanceller } from "./jobs/canceller.js";
export type { CancelJobResult, FetchByJobIdResult } from "./jobs/canceller.js";
export { QueryRunner } from "./query/runner.js";
export type { CollectAndStopOptions, CollectAndStopResult, StreamStartResult } from "./query/runner.js";

export { SqlGatewayService, createSqlGatewayService } from "./service.js";
export type { ServiceTimings, SqlGatewayServiceParams, TrackedJobSummary } from "./service.js";

export { createSqlGatewayTools } from "./tools/builtins.js";
export { asToolDefinition, defineTool } from "./tools/definition.js";
export { executeToolDefinition, validateToolInput } from "./tools/execution.js";
export { buildToolRegistry } from "./tools/registry.js";
export { isSessionStatement, SESSION_STATEMENT_KEYWORDS } from "./tools/schemas.js";
export type {
  ToolContext,
  ToolDefinition,
  ToolExecutionResult,
  ToolFailure,
  ToolRegistryResult
} from "./tools/types.js";
