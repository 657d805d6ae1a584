import { systemClock, type Clock } from "./clock.js";
import { resolveConfig, type FlinkSqlMcpConfig, type ResolvedFlinkSqlMcpConfig } from "./config.js";
import { SqlGatewayClient } from "./gateway-client/client.js";
import type { ClusterInfo, SessionProperties, SqlGatewayApi } from "./gateway-client/types.js";
import { JobCanceller, type CancelJobResult, type FetchByJobIdResult } from "./jobs/canceller.js";
import { JobTracker } from "./jobs/tracker.js";
import { silentLogger, type GatewayLogger } from "./observability.js";
import {
  QueryRunner,
  type CollectAndStopOptions,
  type CollectAndStopResult,
  type StreamStartResult
} from "./query/runner.js";
import { SessionOwner, type ConfigurationResult } from "./session/owner.js";

export interface ServiceTimings {
  pollIntervalMs?: number;
  configureTimeoutMs?: number;
  streamStartTimeoutMs?: number;
  cancelTimeoutMs?: number;
}

export interface SqlGatewayServiceParams {
  config?: FlinkSqlMcpConfig;
  /** Replaces the HTTP client, e.g. with an in-process gateway. */
  client?: SqlGatewayApi;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  logger?: GatewayLogger;
  timings?: ServiceTimings;
}

export interface TrackedJobSummary {
  jobId: string;
  nextToken: number;
  trackedAt: string;
}

/**
 * The process-wide session and job state. Build one per process and hand the
 * same instance to every tool.
 */
export class SqlGatewayService {
  readonly config: ResolvedFlinkSqlMcpConfig;
  readonly client: SqlGatewayApi;
  readonly session: SessionOwner;
  readonly tracker: JobTracker;
  readonly runner: QueryRunner;
  readonly canceller: JobCanceller;
  private readonly logger: GatewayLogger;

  constructor(params: SqlGatewayServiceParams = {}) {
    this.config = resolveConfig(params.config);
    this.logger = params.logger ?? silentLogger;
    const clock = params.clock ?? systemClock;
    const timings = params.timings ?? {};

    this.client =
      params.client ??
      new SqlGatewayClient({
        baseUrl: this.config.gateway.baseUrl,
        apiVersion: this.config.gateway.apiVersion,
        requestTimeoutMs: this.config.gateway.requestTimeoutMs,
        fetchImpl: params.fetchImpl,
        logger: this.logger
      });
    this.session = new SessionOwner({
      client: this.client,
      sessionProperties: this.config.gateway.sessionProperties,
      sessionName: this.config.gateway.sessionName,
      clock,
      logger: this.logger,
      pollIntervalMs: timings.pollIntervalMs,
      configureTimeoutMs: timings.configureTimeoutMs
    });
    this.tracker = new JobTracker(() => new Date(clock.now()));
    this.runner = new QueryRunner({
      client: this.client,
      session: this.session,
      tracker: this.tracker,
      clock,
      logger: this.logger,
      pollIntervalMs: timings.pollIntervalMs,
      streamStartTimeoutMs: timings.streamStartTimeoutMs,
      executionConfig: this.config.query.executionConfig
    });
    this.canceller = new JobCanceller({
      client: this.client,
      session: this.session,
      tracker: this.tracker,
      clock,
      logger: this.logger,
      pollIntervalMs: timings.pollIntervalMs,
      cancelTimeoutMs: timings.cancelTimeoutMs
    });
  }

  async getClusterInfo(): Promise<ClusterInfo> {
    return await this.client.getClusterInfo();
  }

  async getConfig(): Promise<SessionProperties> {
    return await this.session.getConfig();
  }

  async configureSession(statement: string): Promise<ConfigurationResult> {
    return await this.session.applyConfiguration(statement);
  }

  async runQueryCollectAndStop(query: string, options?: CollectAndStopOptions): Promise<CollectAndStopResult> {
    return await this.runner.runQueryCollectAndStop(query, options);
  }

  async runQueryStreamStart(query: string): Promise<StreamStartResult> {
    return await this.runner.runQueryStreamStart(query);
  }

  async fetchResultByJobId(jobId: string, token?: number): Promise<FetchByJobIdResult> {
    return await this.canceller.fetchResultByJobId(jobId, token);
  }

  async cancelJob(jobId: string): Promise<CancelJobResult> {
    return await this.canceller.cancelJob(jobId);
  }

  listTrackedJobs(): TrackedJobSummary[] {
    return this.tracker.list().map((entry) => ({
      jobId: entry.jobId,
      nextToken: entry.nextToken,
      trackedAt: entry.trackedAt
    }));
  }

  drainNotices(): string[] {
    return this.session.drainNotices();
  }

  /** Closes the session; jobs left running keep running on the cluster. */
  async shutdown(): Promise<void> {
    if (this.tracker.size > 0) {
      this.logger.warn("service.shutdown_with_running_jobs", {
        jobIds: this.tracker.list().map((entry) => entry.jobId)
      });
    }
    await this.session.close();
  }
}

export function createSqlGatewayService(params: SqlGatewayServiceParams = {}): SqlGatewayService {
  return new SqlGatewayService(params);
}
