import { pollUntil, systemClock, type Clock } from "../clock.js";
import {
  DEFAULT_MAX_ROWS,
  DEFAULT_MAX_SECONDS,
  POLL_INTERVAL_MS,
  STREAM_START_TIMEOUT_MS
} from "../constants.js";
import { NoJobIdError, StatementError, toErrorText } from "../errors.js";
import { readOperationError } from "../gateway-client/operation-error.js";
import {
  IN_FLIGHT_STATUSES,
  type OperationStatus,
  type OperationStatusSnapshot,
  type ResultColumn,
  type ResultRow,
  type SqlGatewayApi
} from "../gateway-client/types.js";
import type { JobTracker } from "../jobs/tracker.js";
import { silentLogger, type GatewayLogger } from "../observability.js";
import type { SessionOwner } from "../session/owner.js";

export interface QueryRunnerParams {
  client: SqlGatewayApi;
  session: SessionOwner;
  tracker: JobTracker;
  clock?: Clock;
  logger?: GatewayLogger;
  pollIntervalMs?: number;
  streamStartTimeoutMs?: number;
  executionConfig?: Record<string, string>;
}

export interface CollectAndStopOptions {
  maxRows?: number;
  maxSeconds?: number;
}

export interface CollectAndStopResult {
  columns: ResultColumn[];
  rows: ResultRow[];
  rowCount: number;
  /** The gateway reported the end of the result set. */
  exhausted: boolean;
  /** Status of the statement when collection stopped waiting for it. */
  status: OperationStatus;
  timedOut: boolean;
  jobId?: string;
  stopRequested: boolean;
  stopError?: string;
}

export interface StreamStartResult {
  jobId: string;
}

export class QueryRunner {
  private readonly client: SqlGatewayApi;
  private readonly session: SessionOwner;
  private readonly tracker: JobTracker;
  private readonly clock: Clock;
  private readonly logger: GatewayLogger;
  private readonly pollIntervalMs: number;
  private readonly streamStartTimeoutMs: number;
  private readonly executionConfig?: Record<string, string>;

  constructor(params: QueryRunnerParams) {
    this.client = params.client;
    this.session = params.session;
    this.tracker = params.tracker;
    this.clock = params.clock ?? systemClock;
    this.logger = params.logger ?? silentLogger;
    this.pollIntervalMs = params.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.streamStartTimeoutMs = params.streamStartTimeoutMs ?? STREAM_START_TIMEOUT_MS;
    this.executionConfig = params.executionConfig;
  }

  private async waitWhileInFlight(
    sessionHandle: string,
    operationHandle: string,
    deadline: number
  ): Promise<{ snapshot: OperationStatusSnapshot; timedOut: boolean }> {
    const polled = await pollUntil({
      clock: this.clock,
      deadline,
      intervalMs: this.pollIntervalMs,
      read: async () => await this.client.getOperationStatus(sessionHandle, operationHandle),
      isDone: (snapshot) => !IN_FLIGHT_STATUSES.has(snapshot.status)
    });
    return { snapshot: polled.value, timedOut: polled.timedOut };
  }

  async runQueryCollectAndStop(query: string, options: CollectAndStopOptions = {}): Promise<CollectAndStopResult> {
    const maxRows = Math.max(0, Math.floor(options.maxRows ?? DEFAULT_MAX_ROWS));
    const maxSeconds = options.maxSeconds ?? DEFAULT_MAX_SECONDS;
    const deadline = this.clock.now() + Math.max(0, maxSeconds) * 1000;

    const { sessionHandle, operationHandle } = await this.session.executeStatement(query, this.executionConfig);
    this.logger.info("query.collect.started", { maxRows, maxSeconds });

    try {
      const waited = await this.waitWhileInFlight(sessionHandle, operationHandle, deadline);
      if (waited.snapshot.status === "ERROR") {
        throw new StatementError(query, await readOperationError(this.client, sessionHandle, operationHandle));
      }

      const rows: ResultRow[] = [];
      let columns: ResultColumn[] = [];
      let exhausted = false;
      let jobId: string | undefined;
      let token: number | null = 0;

      // Rows may already be buffered while the statement is still running, so
      // the first page is read even when the status wait hit the deadline.
      let firstFetch = true;
      while (token !== null && (firstFetch || this.clock.now() < deadline)) {
        firstFetch = false;
        const page = await this.client.fetchResultPage(sessionHandle, operationHandle, token);
        jobId = jobId ?? page.jobId;
        if (page.columns.length > 0) {
          columns = page.columns;
        }
        if (page.resultType === "NOT_READY") {
          const remaining = deadline - this.clock.now();
          if (remaining <= 0) {
            break;
          }
          await this.clock.sleep(Math.min(this.pollIntervalMs, remaining));
          token = page.nextToken;
          continue;
        }

        rows.push(...page.rows.slice(0, maxRows - rows.length));
        if (page.isEnd) {
          exhausted = true;
          break;
        }
        if (rows.length >= maxRows) {
          break;
        }
        token = page.nextToken;
      }

      let stopRequested = false;
      let stopError: string | undefined;
      if (jobId) {
        stopRequested = true;
        stopError = await this.stopAfterCollect(sessionHandle, jobId, deadline);
      }

      const result: CollectAndStopResult = {
        columns,
        rows,
        rowCount: rows.length,
        exhausted,
        status: waited.snapshot.status,
        timedOut: waited.timedOut,
        stopRequested
      };
      if (jobId) {
        result.jobId = jobId;
      }
      if (stopError) {
        result.stopError = stopError;
      }
      this.logger.info("query.collect.completed", {
        rowCount: rows.length,
        exhausted,
        jobId,
        stopRequested,
        stopFailed: stopError !== undefined
      });
      return result;
    } catch (error) {
      throw this.session.statementLost(sessionHandle, error);
    } finally {
      await this.client.closeOperation(sessionHandle, operationHandle);
    }
  }

  /** Returns an error description when the stop could not be confirmed, otherwise undefined. */
  private async stopAfterCollect(sessionHandle: string, jobId: string, deadline: number): Promise<string | undefined> {
    let stopOperation: string;
    try {
      stopOperation = await this.client.stopJob(sessionHandle, jobId);
    } catch (error) {
      this.session.noteRejection(sessionHandle, error);
      this.logger.warn("query.collect.stop_failed", { jobId, message: toErrorText(error) });
      return toErrorText(error);
    }

    try {
      const waited = await this.waitWhileInFlight(sessionHandle, stopOperation, deadline);
      if (waited.snapshot.status === "ERROR") {
        const message = await readOperationError(this.client, sessionHandle, stopOperation);
        this.logger.warn("query.collect.stop_failed", { jobId, message });
        await this.client.closeOperation(sessionHandle, stopOperation);
        return message;
      }
      if (waited.timedOut) {
        // Closing a running STOP JOB would cancel it, so the close waits until it settles.
        this.session.deferClose({ sessionHandle, operationHandle: stopOperation });
        this.logger.warn("query.collect.stop_unconfirmed", {
          jobId,
          operationHandle: stopOperation,
          status: waited.snapshot.raw
        });
        return undefined;
      }
      await this.client.closeOperation(sessionHandle, stopOperation);
      return undefined;
    } catch (error) {
      this.session.noteRejection(sessionHandle, error);
      this.logger.warn("query.collect.stop_failed", { jobId, message: toErrorText(error) });
      return toErrorText(error);
    }
  }

  async runQueryStreamStart(query: string): Promise<StreamStartResult> {
    const { sessionHandle, operationHandle } = await this.session.executeStatement(query, this.executionConfig);

    try {
      const waited = await this.waitWhileInFlight(
        sessionHandle,
        operationHandle,
        this.clock.now() + this.streamStartTimeoutMs
      );
      if (waited.snapshot.status === "ERROR") {
        throw new StatementError(query, await readOperationError(this.client, sessionHandle, operationHandle));
      }

      const firstPage = await this.client.fetchResultPage(sessionHandle, operationHandle, 0);
      const jobId = firstPage.jobId;
      if (!jobId) {
        throw new NoJobIdError(query);
      }
      this.tracker.track(jobId, { operationHandle, sessionHandle, nextToken: 0 });
      this.logger.info("query.stream.started", { jobId });
      return { jobId };
    } catch (error) {
      await this.client.closeOperation(sessionHandle, operationHandle);
      throw this.session.statementLost(sessionHandle, error);
    }
  }
}
