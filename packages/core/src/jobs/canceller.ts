import { pollUntil, systemClock, type Clock } from "../clock.js";
import { CANCEL_TIMEOUT_MS, POLL_INTERVAL_MS } from "../constants.js";
import { JobTrackingError, isGatewayError, toErrorText } from "../errors.js";
import { readOperationError } from "../gateway-client/operation-error.js";
import {
  IN_FLIGHT_STATUSES,
  type OperationStatus,
  type OperationStatusSnapshot,
  type ResultPage,
  type SqlGatewayApi
} from "../gateway-client/types.js";
import { silentLogger, type GatewayLogger } from "../observability.js";
import type { SessionOwner } from "../session/owner.js";
import type { JobTracker, TrackedJob } from "./tracker.js";

export interface JobCancellerParams {
  client: SqlGatewayApi;
  session: SessionOwner;
  tracker: JobTracker;
  clock?: Clock;
  logger?: GatewayLogger;
  pollIntervalMs?: number;
  cancelTimeoutMs?: number;
}

export interface FetchByJobIdResult {
  jobId: string;
  token: number;
  page: ResultPage;
  nextToken: number | null;
  isEnd: boolean;
}

export interface CancelJobResult {
  jobId: string;
  /** Last observed status of the job's statement. */
  status: OperationStatus;
  /** Status string as reported by the gateway, empty when it was never read. */
  rawStatus: string;
  jobGone: boolean;
  timedOut: boolean;
  stopStatus?: OperationStatus;
  stopError?: string;
}

const GONE_STATUSES: ReadonlySet<OperationStatus> = new Set(["CANCELED", "CLOSED"]);

export class JobCanceller {
  private readonly client: SqlGatewayApi;
  private readonly session: SessionOwner;
  private readonly tracker: JobTracker;
  private readonly clock: Clock;
  private readonly logger: GatewayLogger;
  private readonly pollIntervalMs: number;
  private readonly cancelTimeoutMs: number;
  private readonly cancelling = new Map<string, Promise<CancelJobResult>>();

  constructor(params: JobCancellerParams) {
    this.client = params.client;
    this.session = params.session;
    this.tracker = params.tracker;
    this.clock = params.clock ?? systemClock;
    this.logger = params.logger ?? silentLogger;
    this.pollIntervalMs = params.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.cancelTimeoutMs = params.cancelTimeoutMs ?? CANCEL_TIMEOUT_MS;
  }

  /** Untracks a job whose operation died with its session. */
  private dropStale(entry: TrackedJob, reason: string): JobTrackingError {
    this.tracker.untrack(entry.jobId);
    this.logger.warn("job.stale", { jobId: entry.jobId, reason });
    return new JobTrackingError(
      "job_not_tracked",
      entry.jobId,
      `Job ${entry.jobId} is no longer tracked: its SQL Gateway session is gone (${reason})`
    );
  }

  async fetchResultByJobId(jobId: string, token?: number): Promise<FetchByJobIdResult> {
    const entry = this.tracker.lookup(jobId);
    if (!this.session.isCurrent(entry.sessionHandle)) {
      throw this.dropStale(entry, "the session was re-opened");
    }

    const readToken = token ?? entry.nextToken;
    let page: ResultPage;
    try {
      page = await this.client.fetchResultPage(entry.sessionHandle, entry.operationHandle, readToken);
    } catch (error) {
      if (isGatewayError(error, "session_invalid")) {
        this.session.invalidate(entry.sessionHandle, error.message);
        throw this.dropStale(entry, error.message);
      }
      throw error;
    }

    if (page.nextToken !== null) {
      this.tracker.advance(jobId, page.nextToken);
    }
    this.logger.debug("job.fetch", { jobId, readToken, rows: page.rows.length, isEnd: page.isEnd });
    return {
      jobId,
      token: readToken,
      page,
      nextToken: page.nextToken,
      isEnd: page.isEnd
    };
  }

  async cancelJob(jobId: string): Promise<CancelJobResult> {
    const inFlight = this.cancelling.get(jobId);
    if (inFlight) {
      return await inFlight;
    }
    const entry = this.tracker.lookup(jobId);
    const cancellation = this.cancelTracked(entry).finally(() => {
      this.cancelling.delete(jobId);
    });
    this.cancelling.set(jobId, cancellation);
    return await cancellation;
  }

  private async cancelTracked(entry: TrackedJob): Promise<CancelJobResult> {
    const { jobId } = entry;
    const deadline = this.clock.now() + this.cancelTimeoutMs;
    let stopStatus: OperationStatus | undefined;
    let stopError: string | undefined;
    let snapshot: OperationStatusSnapshot | undefined;
    let timedOut = false;

    try {
      // Job ids are cluster-wide, so the stop goes through whichever session is current.
      let stop: { sessionHandle: string; operationHandle: string } | undefined;
      try {
        stop = await this.session.withSession(async (sessionHandle) => ({
          sessionHandle,
          operationHandle: await this.client.stopJob(sessionHandle, jobId)
        }));
      } catch (error) {
        stopError = toErrorText(error);
      }

      if (stop) {
        const stopped = await this.waitWhileInFlight(stop.sessionHandle, stop.operationHandle, deadline);
        stopStatus = stopped.snapshot?.status;
        if (stopStatus === "ERROR") {
          stopError = await readOperationError(this.client, stop.sessionHandle, stop.operationHandle);
        }
        if (stopStatus !== undefined && !IN_FLIGHT_STATUSES.has(stopStatus)) {
          await this.client.closeOperation(stop.sessionHandle, stop.operationHandle);
        } else if (stopped.timedOut) {
          this.session.deferClose(stop);
        }
        stopError = stopError ?? stopped.error;
      }

      if (this.session.isCurrent(entry.sessionHandle)) {
        const observed = await this.waitWhileInFlight(entry.sessionHandle, entry.operationHandle, deadline);
        snapshot = observed.snapshot;
        timedOut = observed.timedOut;
      }
    } finally {
      this.tracker.untrack(jobId);
    }

    if (this.session.isCurrent(entry.sessionHandle)) {
      await this.client.closeOperation(entry.sessionHandle, entry.operationHandle);
    }

    const status = snapshot?.status ?? "UNKNOWN";
    const jobGone = stopStatus === "FINISHED" || GONE_STATUSES.has(status);
    const result: CancelJobResult = {
      jobId,
      status,
      rawStatus: snapshot?.raw ?? "",
      jobGone,
      timedOut
    };
    if (stopStatus) {
      result.stopStatus = stopStatus;
    }
    if (stopError) {
      result.stopError = stopError;
    }
    this.logger.info("job.cancelled", { jobId, status, jobGone, timedOut, stopStatus, stopFailed: stopError !== undefined });
    return result;
  }

  /** Status polling that records a failing read instead of throwing it. */
  private async waitWhileInFlight(
    sessionHandle: string,
    operationHandle: string,
    deadline: number
  ): Promise<{ snapshot?: OperationStatusSnapshot; timedOut: boolean; error?: string }> {
    try {
      const polled = await pollUntil({
        clock: this.clock,
        deadline,
        intervalMs: this.pollIntervalMs,
        read: async () => await this.client.getOperationStatus(sessionHandle, operationHandle),
        isDone: (value) => !IN_FLIGHT_STATUSES.has(value.status)
      });
      return { snapshot: polled.value, timedOut: polled.timedOut };
    } catch (error) {
      this.session.noteRejection(sessionHandle, error);
      this.logger.warn("job.status_read_failed", { message: toErrorText(error) });
      return { timedOut: false, error: toErrorText(error) };
    }
  }
}
