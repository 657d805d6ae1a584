import { systemClock, pollUntil, type Clock } from "../clock.js";
import { CONFIGURE_TIMEOUT_MS, POLL_INTERVAL_MS } from "../constants.js";
import { GatewayError, StatementError, isGatewayError, toErrorText } from "../errors.js";
import { readOperationError } from "../gateway-client/operation-error.js";
import {
  IN_FLIGHT_STATUSES,
  type OperationStatus,
  type SessionProperties,
  type SqlGatewayApi
} from "../gateway-client/types.js";
import { silentLogger, type GatewayLogger } from "../observability.js";

export type SessionState = "UNOPENED" | "OPEN";

export interface SessionOwnerParams {
  client: SqlGatewayApi;
  sessionProperties?: SessionProperties;
  sessionName?: string;
  clock?: Clock;
  logger?: GatewayLogger;
  pollIntervalMs?: number;
  configureTimeoutMs?: number;
}

export interface StatementHandles {
  sessionHandle: string;
  operationHandle: string;
}

export interface ConfigurationResult {
  statement: string;
  status: OperationStatus;
  timedOut: boolean;
}

export interface SessionReopenNotice {
  reason: string;
  lostStatements: string[];
}

/**
 * Owns the single gateway session of the process. The handle only leaves this
 * class as an argument to gateway calls made on a caller's behalf.
 */
export class SessionOwner {
  private readonly client: SqlGatewayApi;
  private readonly sessionProperties: SessionProperties;
  private readonly sessionName?: string;
  private readonly clock: Clock;
  private readonly logger: GatewayLogger;
  private readonly pollIntervalMs: number;
  private readonly configureTimeoutMs: number;

  private handle: string | null = null;
  private opening: Promise<string> | null = null;
  private appliedStatements: string[] = [];
  private pendingNotices: SessionReopenNotice[] = [];
  private deferredCloses: StatementHandles[] = [];
  private openCount = 0;

  constructor(params: SessionOwnerParams) {
    this.client = params.client;
    this.sessionProperties = params.sessionProperties ?? {};
    this.sessionName = params.sessionName;
    this.clock = params.clock ?? systemClock;
    this.logger = params.logger ?? silentLogger;
    this.pollIntervalMs = params.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.configureTimeoutMs = params.configureTimeoutMs ?? CONFIGURE_TIMEOUT_MS;
  }

  get state(): SessionState {
    return this.handle ? "OPEN" : "UNOPENED";
  }

  /** Number of sessions opened so far, re-opens included. */
  get opened(): number {
    return this.openCount;
  }

  async ensureSession(): Promise<string> {
    if (this.handle) {
      return this.handle;
    }
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return await this.opening;
  }

  private async open(): Promise<string> {
    const handle = await this.client.openSession(this.sessionProperties, this.sessionName);
    this.handle = handle;
    this.openCount += 1;
    this.logger.info("session.opened", { generation: this.openCount });
    return handle;
  }

  isCurrent(sessionHandle: string): boolean {
    return this.handle === sessionHandle;
  }

  /** Drops `sessionHandle` if it is still current; the next call opens a new session. */
  invalidate(sessionHandle: string, reason: string): void {
    if (this.handle !== sessionHandle) {
      return;
    }
    this.handle = null;
    this.deferredCloses = [];
    const lostStatements = this.appliedStatements;
    this.appliedStatements = [];
    this.logger.warn("session.invalidated", { reason, lostStatements: lostStatements.length });
    if (lostStatements.length > 0) {
      this.pendingNotices.push({ reason, lostStatements });
    }
  }

  /** Invalidates `sessionHandle` when `error` is a session rejection. */
  noteRejection(sessionHandle: string, error: unknown): void {
    if (isGatewayError(error, "session_invalid")) {
      this.invalidate(sessionHandle, error.message);
    }
  }

  /**
   * Maps a session rejection seen after a statement was submitted to
   * `gateway_unreachable`. The statement died with its session and is not retried.
   */
  statementLost(sessionHandle: string, error: unknown): unknown {
    if (!isGatewayError(error, "session_invalid")) {
      return error;
    }
    this.invalidate(sessionHandle, error.message);
    return new GatewayError(
      "gateway_unreachable",
      `The SQL Gateway session ended while the statement was running: ${error.message}`,
      error.status,
      { cause: error }
    );
  }

  /** Holds an operation that cannot be closed while it runs; it is closed once it settles. */
  deferClose(handles: StatementHandles): void {
    if (this.isCurrent(handles.sessionHandle)) {
      this.deferredCloses.push(handles);
    }
  }

  /** Number of operations waiting to be closed. */
  get deferred(): number {
    return this.deferredCloses.length;
  }

  private async closeSettledOperations(): Promise<void> {
    const pending = this.deferredCloses;
    this.deferredCloses = [];
    for (const handles of pending) {
      if (!this.isCurrent(handles.sessionHandle)) {
        continue;
      }
      try {
        const snapshot = await this.client.getOperationStatus(handles.sessionHandle, handles.operationHandle);
        if (IN_FLIGHT_STATUSES.has(snapshot.status)) {
          this.deferredCloses.push(handles);
          continue;
        }
        await this.client.closeOperation(handles.sessionHandle, handles.operationHandle);
        this.logger.debug("session.deferred_close", { operationHandle: handles.operationHandle, status: snapshot.raw });
      } catch (error) {
        this.noteRejection(handles.sessionHandle, error);
        this.logger.warn("session.deferred_close_failed", {
          operationHandle: handles.operationHandle,
          message: toErrorText(error)
        });
      }
    }
  }

  /**
   * Runs one gateway call against the current session. A rejected session is
   * re-opened and the call retried once.
   */
  async withSession<T>(run: (sessionHandle: string) => Promise<T>): Promise<T> {
    const sessionHandle = await this.ensureSession();
    try {
      return await run(sessionHandle);
    } catch (error) {
      if (!isGatewayError(error, "session_invalid")) {
        throw error;
      }
      this.invalidate(sessionHandle, error.message);
    }

    const reopened = await this.ensureSession();
    try {
      return await run(reopened);
    } catch (error) {
      if (isGatewayError(error, "session_invalid")) {
        throw new GatewayError(
          "gateway_unreachable",
          `SQL Gateway rejected a freshly opened session: ${error.message}`,
          error.status,
          { cause: error }
        );
      }
      throw error;
    }
  }

  async executeStatement(statement: string, executionConfig?: Record<string, string>): Promise<StatementHandles> {
    if (this.deferredCloses.length > 0) {
      await this.closeSettledOperations();
    }
    return await this.withSession(async (sessionHandle) => ({
      sessionHandle,
      operationHandle: await this.client.executeStatement(sessionHandle, statement, executionConfig)
    }));
  }

  async applyConfiguration(statement: string): Promise<ConfigurationResult> {
    const { sessionHandle, operationHandle } = await this.executeStatement(statement);
    try {
      const polled = await pollUntil({
        clock: this.clock,
        deadline: this.clock.now() + this.configureTimeoutMs,
        intervalMs: this.pollIntervalMs,
        read: async () => await this.client.getOperationStatus(sessionHandle, operationHandle),
        isDone: (snapshot) => !IN_FLIGHT_STATUSES.has(snapshot.status)
      });

      const status = polled.value.status;
      if (status === "ERROR") {
        throw new StatementError(statement, await readOperationError(this.client, sessionHandle, operationHandle));
      }
      if (status === "FINISHED" && this.handle === sessionHandle) {
        this.appliedStatements.push(statement);
      }
      if (polled.timedOut) {
        this.logger.warn("session.configure_timeout", { statement, status });
      }
      return { statement, status, timedOut: polled.timedOut };
    } catch (error) {
      throw this.statementLost(sessionHandle, error);
    } finally {
      await this.client.closeOperation(sessionHandle, operationHandle);
    }
  }

  async getConfig(): Promise<SessionProperties> {
    return await this.withSession(async (sessionHandle) => await this.client.getSessionConfig(sessionHandle));
  }

  drainNotices(): string[] {
    const notices = this.pendingNotices.map(
      (notice) =>
        `The SQL Gateway session was re-opened (${notice.reason}); these session statements were lost and must be re-applied: ${notice.lostStatements.join("; ")}`
    );
    this.pendingNotices = [];
    return notices;
  }

  async close(): Promise<void> {
    const sessionHandle = this.handle;
    this.handle = null;
    this.appliedStatements = [];
    this.deferredCloses = [];
    if (!sessionHandle) {
      return;
    }
    const closed = await this.client.closeSession(sessionHandle);
    this.logger.info("session.closed", { closed });
  }
}
