import { DEFAULT_GATEWAY_API_VERSION, DEFAULT_REQUEST_TIMEOUT_MS, RESULT_ROW_FORMAT } from "../constants.js";
import type { GatewayApiVersion } from "../config.js";
import { GatewayError, toErrorText } from "../errors.js";
import { silentLogger, type GatewayLogger } from "../observability.js";
import { requestJsonWithTimeout, type HttpMethod, type JsonHttpResponse } from "./http.js";
import {
  parseOperationStatus,
  parseResultPage,
  parseSessionProperties,
  quoteSqlLiteral,
  readGatewayMessage,
  readHandle,
  toRecord
} from "./payloads.js";
import type {
  ClusterInfo,
  OperationStatusSnapshot,
  ResultPage,
  SessionProperties,
  SqlGatewayApi
} from "./types.js";

export interface SqlGatewayClientOptions {
  baseUrl: string;
  apiVersion?: GatewayApiVersion;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: GatewayLogger;
}

// Matches "Session '<handle>' does not exist." and the unquoted variants.
const SESSION_INVALID_PATTERN =
  /\bsession\s+(?:'[^'\n]*'|[\w.:-]+)\s+(?:does not exist|doesn't exist|not found|has been closed|is closed|(?:has )?expired)/i;

export function isSessionInvalidMessage(message: string): boolean {
  return SESSION_INVALID_PATTERN.test(message);
}

/** A 404 under `/sessions/{handle}` means the gateway no longer knows the session. */
function isSessionRejection(path: string, status: number, message: string): boolean {
  return (status === 404 && path.startsWith("/sessions/")) || isSessionInvalidMessage(message);
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

export class SqlGatewayClient implements SqlGatewayApi {
  private readonly baseUrl: string;
  private readonly apiVersion: GatewayApiVersion;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl?: typeof fetch;
  private readonly logger: GatewayLogger;

  constructor(options: SqlGatewayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiVersion = options.apiVersion ?? DEFAULT_GATEWAY_API_VERSION;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl;
    this.logger = options.logger ?? silentLogger;
  }

  private url(path: string): string {
    return `${this.baseUrl}/${this.apiVersion}${path}`;
  }

  private async request(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<JsonHttpResponse> {
    const url = this.url(path);
    let response: JsonHttpResponse;
    try {
      response = await requestJsonWithTimeout({
        method,
        url,
        body,
        timeoutMs: this.requestTimeoutMs,
        fetchImpl: this.fetchImpl
      });
    } catch (error) {
      const aborted = error instanceof Error && error.name === "AbortError";
      const reason = aborted ? `timed out after ${this.requestTimeoutMs}ms` : toErrorText(error);
      throw new GatewayError("gateway_unreachable", `SQL Gateway request ${method} ${path} failed: ${reason}`, undefined, {
        cause: error
      });
    }

    this.logger.debug("gateway.http", { method, path, status: response.status });

    if (response.status < 200 || response.status >= 300) {
      const message = readGatewayMessage(response.json, response.text.trim() || `HTTP ${response.status}`);
      const code = isSessionRejection(path, response.status, message) ? "session_invalid" : "http_error";
      throw new GatewayError(code, message, response.status);
    }
    return response;
  }

  async getClusterInfo(): Promise<ClusterInfo> {
    const response = await this.request("GET", "/info");
    return toRecord(response.json) ?? {};
  }

  async openSession(properties: SessionProperties = {}, sessionName?: string): Promise<string> {
    const body: Record<string, unknown> = { properties };
    if (sessionName) {
      body.sessionName = sessionName;
    }
    const response = await this.request("POST", "/sessions", body);
    const handle = readHandle(response.json, "sessionHandle", "session");
    if (!handle) {
      throw new GatewayError("invalid_response", "Open session response did not include a session handle", response.status);
    }
    return handle;
  }

  async closeSession(sessionHandle: string): Promise<boolean> {
    try {
      await this.request("DELETE", `/sessions/${segment(sessionHandle)}`);
      return true;
    } catch (error) {
      this.logger.warn("gateway.close_session_failed", { message: toErrorText(error) });
      return false;
    }
  }

  async getSessionConfig(sessionHandle: string): Promise<SessionProperties> {
    const response = await this.request("GET", `/sessions/${segment(sessionHandle)}`);
    return parseSessionProperties(response.json);
  }

  async executeStatement(
    sessionHandle: string,
    statement: string,
    executionConfig?: Record<string, string>
  ): Promise<string> {
    const body: Record<string, unknown> = { statement };
    if (executionConfig && Object.keys(executionConfig).length > 0) {
      body.executionConfig = executionConfig;
    }
    const response = await this.request("POST", `/sessions/${segment(sessionHandle)}/statements`, body);
    const handle = readHandle(response.json, "operationHandle", "operation_handle");
    if (!handle) {
      throw new GatewayError("invalid_response", "Execute statement response did not include an operation handle", response.status);
    }
    return handle;
  }

  async getOperationStatus(sessionHandle: string, operationHandle: string): Promise<OperationStatusSnapshot> {
    const response = await this.request(
      "GET",
      `/sessions/${segment(sessionHandle)}/operations/${segment(operationHandle)}/status`
    );
    return parseOperationStatus(response.json);
  }

  async fetchResultPage(sessionHandle: string, operationHandle: string, token: number): Promise<ResultPage> {
    const response = await this.request(
      "GET",
      `/sessions/${segment(sessionHandle)}/operations/${segment(operationHandle)}/result/${token}?rowFormat=${RESULT_ROW_FORMAT}`
    );
    return parseResultPage(response.json, token);
  }

  async closeOperation(sessionHandle: string, operationHandle: string): Promise<boolean> {
    try {
      await this.request("DELETE", `/sessions/${segment(sessionHandle)}/operations/${segment(operationHandle)}/close`);
      return true;
    } catch (error) {
      this.logger.warn("gateway.close_operation_failed", { message: toErrorText(error) });
      return false;
    }
  }

  async stopJob(sessionHandle: string, jobId: string): Promise<string> {
    return await this.executeStatement(sessionHandle, `STOP JOB ${quoteSqlLiteral(jobId)}`);
  }
}
