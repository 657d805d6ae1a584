export type GatewayErrorCode =
  | "gateway_unreachable"
  | "session_invalid"
  | "http_error"
  | "invalid_response"
  | "statement_error"
  | "job_not_tracked"
  | "job_already_tracked"
  | "no_job_id";

export class GatewayError extends Error {
  constructor(
    public readonly code: GatewayErrorCode,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

/** An operation reached ERROR status; `message` is what the gateway reported. */
export class StatementError extends GatewayError {
  constructor(
    public readonly statement: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("statement_error", message, undefined, options);
    this.name = "StatementError";
  }
}

export class JobTrackingError extends GatewayError {
  constructor(
    code: "job_not_tracked" | "job_already_tracked",
    public readonly jobId: string,
    message: string
  ) {
    super(code, message);
    this.name = "JobTrackingError";
  }
}

export class NoJobIdError extends GatewayError {
  constructor(public readonly statement: string) {
    super("no_job_id", "The gateway did not report a job id on the first result page of the statement");
    this.name = "NoJobIdError";
  }
}

export function isGatewayError(error: unknown, code?: GatewayErrorCode): error is GatewayError {
  if (!(error instanceof GatewayError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function toErrorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
