export type OperationStatus =
  | "INITIALIZED"
  | "PENDING"
  | "RUNNING"
  | "FINISHED"
  | "CANCELED"
  | "CLOSED"
  | "ERROR"
  | "TIMEOUT"
  | "UNKNOWN";

export const IN_FLIGHT_STATUSES: ReadonlySet<OperationStatus> = new Set(["INITIALIZED", "PENDING", "RUNNING"]);

export interface OperationStatusSnapshot {
  status: OperationStatus;
  /** Status string exactly as the gateway reported it. */
  raw: string;
}

export type ResultType = "NOT_READY" | "PAYLOAD" | "EOS";

export interface ResultColumn {
  name: string;
  logicalType?: unknown;
  comment?: string | null;
}

export interface ResultRow {
  /** Changelog kind (INSERT, UPDATE_BEFORE, UPDATE_AFTER, DELETE). */
  kind: string;
  fields: Record<string, unknown>;
}

export interface ResultPage {
  resultType: ResultType;
  resultKind?: string;
  isQueryResult?: boolean;
  columns: ResultColumn[];
  rows: ResultRow[];
  jobId?: string;
  /** Token of the next page, or null once the stream has ended. */
  nextToken: number | null;
  isEnd: boolean;
}

export type ClusterInfo = Record<string, unknown>;
export type SessionProperties = Record<string, string>;

export interface SqlGatewayApi {
  getClusterInfo: () => Promise<ClusterInfo>;
  openSession: (properties?: SessionProperties, sessionName?: string) => Promise<string>;
  closeSession: (sessionHandle: string) => Promise<boolean>;
  getSessionConfig: (sessionHandle: string) => Promise<SessionProperties>;
  executeStatement: (
    sessionHandle: string,
    statement: string,
    executionConfig?: Record<string, string>
  ) => Promise<string>;
  getOperationStatus: (sessionHandle: string, operationHandle: string) => Promise<OperationStatusSnapshot>;
  fetchResultPage: (sessionHandle: string, operationHandle: string, token: number) => Promise<ResultPage>;
  closeOperation: (sessionHandle: string, operationHandle: string) => Promise<boolean>;
  stopJob: (sessionHandle: string, jobId: string) => Promise<string>;
}
