import type {
  OperationStatus,
  OperationStatusSnapshot,
  ResultColumn,
  ResultPage,
  ResultRow,
  ResultType
} from "./types.js";

const KNOWN_STATUSES: ReadonlySet<string> = new Set<OperationStatus>([
  "INITIALIZED",
  "PENDING",
  "RUNNING",
  "FINISHED",
  "CANCELED",
  "CLOSED",
  "ERROR",
  "TIMEOUT"
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function toRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function isOperationStatus(value: string): value is OperationStatus {
  return KNOWN_STATUSES.has(value);
}

/** Reads a handle that may arrive as a plain string or as `{ identifier }`. */
export function readHandle(payload: unknown, ...keys: string[]): string | null {
  const record = toRecord(payload);
  if (!record) {
    return null;
  }
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
    const nested = toRecord(value);
    if (nested) {
      for (const nestedKey of ["identifier", "handle", "id"]) {
        const candidate = nested[nestedKey];
        if (typeof candidate === "string" && candidate.trim().length > 0) {
          return candidate;
        }
      }
    }
  }
  return null;
}

export function readGatewayMessage(payload: unknown, fallback: string): string {
  const record = toRecord(payload);
  if (!record) {
    return fallback;
  }
  const errors = record.errors;
  if (Array.isArray(errors)) {
    const parts = errors.filter((entry): entry is string => typeof entry === "string" && entry.trim().length > 0);
    if (parts.length > 0) {
      return parts.join("\n");
    }
  }
  if (typeof record.message === "string" && record.message.trim().length > 0) {
    return record.message;
  }
  return fallback;
}

export function parseOperationStatus(payload: unknown): OperationStatusSnapshot {
  const record = toRecord(payload);
  let raw: unknown = record?.status ?? record?.operationStatus;
  const nested = toRecord(raw);
  if (nested) {
    raw = nested.status;
  }
  const rawText = typeof raw === "string" ? raw : "";
  const normalized = rawText.trim().toUpperCase();
  return {
    status: isOperationStatus(normalized) ? normalized : "UNKNOWN",
    raw: rawText
  };
}

export function parseSessionProperties(payload: unknown): Record<string, string> {
  const record = toRecord(payload);
  const properties = toRecord(record?.properties);
  if (!properties) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value === null || value === undefined) {
      continue;
    }
    result[key] = typeof value === "string" ? value : String(value);
  }
  return result;
}

function parseResultType(value: unknown): ResultType {
  const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
  if (normalized === "NOT_READY" || normalized === "EOS") {
    return normalized;
  }
  return "PAYLOAD";
}

function parseColumns(value: unknown): ResultColumn[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const columns: ResultColumn[] = [];
  value.forEach((entry, index) => {
    const record = toRecord(entry);
    const name = typeof record?.name === "string" && record.name.length > 0 ? record.name : `f${index}`;
    const column: ResultColumn = { name };
    if (record && "logicalType" in record) {
      column.logicalType = record.logicalType;
    }
    if (record && (typeof record.comment === "string" || record.comment === null)) {
      column.comment = record.comment;
    }
    columns.push(column);
  });
  return columns;
}

function toFieldMap(values: unknown[], columns: ResultColumn[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  values.forEach((value, index) => {
    fields[columns[index]?.name ?? `f${index}`] = value;
  });
  return fields;
}

function parseRows(value: unknown, columns: ResultColumn[]): ResultRow[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const rows: ResultRow[] = [];
  for (const entry of value) {
    if (Array.isArray(entry)) {
      rows.push({ kind: "INSERT", fields: toFieldMap(entry, columns) });
      continue;
    }
    const record = toRecord(entry);
    if (!record) {
      continue;
    }
    const kind = typeof record.kind === "string" ? record.kind : "INSERT";
    const fields = Array.isArray(record.fields) ? toFieldMap(record.fields, columns) : {};
    rows.push({ kind, fields });
  }
  return rows;
}

/** Extracts the token from a `nextResultUri` such as `/v3/sessions/s/operations/o/result/4?rowFormat=JSON`. */
export function parseNextToken(nextResultUri: unknown): number | null {
  if (typeof nextResultUri !== "string") {
    return null;
  }
  const match = /\/result\/(\d+)(?:[?#].*)?$/.exec(nextResultUri.trim());
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

export function readJobId(payload: unknown): string | undefined {
  const record = toRecord(payload);
  const candidate = record?.jobID ?? record?.jobId;
  return typeof candidate === "string" && candidate.trim().length > 0 ? candidate : undefined;
}

export function parseResultPage(payload: unknown, token: number): ResultPage {
  const record = toRecord(payload) ?? {};
  const resultType = parseResultType(record.resultType);
  const results = toRecord(record.results);
  const columns = parseColumns(results?.columns);
  const rows = parseRows(results?.data ?? record.data, columns);
  const isEnd = resultType === "EOS";

  let nextToken: number | null = null;
  if (!isEnd) {
    nextToken = parseNextToken(record.nextResultUri) ?? (resultType === "NOT_READY" ? token : token + 1);
  }

  const page: ResultPage = {
    resultType,
    columns,
    rows,
    nextToken,
    isEnd
  };
  const jobId = readJobId(record);
  if (jobId) {
    page.jobId = jobId;
  }
  if (typeof record.resultKind === "string") {
    page.resultKind = record.resultKind;
  }
  if (typeof record.isQueryResult === "boolean") {
    page.isQueryResult = record.isQueryResult;
  }
  return page;
}

/** Single-quoted SQL string literal. */
export function quoteSqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
