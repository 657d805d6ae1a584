import { z } from "zod";
import { DEFAULT_MAX_ROWS, DEFAULT_MAX_SECONDS } from "../constants.js";

const MAX_COLLECT_ROWS = 10_000;
const MAX_COLLECT_SECONDS = 600;

/** Leading keywords of statements that change session state rather than produce results. */
export const SESSION_STATEMENT_KEYWORDS = [
  "CREATE",
  "DROP",
  "ALTER",
  "USE",
  "SET",
  "RESET",
  "LOAD",
  "UNLOAD",
  "ADD",
  "REMOVE"
] as const;

export function leadingKeyword(statement: string): string {
  const withoutComments = statement
    .replace(/\/\*[\s\S]*?\*\//g, " ")
    .replace(/--[^\n]*/g, " ")
    .trim();
  const match = /^[A-Za-z]+/.exec(withoutComments);
  return match ? match[0].toUpperCase() : "";
}

export function isSessionStatement(statement: string): boolean {
  const keyword = leadingKeyword(statement);
  return SESSION_STATEMENT_KEYWORDS.some((candidate) => candidate === keyword);
}

const jobIdSchema = z.string().trim().min(1).describe("Cluster job id returned by run_query_stream_start");

export const flinkInfoToolSchema = z.object({}).strict();

export const getConfigToolSchema = z.object({}).strict();

export const configureSessionToolSchema = z
  .object({
    statement: z
      .string()
      .trim()
      .min(1)
      .refine(isSessionStatement, {
        message: `statement must start with one of ${SESSION_STATEMENT_KEYWORDS.join(", ")}`
      })
      .describe("One session-scoped statement, e.g. SET 'execution.runtime-mode' = 'batch'")
  })
  .strict();

export const collectAndStopToolSchema = z
  .object({
    query: z.string().trim().min(1).describe("SQL query to run"),
    maxRows: z
      .number()
      .int()
      .min(0)
      .max(MAX_COLLECT_ROWS)
      .optional()
      .default(DEFAULT_MAX_ROWS)
      .describe("Upper bound on returned rows"),
    maxSeconds: z
      .number()
      .positive()
      .max(MAX_COLLECT_SECONDS)
      .optional()
      .default(DEFAULT_MAX_SECONDS)
      .describe("Wall-clock budget for waiting and fetching")
  })
  .strict();

export const streamStartToolSchema = z
  .object({
    query: z.string().trim().min(1).describe("Streaming statement to start, e.g. INSERT INTO sink SELECT * FROM source")
  })
  .strict();

export const fetchByJobIdToolSchema = z
  .object({
    jobId: jobIdSchema,
    token: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe("Result token to read; defaults to the job's next unread page")
  })
  .strict();

export const cancelJobToolSchema = z
  .object({
    jobId: jobIdSchema
  })
  .strict();

export const listTrackedJobsToolSchema = z.object({}).strict();
