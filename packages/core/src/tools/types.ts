import type { z } from "zod";
import type { GatewayErrorCode } from "../errors.js";

export interface ToolContext {
  /** Identifies one invocation in log records. */
  callId: string;
}

export interface ToolValidationIssue {
  path: string;
  message: string;
  code?: string;
}

export interface ToolValidationError {
  code: "validation_error";
  message: string;
  issues: ToolValidationIssue[];
}

export interface ToolExecutionError {
  code: "execution_error";
  message: string;
  /** Set when the failure came from the SQL Gateway layer. */
  kind?: GatewayErrorCode;
}

export type ToolFailure = ToolValidationError | ToolExecutionError;

export type ToolParameters = z.AnyZodObject;

export interface ToolDefinition {
  name: string;
  description?: string;
  parameters: ToolParameters;
  execute: (input: unknown, context: ToolContext) => Promise<unknown> | unknown;
}

export interface ToolDefinitionSpec<TSchema extends ToolParameters = ToolParameters, TOutput = unknown> {
  name: string;
  description?: string;
  parameters: TSchema;
  execute: (input: z.output<TSchema>, context: ToolContext) => Promise<TOutput> | TOutput;
}

export interface ToolExecutionResult {
  ok: boolean;
  output?: unknown;
  error?: ToolFailure;
}

export type ToolSkipReason = "invalid_shape" | "name_collision";

export interface ToolSkipDiagnostic {
  reason: ToolSkipReason;
  message: string;
  toolName?: string;
}

export interface ToolRegistryDiagnostics {
  loadedCount: number;
  skipped: ToolSkipDiagnostic[];
}

export interface ToolRegistryResult {
  tools: Map<string, ToolDefinition>;
  diagnostics: ToolRegistryDiagnostics;
}
