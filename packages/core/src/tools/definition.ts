import type { ZodError } from "zod";
import type {
  ToolDefinition,
  ToolDefinitionSpec,
  ToolParameters,
  ToolValidationIssue
} from "./types.js";

export function isSchemaLike(value: unknown): value is ToolParameters {
  if (!value || typeof value !== "object" || !("safeParse" in value) || !("shape" in value)) {
    return false;
  }
  return typeof value.safeParse === "function" && Boolean(value.shape) && typeof value.shape === "object";
}

export function defineTool<TSchema extends ToolParameters, TOutput = unknown>(
  tool: ToolDefinitionSpec<TSchema, TOutput>
): ToolDefinition {
  return tool as unknown as ToolDefinition;
}

export function asToolDefinition(value: unknown): ToolDefinition | null {
  if (!value || typeof value !== "object") {
    return null;
  }

  const candidate = value as Partial<ToolDefinition>;
  if (typeof candidate.name !== "string" || !/^[a-z][a-z0-9_]*$/.test(candidate.name.trim())) {
    return null;
  }
  if (typeof candidate.execute !== "function") {
    return null;
  }
  if (!isSchemaLike(candidate.parameters)) {
    return null;
  }

  return {
    name: candidate.name.trim(),
    description: typeof candidate.description === "string" ? candidate.description : undefined,
    parameters: candidate.parameters,
    execute: candidate.execute
  };
}

export function normalizeValidationIssues(error: ZodError): ToolValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.map((part) => String(part)).join(".") : "$",
    message: issue.message,
    code: issue.code
  }));
}
