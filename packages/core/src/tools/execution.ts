import { isGatewayError, toErrorText } from "../errors.js";
import { normalizeValidationIssues } from "./definition.js";
import type {
  ToolDefinition,
  ToolContext,
  ToolExecutionError,
  ToolExecutionResult,
  ToolValidationError
} from "./types.js";

export function validateToolInput(
  tool: ToolDefinition,
  input: unknown
):
  | {
      ok: true;
      value: unknown;
    }
  | {
      ok: false;
      error: ToolValidationError;
    } {
  const parsed = tool.parameters.safeParse(input ?? {});
  if (parsed.success) {
    return {
      ok: true,
      value: parsed.data
    };
  }

  const issues = normalizeValidationIssues(parsed.error);
  return {
    ok: false,
    error: {
      code: "validation_error",
      message: issues[0] ? `${issues[0].path}: ${issues[0].message}` : "Tool input validation failed",
      issues
    }
  };
}

export function toExecutionError(error: unknown): ToolExecutionError {
  const failure: ToolExecutionError = {
    code: "execution_error",
    message: toErrorText(error)
  };
  if (isGatewayError(error)) {
    failure.kind = error.code;
  }
  return failure;
}

export async function executeToolDefinition(params: {
  tool: ToolDefinition;
  input: unknown;
  context: ToolContext;
}): Promise<ToolExecutionResult> {
  const validation = validateToolInput(params.tool, params.input);
  if (!validation.ok) {
    return {
      ok: false,
      error: validation.error
    };
  }

  try {
    const output = await params.tool.execute(validation.value, params.context);
    return {
      ok: true,
      output
    };
  } catch (error) {
    return {
      ok: false,
      error: toExecutionError(error)
    };
  }
}
