import type { ToolCallRecord } from "../conversation/types.js";
import { errorMessage } from "../utils.js";
import { describeValidationIssues, normalizeValidationIssues } from "./definition.js";
import { ToolFailureError } from "./errors.js";
import type { ToolRegistry } from "./registry.js";
import type { ExecutionResult, ToolContext, ToolDefinition, ToolFailure } from "./types.js";

export type ResolvedToolCall =
  | {
      kind: "registered";
      tool: ToolDefinition;
      record: ToolCallRecord;
    }
  | {
      kind: "unregistered";
      name: string;
      record: ToolCallRecord;
    };

export function resolveToolCall(registry: ToolRegistry, record: ToolCallRecord): ResolvedToolCall {
  const tool = registry.get(record.name);
  if (!tool) {
    return {
      kind: "unregistered",
      name: record.name,
      record
    };
  }
  return {
    kind: "registered",
    tool,
    record
  };
}

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
      error: ToolFailure;
    } {
  if (!tool.parameters) {
    return {
      ok: true,
      value: input
    };
  }

  const parsed = tool.parameters.safeParse(input);
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
      code: "invalid_arguments",
      message: describeValidationIssues(issues),
      issues
    }
  };
}

function failureFromError(error: unknown): ExecutionResult {
  if (error instanceof ToolFailureError) {
    const failure: ToolFailure = {
      code: error.code,
      message: error.message
    };
    if (error.issues) {
      failure.issues = error.issues;
    }
    return error.output === undefined
      ? { ok: false, error: failure }
      : { ok: false, error: failure, output: error.output };
  }
  return {
    ok: false,
    error: {
      code: "execution_error",
      message: errorMessage(error)
    }
  };
}

/**
 * Runs one recovered tool call. Every failure, including unknown tools and
 * rejected arguments, comes back as an `ExecutionResult`; nothing is thrown.
 */
export async function executeToolCall(params: {
  record: ToolCallRecord;
  registry: ToolRegistry;
  context: ToolContext;
}): Promise<ExecutionResult> {
  const resolved = resolveToolCall(params.registry, params.record);
  if (resolved.kind === "unregistered") {
    return {
      ok: false,
      error: {
        code: "unknown_tool",
        message: `Unknown tool: ${resolved.name}. Available tools: ${params.registry.names().join(", ")}`
      }
    };
  }

  const validation = validateToolInput(resolved.tool, resolved.record.arguments);
  if (!validation.ok) {
    return {
      ok: false,
      error: validation.error
    };
  }

  try {
    const output = await resolved.tool.execute(validation.value, params.context);
    return {
      ok: true,
      output
    };
  } catch (error) {
    return failureFromError(error);
  }
}
