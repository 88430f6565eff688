import { isRecord } from "../utils.js";
import { ToolFailureError } from "./errors.js";
import type {
  ToolDefinition,
  ToolDefinitionSpec,
  ToolParameterSchema,
  ToolValidationIssue
} from "./types.js";

export function isSchemaLike(value: unknown): value is ToolParameterSchema {
  return isRecord(value) && typeof value.safeParse === "function";
}

export function normalizeValidationIssues(error: unknown): ToolValidationIssue[] {
  if (!isRecord(error)) {
    return [];
  }

  const issues = error.issues;
  if (!Array.isArray(issues)) {
    return [];
  }

  const normalized: ToolValidationIssue[] = [];
  for (const issue of issues) {
    if (!isRecord(issue)) {
      continue;
    }
    const pathParts = Array.isArray(issue.path) ? issue.path.map((part) => String(part)) : [];
    normalized.push({
      path: pathParts.length > 0 ? pathParts.join(".") : "$",
      message: typeof issue.message === "string" ? issue.message : "Invalid value",
      code: typeof issue.code === "string" ? issue.code : undefined
    });
  }
  return normalized;
}

export function describeValidationIssues(issues: ToolValidationIssue[]): string {
  if (issues.length === 0) {
    return "Tool arguments failed validation";
  }
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
}

/**
 * Wraps a typed tool so its handler only ever sees input that passed its own
 * schema.
 */
export function defineTool<TInput, TOutput>(tool: ToolDefinitionSpec<TInput, TOutput>): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
    execute: (input, context) => {
      const parsed = tool.parameters.safeParse(input);
      if (!parsed.success) {
        const issues = normalizeValidationIssues(parsed.error);
        throw new ToolFailureError("invalid_arguments", describeValidationIssues(issues), undefined, issues);
      }
      return tool.execute(parsed.data, context);
    }
  };
}

export function asToolDefinition(value: unknown): ToolDefinition | null {
  if (!isRecord(value)) {
    return null;
  }

  const name = value.name;
  if (typeof name !== "string" || name.trim().length === 0) {
    return null;
  }
  const execute = value.execute;
  if (typeof execute !== "function") {
    return null;
  }
  const candidateParameters = value.parameters;
  let parameters: ToolParameterSchema | undefined;
  if (candidateParameters !== undefined) {
    if (!isSchemaLike(candidateParameters)) {
      return null;
    }
    parameters = candidateParameters;
  }

  return {
    name: name.trim(),
    description: typeof value.description === "string" ? value.description : undefined,
    parameters,
    execute: (input, context): unknown => Reflect.apply(execute, value, [input, context])
  };
}
