import { isRecord } from "../utils.js";

const NAME_KEYS = ["tool", "name", "tool_name", "function"] as const;
const ARGUMENT_KEYS = ["parameters", "arguments", "args", "input"] as const;

export type ToolCallShape =
  | {
      ok: true;
      name: string;
      arguments: Record<string, unknown>;
    }
  | {
      ok: false;
      code: "missing_tool_name" | "invalid_arguments_shape";
      message: string;
    };

function normalizeArguments(value: unknown): Record<string, unknown> | null {
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return {};
    }
    try {
      const decoded: unknown = JSON.parse(trimmed);
      return isRecord(decoded) ? decoded : null;
    } catch {
      return null;
    }
  }
  return isRecord(value) ? value : null;
}

function pickArguments(source: Record<string, unknown>): unknown {
  for (const key of ARGUMENT_KEYS) {
    if (key in source) {
      return source[key];
    }
  }
  return undefined;
}

/** Reads one decoded JSON value as a tool call, accepting the common key spellings. */
export function interpretToolCall(value: unknown): ToolCallShape {
  if (!isRecord(value)) {
    return {
      ok: false,
      code: "missing_tool_name",
      message: "Expected a JSON object naming a tool"
    };
  }

  let name: string | null = null;
  let rawArguments: unknown = pickArguments(value);

  for (const key of NAME_KEYS) {
    const candidate = value[key];
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      name = candidate.trim();
      break;
    }
    if (key === "function" && isRecord(candidate) && typeof candidate.name === "string" && candidate.name.trim()) {
      name = candidate.name.trim();
      if (rawArguments === undefined) {
        rawArguments = pickArguments(candidate);
      }
      break;
    }
  }

  if (!name) {
    return {
      ok: false,
      code: "missing_tool_name",
      message: `No tool name under ${NAME_KEYS.join(", ")}`
    };
  }

  const args = normalizeArguments(rawArguments);
  if (!args) {
    return {
      ok: false,
      code: "invalid_arguments_shape",
      message: `Arguments for "${name}" must be a JSON object`
    };
  }

  return {
    ok: true,
    name,
    arguments: args
  };
}
