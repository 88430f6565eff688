import { isRecord } from "../utils.js";
import { HttpTransportError } from "./http.js";

export type InferenceFailureClass =
  | "network"
  | "timeout"
  | "server_error"
  | "not_found"
  | "bad_response"
  | "aborted"
  | "unknown";

export class InferenceError extends Error {
  constructor(
    public readonly failureClass: InferenceFailureClass,
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "InferenceError";
  }
}

function statusFromError(error: unknown): number | null {
  if (!isRecord(error)) {
    return null;
  }
  const direct =
    typeof error.status === "number" ? error.status : typeof error.statusCode === "number" ? error.statusCode : null;
  if (direct !== null && Number.isFinite(direct)) {
    return Math.floor(direct);
  }
  return null;
}

export function classifyStatus(status: number): InferenceFailureClass {
  if (status === 404) {
    return "not_found";
  }
  if (status >= 500) {
    return "server_error";
  }
  return "bad_response";
}

export function classifyInferenceFailure(error: unknown): InferenceFailureClass {
  if (error instanceof InferenceError) {
    return error.failureClass;
  }
  if (error instanceof HttpTransportError) {
    return error.reason;
  }

  const status = statusFromError(error);
  if (status !== null) {
    return classifyStatus(status);
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  if (message.includes("timeout") || message.includes("timed out")) {
    return "timeout";
  }
  if (message.includes("abort")) {
    return "aborted";
  }
  if (
    message.includes("econn") ||
    message.includes("network") ||
    message.includes("enotfound") ||
    message.includes("ehostunreach") ||
    message.includes("fetch failed")
  ) {
    return "network";
  }
  return "unknown";
}

/** Wraps any failure from the inference boundary as an `InferenceError`. */
export function toInferenceError(error: unknown): InferenceError {
  if (error instanceof InferenceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InferenceError(classifyInferenceFailure(error), message, statusFromError(error), { cause: error });
}
