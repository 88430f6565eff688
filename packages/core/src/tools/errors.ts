import type { ToolErrorCode, ToolValidationIssue } from "./types.js";

/**
 * Thrown by tool handlers for failures the model should see with a specific
 * code. The executor turns it into an `ExecutionResult`; it never escapes the
 * executor.
 */
export class ToolFailureError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly output?: unknown,
    public readonly issues?: ToolValidationIssue[]
  ) {
    super(message);
    this.name = "ToolFailureError";
  }
}
