import type { Conversation } from "../conversation/conversation.js";
import { buildChatMessages, DEFAULT_MAX_TOOL_RESULT_CHARS } from "../conversation/messages.js";
import type { ToolCallRecord } from "../conversation/types.js";
import type { AgentEvent, AgentEventHandler } from "../events.js";
import { toInferenceError, type InferenceFailureClass } from "../inference/failure.js";
import type { InferenceClient } from "../inference/types.js";
import { parseResponse } from "../parser/response-parser.js";
import { executeToolCall } from "../tools/execution.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ExecutionResult } from "../tools/types.js";
import type { JsonValue } from "../types.js";
import { nowIso, toJsonValue } from "../utils.js";

export const DEFAULT_MAX_ROUND_TRIPS = 10;

export type LoopState = "awaiting_model" | "parsing_reply" | "executing_tools" | "done";

export type TurnOutcome =
  | {
      status: "done";
      answer: string;
      roundTrips: number;
    }
  | {
      status: "bound_reached";
      roundTrips: number;
      pendingToolCalls: ToolCallRecord[];
    }
  | {
      status: "inference_unavailable";
      message: string;
      failureClass: InferenceFailureClass;
      roundTrips: number;
    }
  | {
      status: "cancelled";
      roundTrips: number;
    };

export interface ActionLoopOptions {
  systemPrompt: string;
  maxRoundTrips?: number;
  maxToolResultChars?: number;
  /** Called before each tool runs with a handle that aborts only that call. */
  onToolStart?: (record: ToolCallRecord, interrupt: () => void) => void;
}

/**
 * Handle on the tool call currently running, shared between the loop and
 * whoever handles user interrupts.
 */
export class LoopControl {
  private active: { record: ToolCallRecord; controller: AbortController } | null = null;

  get activeToolCall(): ToolCallRecord | null {
    return this.active?.record ?? null;
  }

  /** Aborts the running tool call, if any. Returns whether one was running. */
  interruptActiveTool(): boolean {
    if (!this.active || this.active.controller.signal.aborted) {
      return false;
    }
    this.active.controller.abort();
    return true;
  }

  begin(record: ToolCallRecord): AbortController {
    const controller = new AbortController();
    this.active = { record, controller };
    return controller;
  }

  end(): void {
    this.active = null;
  }
}

export interface RunActionLoopParams {
  conversation: Conversation;
  input: string;
  inference: InferenceClient;
  model: string;
  registry: ToolRegistry;
  context: { workspaceDir: string };
  options: ActionLoopOptions;
  control?: LoopControl;
  onEvent?: AgentEventHandler;
  /** Cancels the whole turn. */
  signal?: AbortSignal;
}

function toolResultSummary(result: ExecutionResult): string {
  return result.ok ? "ok" : `${result.error.code}: ${result.error.message}`;
}

/**
 * Runs one user turn: query the model, recover tool calls from its reply,
 * execute them in order, feed the results back, and repeat until a reply
 * carries no calls or the round-trip bound is hit.
 */
export async function runActionLoop(params: RunActionLoopParams): Promise<TurnOutcome> {
  const maxRoundTrips = params.options.maxRoundTrips ?? DEFAULT_MAX_ROUND_TRIPS;
  const maxToolResultChars = params.options.maxToolResultChars ?? DEFAULT_MAX_TOOL_RESULT_CHARS;
  const control = params.control ?? new LoopControl();
  const conversation = params.conversation;

  const emit = (type: AgentEvent["type"], payload: AgentEvent["payload"]): void => {
    params.onEvent?.({
      type,
      model: params.model,
      timestamp: nowIso(),
      payload
    });
  };
  const enter = (state: LoopState, metadata: Record<string, JsonValue> = {}): void => {
    emit("loop.state", { state, metadata });
  };

  const cancel = (roundTrips: number): TurnOutcome => {
    conversation.appendNotice("cancelled", "Turn cancelled by user");
    enter("done", { status: "cancelled", roundTrips });
    return { status: "cancelled", roundTrips };
  };

  conversation.appendUser(params.input);
  let roundTrips = 0;

  while (true) {
    if (params.signal?.aborted) {
      return cancel(roundTrips);
    }

    enter("awaiting_model", { roundTrips });
    const messages = buildChatMessages({
      systemPrompt: params.options.systemPrompt,
      turns: conversation.snapshot(),
      maxToolResultChars
    });
    emit("inference.request", { metadata: { messageCount: messages.length, roundTrips } });

    let content: string;
    try {
      const reply = await params.inference.chat({
        model: params.model,
        messages,
        signal: params.signal
      });
      content = reply.content;
      const metadata: Record<string, JsonValue> = { chars: content.length };
      if (reply.durationMs !== undefined) {
        metadata.durationMs = reply.durationMs;
      }
      emit("inference.response", { text: content, metadata });
    } catch (error) {
      if (params.signal?.aborted) {
        return cancel(roundTrips);
      }
      const failure = toInferenceError(error);
      emit("inference.error", {
        error: failure.message,
        metadata: { failureClass: failure.failureClass }
      });
      conversation.appendNotice("inference_unavailable", `Inference unavailable (${failure.failureClass}): ${failure.message}`);
      enter("done", { status: "inference_unavailable", roundTrips });
      return {
        status: "inference_unavailable",
        message: failure.message,
        failureClass: failure.failureClass,
        roundTrips
      };
    }

    enter("parsing_reply", { roundTrips });
    const parsed = parseResponse(content, {
      createId: () => conversation.allocateCallId()
    });
    conversation.appendAssistant(content, parsed.toolCalls);
    for (const diagnostic of parsed.diagnostics) {
      emit("parse.diagnostic", {
        error: diagnostic.message,
        metadata: {
          code: diagnostic.code,
          stage: diagnostic.span.stage,
          start: diagnostic.span.start,
          end: diagnostic.span.end,
          excerpt: diagnostic.excerpt,
          repairs: diagnostic.repairs
        }
      });
    }

    if (parsed.toolCalls.length === 0) {
      enter("done", { status: "done", roundTrips });
      return {
        status: "done",
        answer: parsed.remainder,
        roundTrips
      };
    }

    if (roundTrips >= maxRoundTrips) {
      const names = parsed.toolCalls.map((call) => call.name).join(", ");
      conversation.appendNotice(
        "bound_reached",
        `Stopped after ${roundTrips} tool round-trips; ${parsed.toolCalls.length} pending call(s) not executed: ${names}`
      );
      emit("loop.bound_reached", {
        metadata: { roundTrips, maxRoundTrips, pending: parsed.toolCalls.map((call) => call.name) }
      });
      enter("done", { status: "bound_reached", roundTrips });
      return {
        status: "bound_reached",
        roundTrips,
        pendingToolCalls: parsed.toolCalls
      };
    }

    enter("executing_tools", { roundTrips, calls: parsed.toolCalls.length });
    for (const record of parsed.toolCalls) {
      if (params.signal?.aborted) {
        return cancel(roundTrips);
      }

      const controller = control.begin(record);
      const onTurnAbort = (): void => {
        controller.abort();
      };
      params.signal?.addEventListener("abort", onTurnAbort, { once: true });
      params.options.onToolStart?.(record, () => controller.abort());
      emit("tool.call.started", {
        toolName: record.name,
        callId: record.id,
        metadata: { arguments: toJsonValue(record.arguments), stage: record.span.stage }
      });

      const startedAt = Date.now();
      let result: ExecutionResult;
      try {
        result = await executeToolCall({
          record,
          registry: params.registry,
          context: {
            workspaceDir: params.context.workspaceDir,
            signal: controller.signal
          }
        });
      } finally {
        params.signal?.removeEventListener("abort", onTurnAbort);
        control.end();
      }

      conversation.appendToolResult(record, result);
      const metadata: Record<string, JsonValue> = { durationMs: Date.now() - startedAt };
      if (!result.ok) {
        metadata.code = result.error.code;
      }
      emit("tool.call.completed", {
        toolName: record.name,
        callId: record.id,
        ok: result.ok,
        text: toolResultSummary(result),
        metadata
      });
    }

    roundTrips += 1;
  }
}
