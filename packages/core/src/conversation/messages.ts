import type { ChatMessage } from "../types.js";
import { safeJson, truncateText } from "../utils.js";
import type { ToolResultTurn, Turn } from "./types.js";

const TOOL_RESULT_MARKER = "TOOL_RESULT";

export const DEFAULT_MAX_TOOL_RESULT_CHARS = 16_000;

export function encodeToolResultMessage(turn: ToolResultTurn, maxChars = DEFAULT_MAX_TOOL_RESULT_CHARS): string {
  const body: Record<string, unknown> = {
    name: turn.toolName,
    callId: turn.callId,
    ok: turn.ok
  };
  if (turn.payload !== undefined && turn.payload !== null) {
    body.output = turn.payload;
  }
  if (turn.error) {
    body.error = turn.error;
  }
  return truncateText(`${TOOL_RESULT_MARKER} ${safeJson(body)}`, maxChars);
}

export function buildChatMessages(params: {
  systemPrompt: string;
  turns: readonly Turn[];
  maxToolResultChars?: number;
}): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (params.systemPrompt.trim().length > 0) {
    messages.push({
      role: "system",
      content: params.systemPrompt
    });
  }

  for (const turn of params.turns) {
    if (turn.kind === "user") {
      messages.push({ role: "user", content: turn.text });
      continue;
    }
    if (turn.kind === "assistant") {
      messages.push({ role: "assistant", content: turn.text });
      continue;
    }
    if (turn.kind === "tool_result") {
      messages.push({
        role: "tool",
        content: encodeToolResultMessage(turn, params.maxToolResultChars)
      });
    }
  }
  return messages;
}
