export type ParserStage = "whole" | "fenced" | "braces";

export interface SourceSpan {
  start: number;
  end: number;
  stage: ParserStage;
}

export interface ToolCallRecord {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  span: SourceSpan;
}

export interface UserTurn {
  kind: "user";
  text: string;
  createdAt: string;
}

export interface AssistantTurn {
  kind: "assistant";
  text: string;
  toolCalls: ToolCallRecord[];
  createdAt: string;
}

export interface ToolResultTurn {
  kind: "tool_result";
  callId: string;
  toolName: string;
  ok: boolean;
  payload: unknown;
  error?: {
    code: string;
    message: string;
  };
  createdAt: string;
}

export type NoticeCode = "bound_reached" | "inference_unavailable" | "cancelled";

/** Recorded for the user only; never sent to the model. */
export interface NoticeTurn {
  kind: "notice";
  code: NoticeCode;
  text: string;
  createdAt: string;
}

export type Turn = UserTurn | AssistantTurn | ToolResultTurn | NoticeTurn;
