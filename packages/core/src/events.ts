import type { JsonValue } from "./types.js";

export type AgentEventType =
  | "loop.state"
  | "inference.request"
  | "inference.response"
  | "inference.error"
  | "parse.diagnostic"
  | "tool.call.started"
  | "tool.call.completed"
  | "loop.bound_reached";

export interface AgentEvent {
  type: AgentEventType;
  model: string;
  timestamp: string;
  payload: {
    text?: string;
    error?: string;
    state?: string;
    toolName?: string;
    callId?: string;
    ok?: boolean;
    metadata?: Record<string, JsonValue>;
  };
}

export type AgentEventHandler = (event: AgentEvent) => void;
