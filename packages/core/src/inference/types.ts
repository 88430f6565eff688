import type { ChatMessage } from "../types.js";

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  signal?: AbortSignal;
}

export interface ChatReply {
  content: string;
  model: string;
  durationMs?: number;
  promptTokens?: number;
  completionTokens?: number;
}

export interface ModelSummary {
  name: string;
  sizeBytes?: number;
  modifiedAt?: string;
  family?: string;
  parameterSize?: string;
}

export interface RunningModel {
  name: string;
  sizeBytes?: number;
  sizeVramBytes?: number;
  expiresAt?: string;
}

/** The one inference backend the loop talks to. Failures throw `InferenceError`. */
export interface InferenceClient {
  chat(request: ChatRequest): Promise<ChatReply>;
  listModels(): Promise<ModelSummary[]>;
  listRunningModels(): Promise<RunningModel[]>;
  ping(): Promise<boolean>;
}
