import { z } from "zod";
import { InferenceError, classifyStatus, toInferenceError } from "./failure.js";
import { getJsonWithTimeout, postJsonWithTimeout, type FetchLike, type JsonHttpResponse } from "./http.js";
import type { ChatReply, ChatRequest, InferenceClient, ModelSummary, RunningModel } from "./types.js";

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434";
const LISTING_TIMEOUT_MS = 10_000;

export interface OllamaClientOptions {
  host?: string;
  temperature?: number;
  numCtx?: number;
  numPredict?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string()
  }),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

const tagsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
        details: z
          .object({
            family: z.string().optional(),
            parameter_size: z.string().optional()
          })
          .optional()
      })
    )
    .default([])
});

const psResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        size_vram: z.number().optional(),
        expires_at: z.string().optional()
      })
    )
    .default([])
});

function errorDetail(response: JsonHttpResponse): string {
  const json = response.json;
  if (json && typeof json === "object" && "error" in json && typeof json.error === "string") {
    return json.error;
  }
  return response.text.trim().slice(0, 200);
}

function nanosToMs(value: number | undefined): number | undefined {
  return value === undefined ? undefined : Math.round(value / 1_000_000);
}

/** Ollama's native HTTP API, non-streaming. */
export class OllamaClient implements InferenceClient {
  readonly host: string;
  private readonly temperature: number;
  private readonly numCtx: number;
  private readonly numPredict: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchLike;

  constructor(options: OllamaClientOptions = {}) {
    this.host = (options.host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
    this.temperature = options.temperature ?? 0;
    this.numCtx = options.numCtx ?? 8192;
    this.numPredict = options.numPredict ?? 2048;
    this.timeoutMs = options.timeoutMs ?? 600_000;
    this.fetchImpl = options.fetchImpl;
  }

  private url(pathname: string): string {
    return `${this.host}${pathname}`;
  }

  private ensureOk(response: JsonHttpResponse, what: string): void {
    if (response.status >= 200 && response.status < 300) {
      return;
    }
    const detail = errorDetail(response);
    throw new InferenceError(
      classifyStatus(response.status),
      `${what} failed with status ${response.status}${detail ? `: ${detail}` : ""}`,
      response.status
    );
  }

  private parseBody<S extends z.ZodTypeAny>(schema: S, response: JsonHttpResponse, what: string): z.output<S> {
    const parsed = schema.safeParse(response.json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new InferenceError(
        "bad_response",
        `${what} returned an unexpected body${where}: ${issue?.message ?? "invalid JSON"}`,
        response.status
      );
    }
    return parsed.data;
  }

  async chat(request: ChatRequest): Promise<ChatReply> {
    try {
      const response = await postJsonWithTimeout({
        url: this.url("/api/chat"),
        body: {
          model: request.model,
          messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
          stream: false,
          options: {
            temperature: this.temperature,
            num_ctx: this.numCtx,
            num_predict: this.numPredict
          }
        },
        timeoutMs: this.timeoutMs,
        signal: request.signal,
        fetchImpl: this.fetchImpl
      });
      this.ensureOk(response, "Chat request");
      const body = this.parseBody(chatResponseSchema, response, "Chat request");
      return {
        content: body.message.content,
        model: body.model ?? request.model,
        durationMs: nanosToMs(body.total_duration),
        promptTokens: body.prompt_eval_count,
        completionTokens: body.eval_count
      };
    } catch (error) {
      throw toInferenceError(error);
    }
  }

  async listModels(): Promise<ModelSummary[]> {
    try {
      const response = await getJsonWithTimeout({
        url: this.url("/api/tags"),
        timeoutMs: LISTING_TIMEOUT_MS,
        fetchImpl: this.fetchImpl
      });
      this.ensureOk(response, "Model listing");
      const body = this.parseBody(tagsResponseSchema, response, "Model listing");
      return body.models.map((model) => ({
        name: model.name,
        sizeBytes: model.size,
        modifiedAt: model.modified_at,
        family: model.details?.family,
        parameterSize: model.details?.parameter_size
      }));
    } catch (error) {
      throw toInferenceError(error);
    }
  }

  async listRunningModels(): Promise<RunningModel[]> {
    try {
      const response = await getJsonWithTimeout({
        url: this.url("/api/ps"),
        timeoutMs: LISTING_TIMEOUT_MS,
        fetchImpl: this.fetchImpl
      });
      this.ensureOk(response, "Running model listing");
      const body = this.parseBody(psResponseSchema, response, "Running model listing");
      return body.models.map((model) => ({
        name: model.name,
        sizeBytes: model.size,
        sizeVramBytes: model.size_vram,
        expiresAt: model.expires_at
      }));
    } catch (error) {
      throw toInferenceError(error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      const response = await getJsonWithTimeout({
        url: this.url("/api/tags"),
        timeoutMs: LISTING_TIMEOUT_MS,
        fetchImpl: this.fetchImpl
      });
      return response.status >= 200 && response.status < 300;
    } catch {
      return false;
    }
  }
}
