import path from "node:path";
import { Conversation } from "./conversation/conversation.js";
import type { Turn } from "./conversation/types.js";
import { readTranscript, writeTranscript } from "./conversation/transcript.js";
import type { ResolvedAgentConfig } from "./config.js";
import type { AgentEventHandler } from "./events.js";
import { OllamaClient } from "./inference/ollama.js";
import type { FetchLike } from "./inference/http.js";
import type { InferenceClient, ModelSummary, RunningModel } from "./inference/types.js";
import { LoopControl, runActionLoop, type TurnOutcome } from "./loop/action-loop.js";
import { buildSystemPrompt } from "./loop/system-prompt.js";
import { combineEventHandlers, createJsonlEventSink, type JsonlEventSink } from "./observability.js";
import { createDefaultBuiltInTools } from "./tools/builtins.js";
import { describeTools } from "./tools/describe.js";
import { executeToolCall } from "./tools/execution.js";
import { buildToolRegistry, type ToolRegistry } from "./tools/registry.js";
import type { ExecutionResult, ToolDefinition, ToolRegistryDiagnostics } from "./tools/types.js";

export type InterruptTarget = "tool" | "inference" | "idle";

export class SessionBusyError extends Error {
  constructor() {
    super("A turn is already running");
    this.name = "SessionBusyError";
  }
}

export type SwitchModelResult =
  | {
      ok: true;
      model: string;
    }
  | {
      ok: false;
      model: string;
      available: string[];
    };

export interface AgentSessionParams {
  config: ResolvedAgentConfig;
  inference: InferenceClient;
  registry: ToolRegistry;
  toolDiagnostics?: ToolRegistryDiagnostics;
  onEvent?: AgentEventHandler;
  /** Called once when the observability log stops accepting writes. */
  onObservabilityFailure?: (message: string) => void;
  /** Fixed clock for prompts and default file names. */
  now?: () => Date;
}

function timestampToken(value: Date): string {
  const pad = (part: number): string => String(part).padStart(2, "0");
  return (
    `${value.getFullYear()}${pad(value.getMonth() + 1)}${pad(value.getDate())}_` +
    `${pad(value.getHours())}${pad(value.getMinutes())}${pad(value.getSeconds())}`
  );
}

/**
 * One interactive session: the conversation, the current model, the tool
 * registry and the inference client, driven a turn at a time.
 */
export class AgentSession {
  readonly workspaceDir: string;
  readonly registry: ToolRegistry;
  readonly toolDiagnostics: ToolRegistryDiagnostics | null;
  readonly observability: JsonlEventSink | null;
  private readonly config: ResolvedAgentConfig;
  private readonly inference: InferenceClient;
  private readonly onEvent?: AgentEventHandler;
  private readonly now: () => Date;
  private readonly conversation = new Conversation();
  private readonly control = new LoopControl();
  private currentModel: string;
  private turnController: AbortController | null = null;

  constructor(params: AgentSessionParams) {
    this.config = params.config;
    this.workspaceDir = params.config.workspaceDir;
    this.inference = params.inference;
    this.registry = params.registry;
    this.toolDiagnostics = params.toolDiagnostics ?? null;
    this.now = params.now ?? (() => new Date());
    this.currentModel = params.config.inference.model;
    this.observability = params.config.observability.enabled
      ? createJsonlEventSink(params.config.observability.directory, { onFailure: params.onObservabilityFailure })
      : null;
    this.onEvent = this.observability ? combineEventHandlers(params.onEvent, this.observability.handler) : params.onEvent;
  }

  static async create(
    config: ResolvedAgentConfig,
    options: {
      inference?: InferenceClient;
      fetchImpl?: FetchLike;
      extraTools?: ToolDefinition[];
      onEvent?: AgentEventHandler;
      onObservabilityFailure?: (message: string) => void;
    } = {}
  ): Promise<AgentSession> {
    const builtInTools = [
      ...createDefaultBuiltInTools({
        maxReadBytes: config.tools.maxReadBytes,
        shellPolicy: {
          timeoutMs: config.shell.timeoutMs,
          maxOutputBytes: config.shell.maxOutputBytes,
          allowCommandPrefixes: config.shell.allowCommandPrefixes,
          denyCommandPrefixes: config.shell.denyCommandPrefixes
        }
      }),
      ...(options.extraTools ?? [])
    ];
    const { registry, diagnostics } = await buildToolRegistry({
      builtInTools,
      customToolsDirectory: config.toolDirectory
    });
    const inference =
      options.inference ??
      new OllamaClient({
        host: config.inference.host,
        temperature: config.inference.temperature,
        numCtx: config.inference.numCtx,
        numPredict: config.inference.numPredict,
        timeoutMs: config.inference.timeoutMs,
        fetchImpl: options.fetchImpl
      });
    return new AgentSession({
      config,
      inference,
      registry,
      toolDiagnostics: diagnostics,
      onEvent: options.onEvent,
      onObservabilityFailure: options.onObservabilityFailure
    });
  }

  get model(): string {
    return this.currentModel;
  }

  get busy(): boolean {
    return this.turnController !== null;
  }

  /** What an interrupt would hit right now. */
  get activity(): InterruptTarget {
    if (this.control.activeToolCall) {
      return "tool";
    }
    return this.turnController ? "inference" : "idle";
  }

  systemPrompt(): string {
    return buildSystemPrompt({
      workspaceDir: this.workspaceDir,
      model: this.currentModel,
      tools: describeTools(this.registry),
      now: this.now()
    });
  }

  async runTurn(input: string, options: { onEvent?: AgentEventHandler } = {}): Promise<TurnOutcome> {
    if (this.turnController) {
      throw new SessionBusyError();
    }
    const controller = new AbortController();
    this.turnController = controller;
    try {
      return await runActionLoop({
        conversation: this.conversation,
        input,
        inference: this.inference,
        model: this.currentModel,
        registry: this.registry,
        context: { workspaceDir: this.workspaceDir },
        options: {
          systemPrompt: this.systemPrompt(),
          maxRoundTrips: this.config.loop.maxRoundTrips,
          maxToolResultChars: this.config.loop.maxToolResultChars
        },
        control: this.control,
        onEvent: combineEventHandlers(this.onEvent, options.onEvent),
        signal: controller.signal
      });
    } finally {
      this.turnController = null;
    }
  }

  /** Stops the running tool if there is one, otherwise cancels the pending model request. */
  interrupt(): InterruptTarget {
    if (this.control.interruptActiveTool()) {
      return "tool";
    }
    if (this.turnController && !this.turnController.signal.aborted) {
      this.turnController.abort();
      return "inference";
    }
    return "idle";
  }

  async listModels(): Promise<ModelSummary[]> {
    return await this.inference.listModels();
  }

  async listRunningModels(): Promise<RunningModel[]> {
    return await this.inference.listRunningModels();
  }

  async ping(): Promise<boolean> {
    return await this.inference.ping();
  }

  /** Only models the endpoint lists are accepted. */
  async switchModel(name: string): Promise<SwitchModelResult> {
    const requested = name.trim();
    const available = (await this.inference.listModels()).map((model) => model.name);
    if (!available.includes(requested)) {
      return { ok: false, model: requested, available };
    }
    this.currentModel = requested;
    return { ok: true, model: requested };
  }

  /** Runs a registered tool directly, outside any turn. */
  async runTool(name: string, args: Record<string, unknown> = {}): Promise<ExecutionResult> {
    return await executeToolCall({
      record: {
        id: "direct",
        name,
        arguments: args,
        span: { start: 0, end: 0, stage: "whole" }
      },
      registry: this.registry,
      context: { workspaceDir: this.workspaceDir }
    });
  }

  snapshot(): readonly Turn[] {
    return this.conversation.snapshot();
  }

  clear(): void {
    if (this.turnController) {
      throw new SessionBusyError();
    }
    this.conversation.clear();
  }

  defaultTranscriptPath(): string {
    return path.join(this.config.transcriptDirectory, `conversation_history_${timestampToken(this.now())}.jsonl`);
  }

  /** Writes the transcript and returns the absolute path written. */
  save(filePath?: string): string {
    const target = filePath ? path.resolve(this.workspaceDir, filePath) : this.defaultTranscriptPath();
    writeTranscript(target, this.conversation.snapshot(), {
      model: this.currentModel,
      workspaceDir: this.workspaceDir
    });
    return target;
  }

  /** Replaces the conversation with a saved transcript. Returns the number of turns loaded. */
  load(filePath: string): number {
    if (this.turnController) {
      throw new SessionBusyError();
    }
    const transcript = readTranscript(path.resolve(this.workspaceDir, filePath));
    const restored = new Conversation(transcript.turns);
    this.conversation.clear();
    for (const turn of restored.snapshot()) {
      this.conversation.append(turn);
    }
    return transcript.turns.length;
  }
}
