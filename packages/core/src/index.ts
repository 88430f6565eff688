export type { ChatMessage, ChatRole, JsonValue } from "./types.js";
export type { AgentEvent, AgentEventHandler, AgentEventType } from "./events.js";
export { errorMessage, toJsonValue, truncateText } from "./utils.js";
export { canonicalizePath, isWithinRoot, resolveContainedPath } from "./path-policy.js";
export type { ContainedPathResult, ResolvedWorkspacePath } from "./path-policy.js";
export { importUserModule, pickModuleExport } from "./module-loader.js";

export { Conversation, ConversationOrderError } from "./conversation/conversation.js";
export { buildChatMessages, encodeToolResultMessage, DEFAULT_MAX_TOOL_RESULT_CHARS } from "./conversation/messages.js";
export {
  parseTranscript,
  readTranscript,
  serializeTranscript,
  writeTranscript,
  TranscriptError,
  TRANSCRIPT_VERSION
} from "./conversation/transcript.js";
export type { Transcript, TranscriptErrorCode, TranscriptHeader } from "./conversation/transcript.js";
export type {
  AssistantTurn,
  NoticeCode,
  NoticeTurn,
  ParserStage,
  SourceSpan,
  ToolCallRecord,
  ToolResultTurn,
  Turn,
  UserTurn
} from "./conversation/types.js";

export { parseResponse, decodeCandidate } from "./parser/response-parser.js";
export type {
  ParseFailureCode,
  ParseRecoveryFailure,
  ParsedResponse,
  ParseResponseOptions
} from "./parser/response-parser.js";
export {
  applyRepairs,
  closeUnterminatedStructure,
  normalizeSingleQuotes,
  stripTrailingCommas
} from "./parser/repairs.js";
export type { RepairName, RepairResult } from "./parser/repairs.js";
export { extractBraceSpans, extractFencedBlocks } from "./parser/spans.js";
export { interpretToolCall } from "./parser/tool-call-shape.js";

export { defineTool, asToolDefinition } from "./tools/definition.js";
export { ToolFailureError } from "./tools/errors.js";
export { createDefaultBuiltInTools, enforceShellPolicy, BUILT_IN_TOOL_NAMES, DEFAULT_MAX_READ_BYTES } from "./tools/builtins.js";
export { buildToolRegistry, ToolRegistry } from "./tools/registry.js";
export type { ToolRegistryResult } from "./tools/registry.js";
export { executeToolCall, resolveToolCall, validateToolInput } from "./tools/execution.js";
export type { ResolvedToolCall } from "./tools/execution.js";
export { describeTools, describeToolParameters } from "./tools/describe.js";
export { toolInputSchemaFromParameters } from "./tools/json-schema.js";
export { runShellCommand, killProcessTree } from "./tools/shell.js";
export type { SignalSender } from "./tools/shell.js";
export type { ShellRunOptions, ShellRunResult, ShellTermination } from "./tools/shell.js";
export type {
  BuiltInToolFactoryParams,
  ExecutionResult,
  ShellToolPolicy,
  ToolContext,
  ToolDefinition,
  ToolDefinitionSpec,
  ToolErrorCode,
  ToolFailure,
  ToolParameterSchema,
  ToolRegistryDiagnostics,
  ToolSkipDiagnostic,
  ToolValidationIssue
} from "./tools/types.js";

export { OllamaClient, DEFAULT_OLLAMA_HOST } from "./inference/ollama.js";
export type { OllamaClientOptions } from "./inference/ollama.js";
export { InferenceError, classifyInferenceFailure } from "./inference/failure.js";
export type { InferenceFailureClass } from "./inference/failure.js";
export { HttpTransportError } from "./inference/http.js";
export type { FetchLike } from "./inference/http.js";
export type { ChatReply, ChatRequest, InferenceClient, ModelSummary, RunningModel } from "./inference/types.js";

export { runActionLoop, LoopControl, DEFAULT_MAX_ROUND_TRIPS } from "./loop/action-loop.js";
export type { ActionLoopOptions, LoopState, RunActionLoopParams, TurnOutcome } from "./loop/action-loop.js";
export { buildSystemPrompt } from "./loop/system-prompt.js";
export type { SystemPromptParams } from "./loop/system-prompt.js";

export { AgentSession, SessionBusyError } from "./agent.js";
export type { AgentSessionParams, InterruptTarget, SwitchModelResult } from "./agent.js";
export { agentConfigSchema, defineConfig, resolveAgentConfig, ConfigError, DEFAULT_MODEL } from "./config.js";
export type { AgentConfig, ResolvedAgentConfig } from "./config.js";
export { createJsonlEventSink, combineEventHandlers } from "./observability.js";
export type { JsonlEventSink } from "./observability.js";
