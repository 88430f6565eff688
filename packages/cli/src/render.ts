import type { AgentEvent, ModelSummary, RunningModel, TurnOutcome } from "@locus/core";

function truncateText(value: string, max = 220): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, Math.max(0, max - 3))}...`;
}

function summarizeValue(value: unknown): string {
  if (typeof value === "string") {
    return truncateText(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  try {
    return truncateText(JSON.stringify(value));
  } catch {
    return truncateText(String(value));
  }
}

function formatMetadata(metadata: AgentEvent["payload"]["metadata"]): string {
  if (!metadata) {
    return "";
  }
  const keys = Object.keys(metadata).sort((left, right) => left.localeCompare(right));
  return keys.map((key) => `${key}=${summarizeValue(metadata[key])}`).join(" ");
}

function formatBytes(value: number | undefined): string {
  if (value === undefined) {
    return "unknown size";
  }
  return `${(value / 1024 ** 3).toFixed(2)} GB`;
}

const QUIET_EVENT_TYPES = new Set<AgentEvent["type"]>([
  "tool.call.started",
  "tool.call.completed",
  "inference.error",
  "loop.bound_reached"
]);

/** One `[locus]` line for an event, or null when it is hidden at this verbosity. */
export function renderAgentEvent(event: AgentEvent, options: { verbose?: boolean } = {}): string | null {
  if (!options.verbose && !QUIET_EVENT_TYPES.has(event.type)) {
    return null;
  }

  if (event.type === "tool.call.started") {
    const args = summarizeValue(event.payload.metadata?.arguments ?? {});
    return `[locus] tool ${event.payload.toolName ?? "unknown"} (${event.payload.callId ?? "?"}): started ${args}`;
  }
  if (event.type === "tool.call.completed") {
    const status = event.payload.ok ? "completed" : `failed (${event.payload.text ?? "error"})`;
    return `[locus] tool ${event.payload.toolName ?? "unknown"} (${event.payload.callId ?? "?"}): ${status}`;
  }
  if (event.type === "inference.error") {
    return `[locus] model ${event.model} error: ${event.payload.error ?? "unknown"}`;
  }
  if (event.type === "loop.bound_reached") {
    return `[locus] round-trip limit reached ${formatMetadata(event.payload.metadata)}`;
  }
  if (event.type === "parse.diagnostic") {
    return `[locus][parse] ${event.payload.error ?? "recovery failed"} ${formatMetadata(event.payload.metadata)}`;
  }
  if (event.type === "loop.state") {
    return `[locus][state] ${event.payload.state ?? "?"} ${formatMetadata(event.payload.metadata)}`.trimEnd();
  }
  if (event.type === "inference.response") {
    return `[locus][event] ${event.timestamp} inference.response ${formatMetadata(event.payload.metadata)}`.trimEnd();
  }
  const metadata = formatMetadata(event.payload.metadata);
  return `[locus][event] ${event.timestamp} ${event.type}${metadata ? ` ${metadata}` : ""}`;
}

export function renderOutcome(outcome: TurnOutcome): string[] {
  if (outcome.status === "done") {
    return [outcome.answer.length > 0 ? outcome.answer : "[locus] (no answer text)"];
  }
  if (outcome.status === "bound_reached") {
    const pending = outcome.pendingToolCalls.map((call) => call.name).join(", ");
    return [
      `[locus] stopped after ${outcome.roundTrips} tool round-trips; pending calls not executed: ${pending || "(none)"}`
    ];
  }
  if (outcome.status === "inference_unavailable") {
    return [`[locus] model unavailable (${outcome.failureClass}): ${outcome.message}`];
  }
  return ["[locus] turn cancelled"];
}

export function renderModels(models: ModelSummary[], currentModel: string): string[] {
  if (models.length === 0) {
    return ["[locus] no models found. Pull one with `ollama pull <model>`."];
  }
  return [
    "Available models:",
    ...models.map((model) => {
      const marker = model.name === currentModel ? " [current]" : "";
      return `  - ${model.name} (${formatBytes(model.sizeBytes)})${marker}`;
    })
  ];
}

export function renderRunningModels(models: RunningModel[]): string[] {
  if (models.length === 0) {
    return ["[locus] no models currently running."];
  }
  return [
    "Running models:",
    ...models.map((model) => `  - ${model.name}${model.expiresAt ? ` (expires ${model.expiresAt})` : ""}`)
  ];
}
