import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errnoCode, errorMessage, nowIso } from "../utils.js";
import type { ToolCallRecord, Turn } from "./types.js";

export const TRANSCRIPT_VERSION = 1;

export type TranscriptErrorCode = "corrupt_json" | "invalid_shape" | "unsupported_version" | "not_found";

export class TranscriptError extends Error {
  constructor(
    public readonly code: TranscriptErrorCode,
    message: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = "TranscriptError";
  }
}

export interface TranscriptHeader {
  version: number;
  type: "transcript";
  savedAt: string;
  model?: string;
  workspaceDir?: string;
}

export interface Transcript {
  header: TranscriptHeader;
  turns: Turn[];
}

const headerSchema = z.object({
  version: z.number().int(),
  type: z.literal("transcript"),
  savedAt: z.string(),
  model: z.string().optional(),
  workspaceDir: z.string().optional()
});

const spanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  stage: z.enum(["whole", "fenced", "braces"])
});

const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
  span: spanSchema
});

const turnSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("user"),
    text: z.string(),
    createdAt: z.string()
  }),
  z.object({
    kind: z.literal("assistant"),
    text: z.string(),
    toolCalls: z.array(toolCallSchema),
    createdAt: z.string()
  }),
  z.object({
    kind: z.literal("tool_result"),
    callId: z.string().min(1),
    toolName: z.string(),
    ok: z.boolean(),
    payload: z.unknown(),
    error: z.object({ code: z.string(), message: z.string() }).optional(),
    createdAt: z.string()
  }),
  z.object({
    kind: z.literal("notice"),
    code: z.enum(["bound_reached", "inference_unavailable", "cancelled"]),
    text: z.string(),
    createdAt: z.string()
  })
]);

const turnLineSchema = z.object({
  type: z.literal("turn"),
  turn: turnSchema
});

function toTurn(parsed: z.output<typeof turnSchema>): Turn {
  switch (parsed.kind) {
    case "user":
    case "notice":
      return parsed;
    case "assistant":
      return {
        kind: "assistant",
        text: parsed.text,
        toolCalls: parsed.toolCalls.map(
          (call): ToolCallRecord => ({
            id: call.id,
            name: call.name,
            arguments: call.arguments,
            span: call.span
          })
        ),
        createdAt: parsed.createdAt
      };
    case "tool_result":
      return {
        kind: "tool_result",
        callId: parsed.callId,
        toolName: parsed.toolName,
        ok: parsed.ok,
        payload: parsed.payload,
        ...(parsed.error ? { error: parsed.error } : {}),
        createdAt: parsed.createdAt
      };
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid value";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function serializeTranscript(
  turns: readonly Turn[],
  meta: { model?: string; workspaceDir?: string; savedAt?: string } = {}
): string {
  const header: TranscriptHeader = {
    version: TRANSCRIPT_VERSION,
    type: "transcript",
    savedAt: meta.savedAt ?? nowIso(),
    ...(meta.model ? { model: meta.model } : {}),
    ...(meta.workspaceDir ? { workspaceDir: meta.workspaceDir } : {})
  };
  const lines = [JSON.stringify(header), ...turns.map((turn) => JSON.stringify({ type: "turn", turn }))];
  return `${lines.join("\n")}\n`;
}

/** Parses a JSONL transcript: one header line, then one line per turn. */
export function parseTranscript(raw: string): Transcript {
  const lines = raw
    .split(/\r?\n/)
    .map((line, index) => ({ text: line.trim(), number: index + 1 }))
    .filter((line) => line.text.length > 0);

  const decoded = lines.map((line) => {
    try {
      const value: unknown = JSON.parse(line.text);
      return { number: line.number, value };
    } catch (error) {
      throw new TranscriptError("corrupt_json", `Line ${line.number}: ${errorMessage(error)}`, line.number);
    }
  });

  const first = decoded[0];
  if (!first) {
    throw new TranscriptError("invalid_shape", "Transcript is empty");
  }
  const header = headerSchema.safeParse(first.value);
  if (!header.success) {
    throw new TranscriptError("invalid_shape", `Line ${first.number}: ${describeIssue(header.error)}`, first.number);
  }
  if (header.data.version !== TRANSCRIPT_VERSION) {
    throw new TranscriptError(
      "unsupported_version",
      `Unsupported transcript version ${header.data.version} (expected ${TRANSCRIPT_VERSION})`,
      first.number
    );
  }

  const turns: Turn[] = [];
  for (const entry of decoded.slice(1)) {
    const parsed = turnLineSchema.safeParse(entry.value);
    if (!parsed.success) {
      throw new TranscriptError("invalid_shape", `Line ${entry.number}: ${describeIssue(parsed.error)}`, entry.number);
    }
    turns.push(toTurn(parsed.data.turn));
  }

  return {
    header: header.data,
    turns
  };
}

export function writeTranscript(
  filePath: string,
  turns: readonly Turn[],
  meta: { model?: string; workspaceDir?: string } = {}
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  try {
    fs.writeFileSync(tempPath, serializeTranscript(turns, meta), "utf8");
    fs.renameSync(tempPath, filePath);
  } finally {
    fs.rmSync(tempPath, { force: true });
  }
}

export function readTranscript(filePath: string): Transcript {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new TranscriptError("not_found", `Transcript not found: ${filePath}`);
    }
    throw error;
  }
  return parseTranscript(raw);
}
