import type { ParserStage, SourceSpan, ToolCallRecord } from "../conversation/types.js";
import { errorMessage } from "../utils.js";
import { applyRepairs, type RepairName } from "./repairs.js";
import { extractBraceSpans, extractFencedBlocks } from "./spans.js";
import { interpretToolCall } from "./tool-call-shape.js";

export type ParseFailureCode = "parse_failed" | "missing_tool_name" | "invalid_arguments_shape";

/** A candidate that looked like a tool call but could not be recovered. */
export interface ParseRecoveryFailure {
  code: ParseFailureCode;
  message: string;
  span: SourceSpan;
  excerpt: string;
  repairs: RepairName[];
}

export interface ParsedResponse {
  toolCalls: ToolCallRecord[];
  /** Raw text with the recovered calls cut out. */
  remainder: string;
  diagnostics: ParseRecoveryFailure[];
  /** Stage that produced the records, null when none did. */
  stage: ParserStage | null;
}

export interface ParseResponseOptions {
  createId?: () => string;
}

type DecodeResult =
  | {
      ok: true;
      value: unknown;
      repairs: RepairName[];
    }
  | {
      ok: false;
      message: string;
      repairs: RepairName[];
    };

const EXCERPT_LENGTH = 120;

export function decodeCandidate(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text), repairs: [] };
  } catch (error) {
    const repaired = applyRepairs(text);
    if (repaired.applied.length === 0) {
      return { ok: false, message: errorMessage(error), repairs: [] };
    }
    try {
      return { ok: true, value: JSON.parse(repaired.text), repairs: repaired.applied };
    } catch (repairError) {
      return { ok: false, message: errorMessage(repairError), repairs: repaired.applied };
    }
  }
}

function excerptOf(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > EXCERPT_LENGTH ? `${collapsed.slice(0, EXCERPT_LENGTH - 3)}...` : collapsed;
}

function looksStructured(text: string): boolean {
  return text.startsWith("{") || text.startsWith("[");
}

class StageCollector {
  readonly records: ToolCallRecord[] = [];
  readonly diagnostics: ParseRecoveryFailure[] = [];
  /** Regions removed from the remainder. */
  readonly cuts: Array<{ start: number; end: number }> = [];

  constructor(
    readonly stage: ParserStage,
    private readonly createId: () => string
  ) {}

  /** Interprets one decoded value (object or array) and returns how many records it yielded. */
  collect(value: unknown, span: { start: number; end: number }, sourceText: string, repairs: RepairName[]): number {
    const candidates = Array.isArray(value) ? value : [value];
    let recovered = 0;
    for (const candidate of candidates) {
      const shape = interpretToolCall(candidate);
      if (!shape.ok) {
        this.fail(shape.code, shape.message, span, sourceText, repairs);
        continue;
      }
      this.records.push({
        id: this.createId(),
        name: shape.name,
        arguments: shape.arguments,
        span: { start: span.start, end: span.end, stage: this.stage }
      });
      recovered += 1;
    }
    return recovered;
  }

  fail(
    code: ParseFailureCode,
    message: string,
    span: { start: number; end: number },
    sourceText: string,
    repairs: RepairName[]
  ): void {
    this.diagnostics.push({
      code,
      message,
      span: { start: span.start, end: span.end, stage: this.stage },
      excerpt: excerptOf(sourceText),
      repairs
    });
  }

  /** Decodes every balanced-brace span of `text`, offsetting spans by `offset`. */
  collectBraces(text: string, offset: number): number {
    let recovered = 0;
    for (const braceSpan of extractBraceSpans(text)) {
      const span = { start: offset + braceSpan.start, end: offset + braceSpan.end };
      const decoded = decodeCandidate(braceSpan.text);
      if (!decoded.ok) {
        this.fail("parse_failed", decoded.message, span, braceSpan.text, decoded.repairs);
        continue;
      }
      const count = this.collect(decoded.value, span, braceSpan.text, decoded.repairs);
      if (count > 0) {
        this.cuts.push(span);
      }
      recovered += count;
    }
    return recovered;
  }
}

function runWholeStage(collector: StageCollector, rawText: string): void {
  const trimmed = rawText.trim();
  if (!looksStructured(trimmed)) {
    return;
  }
  const start = rawText.indexOf(trimmed);
  const span = { start, end: start + trimmed.length };
  const decoded = decodeCandidate(trimmed);
  if (!decoded.ok) {
    return;
  }
  if (collector.collect(decoded.value, span, trimmed, decoded.repairs) > 0) {
    collector.cuts.push(span);
  }
}

function runFencedStage(collector: StageCollector, rawText: string): void {
  for (const block of extractFencedBlocks(rawText)) {
    const content = block.content.trim();
    if (!content) {
      continue;
    }

    let recovered = 0;
    const decoded = looksStructured(content) ? decodeCandidate(content) : null;
    if (decoded?.ok) {
      recovered = collector.collect(decoded.value, { start: block.start, end: block.end }, content, decoded.repairs);
    } else {
      recovered = collector.collectBraces(block.content, block.contentStart);
    }

    if (recovered > 0) {
      collector.cuts.push({ start: block.start, end: block.end });
    }
  }
}

function runBraceStage(collector: StageCollector, rawText: string): void {
  collector.collectBraces(rawText, 0);
}

function cutSpans(rawText: string, cuts: Array<{ start: number; end: number }>): string {
  const ordered = [...cuts].sort((left, right) => left.start - right.start);
  let remainder = "";
  let cursor = 0;
  for (const cut of ordered) {
    if (cut.start < cursor) {
      cursor = Math.max(cursor, cut.end);
      continue;
    }
    remainder += rawText.slice(cursor, cut.start);
    cursor = cut.end;
  }
  remainder += rawText.slice(cursor);
  return remainder.trim();
}

/**
 * Recovers tool calls from free-form model output. The stages run in order
 * (whole text, fenced blocks, balanced braces) and a later stage only runs
 * when the earlier ones found nothing. Malformed candidates become
 * diagnostics; this never throws.
 */
export function parseResponse(rawText: string, options: ParseResponseOptions = {}): ParsedResponse {
  let counter = 0;
  const createId =
    options.createId ??
    (() => {
      counter += 1;
      return `call_${counter}`;
    });

  const stages: Array<[ParserStage, (collector: StageCollector, text: string) => void]> = [
    ["whole", runWholeStage],
    ["fenced", runFencedStage],
    ["braces", runBraceStage]
  ];

  let last: StageCollector | null = null;
  for (const [stage, run] of stages) {
    const collector = new StageCollector(stage, createId);
    run(collector, rawText);
    if (collector.records.length > 0) {
      collector.records.sort((left, right) => left.span.start - right.span.start);
      return {
        toolCalls: collector.records,
        remainder: cutSpans(rawText, collector.cuts),
        diagnostics: collector.diagnostics,
        stage
      };
    }
    last = collector;
  }

  return {
    toolCalls: [],
    remainder: rawText,
    diagnostics: last?.diagnostics ?? [],
    stage: null
  };
}
