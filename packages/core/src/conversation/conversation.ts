import { nowIso } from "../utils.js";
import type { ExecutionResult } from "../tools/types.js";
import type {
  AssistantTurn,
  NoticeCode,
  NoticeTurn,
  ToolCallRecord,
  ToolResultTurn,
  Turn,
  UserTurn
} from "./types.js";

const CALL_ID_PATTERN = /^call_(\d+)$/;

export class ConversationOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationOrderError";
  }
}

/**
 * Append-only turn history for one CLI session. A tool result may only
 * reference a call recovered from an earlier assistant turn, and each call
 * gets exactly one result.
 */
export class Conversation {
  private turns: Turn[] = [];
  private readonly knownCallIds = new Set<string>();
  private readonly answeredCallIds = new Set<string>();
  private callCounter = 0;

  constructor(initialTurns: readonly Turn[] = []) {
    for (const turn of initialTurns) {
      this.append(turn);
    }
  }

  get length(): number {
    return this.turns.length;
  }

  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  lastTurn(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  allocateCallId(): string {
    this.callCounter += 1;
    return `call_${this.callCounter}`;
  }

  append(turn: Turn): void {
    if (turn.kind === "assistant") {
      for (const call of turn.toolCalls) {
        if (this.knownCallIds.has(call.id)) {
          throw new ConversationOrderError(`Duplicate tool call id: ${call.id}`);
        }
        this.knownCallIds.add(call.id);
        const counter = CALL_ID_PATTERN.exec(call.id);
        if (counter?.[1]) {
          this.callCounter = Math.max(this.callCounter, Number.parseInt(counter[1], 10));
        }
      }
    }

    if (turn.kind === "tool_result") {
      if (!this.knownCallIds.has(turn.callId)) {
        throw new ConversationOrderError(`Tool result references unknown call: ${turn.callId}`);
      }
      if (this.answeredCallIds.has(turn.callId)) {
        throw new ConversationOrderError(`Tool call already has a result: ${turn.callId}`);
      }
      this.answeredCallIds.add(turn.callId);
    }

    this.turns.push(turn);
  }

  appendUser(text: string): UserTurn {
    const turn: UserTurn = {
      kind: "user",
      text,
      createdAt: nowIso()
    };
    this.append(turn);
    return turn;
  }

  appendAssistant(text: string, toolCalls: ToolCallRecord[]): AssistantTurn {
    const turn: AssistantTurn = {
      kind: "assistant",
      text,
      toolCalls,
      createdAt: nowIso()
    };
    this.append(turn);
    return turn;
  }

  appendToolResult(record: ToolCallRecord, result: ExecutionResult): ToolResultTurn {
    const turn: ToolResultTurn = result.ok
      ? {
          kind: "tool_result",
          callId: record.id,
          toolName: record.name,
          ok: true,
          payload: result.output,
          createdAt: nowIso()
        }
      : {
          kind: "tool_result",
          callId: record.id,
          toolName: record.name,
          ok: false,
          payload: result.output ?? null,
          error: {
            code: result.error.code,
            message: result.error.message
          },
          createdAt: nowIso()
        };
    this.append(turn);
    return turn;
  }

  appendNotice(code: NoticeCode, text: string): NoticeTurn {
    const turn: NoticeTurn = {
      kind: "notice",
      code,
      text,
      createdAt: nowIso()
    };
    this.append(turn);
    return turn;
  }

  clear(): void {
    this.turns = [];
    this.knownCallIds.clear();
    this.answeredCallIds.clear();
    this.callCounter = 0;
  }
}
