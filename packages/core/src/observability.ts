import fs from "node:fs";
import path from "node:path";
import type { AgentEvent, AgentEventHandler } from "./events.js";
import { errorMessage, nowIso } from "./utils.js";

export interface JsonlEventSink {
  readonly filePath: string;
  readonly handler: AgentEventHandler;
  /** Set after the first failed write; later events are dropped. */
  readonly failure: string | null;
}

/**
 * Appends every event to `<directory>/events.jsonl`. The first write failure
 * disables the sink and is reported once through `onFailure`.
 */
export function createJsonlEventSink(
  directory: string,
  options: { onFailure?: (message: string) => void } = {}
): JsonlEventSink {
  const filePath = path.join(directory, "events.jsonl");
  let failure: string | null = null;

  const handler = (event: AgentEvent): void => {
    if (failure) {
      return;
    }
    try {
      fs.mkdirSync(directory, { recursive: true });
      fs.appendFileSync(filePath, `${JSON.stringify({ recordedAt: nowIso(), ...event })}\n`, "utf8");
    } catch (error) {
      failure = `Observability write failed: ${errorMessage(error)}`;
      options.onFailure?.(failure);
    }
  };

  return {
    filePath,
    handler,
    get failure() {
      return failure;
    }
  };
}

/** Fans one event out to several handlers. */
export function combineEventHandlers(...handlers: Array<AgentEventHandler | undefined>): AgentEventHandler {
  const active = handlers.filter((handler): handler is AgentEventHandler => handler !== undefined);
  return (event) => {
    for (const handler of active) {
      handler(event);
    }
  };
}
