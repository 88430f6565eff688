import { errorMessage, type AgentSession } from "@locus/core";
import { renderModels, renderRunningModels } from "./render.js";

export type LocalCommand =
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "models" }
  | { kind: "running" }
  | { kind: "switch"; model: string }
  | { kind: "pwd" }
  | { kind: "ls"; path?: string }
  | { kind: "save"; file?: string }
  | { kind: "load"; file: string }
  | { kind: "clear" }
  | { kind: "tools" }
  | { kind: "test" }
  | { kind: "usage"; message: string }
  | { kind: "message"; text: string };

export const COMMAND_HELP = [
  "Commands:",
  "  exit            - leave locus",
  "  help            - show this help",
  "  models          - list models the endpoint has",
  "  running         - list models currently loaded",
  "  switch <model>  - use another listed model",
  "  pwd             - show the working directory",
  "  ls [dir]        - list a directory (aliases: dir, list)",
  "  save [file]     - save the conversation transcript",
  "  load <file>     - replace the conversation with a saved transcript",
  "  clear           - clear the conversation",
  "  tools           - list available tools",
  "  test            - check the connection to the endpoint",
  "  [anything else] - send a message to the model",
  "Ctrl+C stops the running command, cancels a pending reply, or exits when idle."
];

const BARE_COMMANDS = new Map<string, LocalCommand>([
  ["exit", { kind: "exit" }],
  ["quit", { kind: "exit" }],
  ["help", { kind: "help" }],
  ["models", { kind: "models" }],
  ["running", { kind: "running" }],
  ["pwd", { kind: "pwd" }],
  ["ls", { kind: "ls" }],
  ["dir", { kind: "ls" }],
  ["list", { kind: "ls" }],
  ["save", { kind: "save" }],
  ["clear", { kind: "clear" }],
  ["tools", { kind: "tools" }],
  ["test", { kind: "test" }]
]);

/**
 * Maps one input line to a local command. Commands that take an argument
 * only match with exactly one; longer lines go to the model as messages.
 */
export function parseLocalCommand(line: string): LocalCommand {
  const text = line.trim();
  const tokens = text.split(/\s+/);
  const head = (tokens[0] ?? "").toLowerCase();

  if (tokens.length === 1) {
    const bare = BARE_COMMANDS.get(head);
    if (bare) {
      return bare;
    }
    if (head === "switch") {
      return { kind: "usage", message: "Usage: switch <model>" };
    }
    if (head === "load") {
      return { kind: "usage", message: "Usage: load <file>" };
    }
    return { kind: "message", text };
  }

  const argument = tokens[1];
  if (tokens.length === 2 && argument) {
    if (head === "switch") {
      return { kind: "switch", model: argument };
    }
    if (head === "save") {
      return { kind: "save", file: argument };
    }
    if (head === "load") {
      return { kind: "load", file: argument };
    }
    if (head === "ls" || head === "dir" || head === "list") {
      return { kind: "ls", path: argument };
    }
  }

  return { kind: "message", text };
}

function formatListing(output: unknown): string[] {
  if (!output || typeof output !== "object" || !("entries" in output) || !Array.isArray(output.entries)) {
    return [JSON.stringify(output)];
  }
  if (output.entries.length === 0) {
    return ["(empty)"];
  }
  const lines: string[] = [];
  for (const entry of output.entries) {
    if (!entry || typeof entry !== "object" || !("name" in entry) || typeof entry.name !== "string") {
      continue;
    }
    const isDirectory = "type" in entry && entry.type === "directory";
    const size = "size" in entry && typeof entry.size === "number" ? ` (${entry.size} bytes)` : "";
    lines.push(isDirectory ? `[DIR]  ${entry.name}` : `[FILE] ${entry.name}${size}`);
  }
  return lines;
}

/** Runs a local command. Returns false when the shell should exit. */
export async function runLocalCommand(
  command: Exclude<LocalCommand, { kind: "message" }>,
  session: AgentSession,
  print: (line: string) => void
): Promise<boolean> {
  try {
    switch (command.kind) {
      case "exit":
        return false;
      case "help":
        COMMAND_HELP.forEach((line) => print(line));
        return true;
      case "usage":
        print(`[locus] ${command.message}`);
        return true;
      case "models":
        renderModels(await session.listModels(), session.model).forEach((line) => print(line));
        return true;
      case "running":
        renderRunningModels(await session.listRunningModels()).forEach((line) => print(line));
        return true;
      case "switch": {
        const result = await session.switchModel(command.model);
        print(
          result.ok
            ? `[locus] switched to model: ${result.model}`
            : `[locus] model ${result.model} not available. Available models: ${result.available.join(", ") || "(none)"}`
        );
        return true;
      }
      case "pwd":
        print(`[locus] working directory: ${session.workspaceDir}`);
        return true;
      case "ls": {
        const result = await session.runTool("list_directory", command.path ? { dir_path: command.path } : {});
        if (!result.ok) {
          print(`[locus] ${result.error.message}`);
          return true;
        }
        formatListing(result.output).forEach((line) => print(line));
        return true;
      }
      case "save":
        print(`[locus] conversation saved to ${session.save(command.file)}`);
        return true;
      case "load": {
        const count = session.load(command.file);
        print(`[locus] loaded ${count} turns from ${command.file}`);
        return true;
      }
      case "clear":
        session.clear();
        print("[locus] conversation cleared.");
        return true;
      case "tools":
        print(`[locus] tools: ${session.registry.names().join(", ")}`);
        return true;
      case "test": {
        const reachable = await session.ping();
        print(
          reachable
            ? `[locus] endpoint reachable; model=${session.model} workspace=${session.workspaceDir}`
            : "[locus] endpoint not reachable"
        );
        return true;
      }
    }
  } catch (error) {
    print(`[locus] ${errorMessage(error)}`);
    return true;
  }
}
