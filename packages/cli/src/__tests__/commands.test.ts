import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  AgentSession,
  resolveAgentConfig,
  type ChatReply,
  type ChatRequest,
  type InferenceClient,
  type ModelSummary,
  type RunningModel
} from "@locus/core";
import { afterEach, describe, expect, it } from "vitest";
import { COMMAND_HELP, parseLocalCommand, runLocalCommand } from "../commands.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "locus-cli-commands-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

class StubInference implements InferenceClient {
  reachable = true;

  async chat(request: ChatRequest): Promise<ChatReply> {
    return { content: "ok", model: request.model };
  }

  async listModels(): Promise<ModelSummary[]> {
    return [{ name: "test-model", sizeBytes: 2 * 1024 ** 3 }];
  }

  async listRunningModels(): Promise<RunningModel[]> {
    return [];
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }
}

async function createHarness(): Promise<{
  session: AgentSession;
  inference: StubInference;
  workspaceDir: string;
  lines: string[];
  run: (line: string) => Promise<boolean>;
}> {
  const workspaceDir = makeTempDir();
  const inference = new StubInference();
  const session = await AgentSession.create(
    resolveAgentConfig({ inference: { model: "test-model" } }, { baseDir: workspaceDir, env: {} }),
    { inference }
  );
  const lines: string[] = [];
  const run = async (line: string): Promise<boolean> => {
    const command = parseLocalCommand(line);
    if (command.kind === "message") {
      throw new Error(`not a local command: ${line}`);
    }
    return await runLocalCommand(command, session, (text) => lines.push(text));
  };
  return { session, inference, workspaceDir, lines, run };
}

describe("parseLocalCommand", () => {
  it("maps bare words and aliases to commands", () => {
    expect(parseLocalCommand("exit")).toEqual({ kind: "exit" });
    expect(parseLocalCommand("  QUIT ")).toEqual({ kind: "exit" });
    expect(parseLocalCommand("dir")).toEqual({ kind: "ls" });
    expect(parseLocalCommand("list")).toEqual({ kind: "ls" });
    expect(parseLocalCommand("models")).toEqual({ kind: "models" });
    expect(parseLocalCommand("save")).toEqual({ kind: "save" });
  });

  it("takes exactly one argument for argument commands", () => {
    expect(parseLocalCommand("switch other:7b")).toEqual({ kind: "switch", model: "other:7b" });
    expect(parseLocalCommand("ls src")).toEqual({ kind: "ls", path: "src" });
    expect(parseLocalCommand("dir src")).toEqual({ kind: "ls", path: "src" });
    expect(parseLocalCommand("list src")).toEqual({ kind: "ls", path: "src" });
    expect(parseLocalCommand("save notes.jsonl")).toEqual({ kind: "save", file: "notes.jsonl" });
    expect(parseLocalCommand("load notes.jsonl")).toEqual({ kind: "load", file: "notes.jsonl" });
    expect(parseLocalCommand("switch")).toEqual({ kind: "usage", message: "Usage: switch <model>" });
    expect(parseLocalCommand("load")).toEqual({ kind: "usage", message: "Usage: load <file>" });
  });

  it("sends everything else to the model", () => {
    expect(parseLocalCommand("save the file please")).toEqual({ kind: "message", text: "save the file please" });
    expect(parseLocalCommand("what is in src?")).toEqual({ kind: "message", text: "what is in src?" });
    expect(parseLocalCommand("hello")).toEqual({ kind: "message", text: "hello" });
  });
});

describe("runLocalCommand", () => {
  it("prints help and signals exit", async () => {
    const { lines, run } = await createHarness();

    expect(await run("help")).toBe(true);
    expect(lines).toEqual(COMMAND_HELP);
    expect(await run("exit")).toBe(false);
  });

  it("lists models and refuses unknown ones on switch", async () => {
    const { session, lines, run } = await createHarness();

    await run("models");
    await run("switch ghost");

    expect(lines).toEqual([
      "Available models:",
      "  - test-model (2.00 GB) [current]",
      "[locus] model ghost not available. Available models: test-model"
    ]);
    expect(session.model).toBe("test-model");
  });

  it("lists the working directory through the list_directory tool", async () => {
    const { workspaceDir, lines, run } = await createHarness();
    fs.mkdirSync(path.join(workspaceDir, "src"));
    fs.writeFileSync(path.join(workspaceDir, "README.md"), "hello", "utf8");

    await run("ls");
    await run("ls ../");

    expect(lines).toEqual(["[FILE] README.md (5 bytes)", "[DIR]  src", "[locus] Path escapes the working directory: ../"]);
  });

  it("saves, clears and loads transcripts", async () => {
    const { session, workspaceDir, lines, run } = await createHarness();
    await session.runTurn("hi");

    await run("save history.jsonl");
    await run("clear");
    expect(session.snapshot()).toEqual([]);
    await run("load history.jsonl");
    await run("load missing.jsonl");

    expect(lines).toEqual([
      `[locus] conversation saved to ${path.join(workspaceDir, "history.jsonl")}`,
      "[locus] conversation cleared.",
      "[locus] loaded 2 turns from history.jsonl",
      `[locus] Transcript not found: ${path.join(workspaceDir, "missing.jsonl")}`
    ]);
    expect(session.snapshot()).toHaveLength(2);
  });

  it("reports the workspace, tools and endpoint state", async () => {
    const { inference, workspaceDir, lines, run } = await createHarness();

    await run("pwd");
    await run("tools");
    inference.reachable = false;
    await run("test");

    expect(lines).toEqual([
      `[locus] working directory: ${workspaceDir}`,
      "[locus] tools: read_file, write_file, create_directory, list_directory, check_file_exists, execute_shell",
      "[locus] endpoint not reachable"
    ]);
  });
});
