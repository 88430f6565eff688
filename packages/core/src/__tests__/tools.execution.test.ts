import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import type { ToolCallRecord } from "../conversation/types.js";
import { createDefaultBuiltInTools, defineTool, executeToolCall, ToolFailureError, ToolRegistry } from "../index.js";
import type { BuiltInToolFactoryParams, ToolDefinition } from "../tools/types.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "locus-tools-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function record(name: string, args: Record<string, unknown> = {}): ToolCallRecord {
  return {
    id: "call_1",
    name,
    arguments: args,
    span: { start: 0, end: 0, stage: "whole" }
  };
}

function runner(
  workspaceDir: string,
  params: BuiltInToolFactoryParams = {},
  extraTools: ToolDefinition[] = []
): (name: string, args?: Record<string, unknown>) => ReturnType<typeof executeToolCall> {
  const registry = new ToolRegistry([...createDefaultBuiltInTools(params), ...extraTools]);
  return (name, args = {}) =>
    executeToolCall({
      record: record(name, args),
      registry,
      context: { workspaceDir }
    });
}

describe("built-in file tools", () => {
  it("writes, reads and reports files inside the working directory", async () => {
    const workspaceDir = makeTempDir();
    const run = runner(workspaceDir);

    const write = await run("write_file", { file_path: "out/hello.txt", content: "hi" });
    expect(write).toEqual({ ok: true, output: { path: "out/hello.txt", bytesWritten: 2 } });
    expect(fs.readFileSync(path.join(workspaceDir, "out", "hello.txt"), "utf8")).toBe("hi");

    const read = await run("read_file", { file_path: "out/hello.txt" });
    expect(read).toEqual({
      ok: true,
      output: { path: "out/hello.txt", content: "hi", size: 2, truncated: false }
    });

    const exists = await run("check_file_exists", { path: "out/hello.txt" });
    expect(exists).toEqual({
      ok: true,
      output: { path: "out/hello.txt", exists: true, type: "file", size: 2 }
    });

    const missing = await run("check_file_exists", { path: "nope.txt" });
    expect(missing).toEqual({ ok: true, output: { path: "nope.txt", exists: false } });
  });

  it("creates directories and lists entries sorted by name", async () => {
    const workspaceDir = makeTempDir();
    const run = runner(workspaceDir);
    fs.writeFileSync(path.join(workspaceDir, "b.txt"), "abc", "utf8");

    const created = await run("create_directory", { dir_path: "a" });
    expect(created).toEqual({ ok: true, output: { path: "a", created: true } });
    const again = await run("create_directory", { dir_path: "a" });
    expect(again).toEqual({ ok: true, output: { path: "a", created: false } });

    const listing = await run("list_directory");
    expect(listing).toEqual({
      ok: true,
      output: {
        path: ".",
        entries: [
          { name: "a", type: "directory" },
          { name: "b.txt", type: "file", size: 3 }
        ],
        truncated: false
      }
    });
  });

  it("truncates reads past the configured byte cap", async () => {
    const workspaceDir = makeTempDir();
    fs.writeFileSync(path.join(workspaceDir, "long.txt"), "abcdefgh", "utf8");
    const run = runner(workspaceDir, { maxReadBytes: 4 });

    const read = await run("read_file", { file_path: "long.txt" });
    expect(read).toEqual({
      ok: true,
      output: { path: "long.txt", content: "abcd", size: 8, truncated: true }
    });
  });

  it("refuses paths outside the working directory without touching the filesystem", async () => {
    const workspaceDir = makeTempDir();
    const run = runner(workspaceDir);
    const target = path.join(path.dirname(workspaceDir), `${path.basename(workspaceDir)}-escape.txt`);
    const requested = `../${path.basename(target)}`;

    const write = await run("write_file", { file_path: requested, content: "nope" });
    expect(write.ok).toBe(false);
    expect(!write.ok && write.error.code).toBe("path_escape");
    expect(!write.ok && write.error.message).toBe(`Path escapes the working directory: ${requested}`);
    expect(fs.existsSync(target)).toBe(false);

    const mkdir = await run("create_directory", { dir_path: "../../locus-escape-dir" });
    expect(!mkdir.ok && mkdir.error.code).toBe("path_escape");
  });

  it("reports missing files and directories as execution errors", async () => {
    const workspaceDir = makeTempDir();
    fs.writeFileSync(path.join(workspaceDir, "plain.txt"), "x", "utf8");
    const run = runner(workspaceDir);

    const read = await run("read_file", { file_path: "missing.txt" });
    expect(read).toEqual({ ok: false, error: { code: "execution_error", message: "File not found: missing.txt" } });

    const list = await run("list_directory", { dir_path: "plain.txt" });
    expect(list).toEqual({ ok: false, error: { code: "execution_error", message: "Not a directory: plain.txt" } });

    const mkdir = await run("create_directory", { dir_path: "plain.txt" });
    expect(!mkdir.ok && mkdir.error.message).toBe("A file already exists at: plain.txt");
  });
});

describe("tool executor", () => {
  it("returns unknown_tool with the available names", async () => {
    const run = runner(makeTempDir());
    const result = await run("delete_everything");

    expect(result).toEqual({
      ok: false,
      error: {
        code: "unknown_tool",
        message:
          "Unknown tool: delete_everything. Available tools: read_file, write_file, create_directory, list_directory, check_file_exists, execute_shell"
      }
    });
  });

  it("validates arguments before the handler runs", async () => {
    const run = runner(makeTempDir());
    const result = await run("read_file", {});

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe("invalid_arguments");
    expect(!result.ok && result.error.issues?.map((issue) => issue.path)).toEqual(["file_path"]);
  });

  it("maps tool failures and thrown errors to data", async () => {
    let calls = 0;
    const flaky = defineTool({
      name: "flaky",
      description: "Fails on purpose",
      parameters: z.object({ mode: z.enum(["coded", "plain"]) }),
      execute: (input) => {
        calls += 1;
        if (input.mode === "coded") {
          throw new ToolFailureError("timeout", "took too long", { partial: true });
        }
        throw new Error("boom");
      }
    });
    const run = runner(makeTempDir(), {}, [flaky]);

    expect(await run("flaky", { mode: "coded" })).toEqual({
      ok: false,
      error: { code: "timeout", message: "took too long" },
      output: { partial: true }
    });
    expect(await run("flaky", { mode: "plain" })).toEqual({
      ok: false,
      error: { code: "execution_error", message: "boom" }
    });
    expect(calls).toBe(2);
  });
});
