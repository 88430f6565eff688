import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { resolveContainedPath, type ResolvedWorkspacePath } from "../path-policy.js";
import { errnoCode, errorMessage } from "../utils.js";
import { defineTool } from "./definition.js";
import { ToolFailureError } from "./errors.js";
import {
  checkFileExistsToolSchema,
  createDirectoryToolSchema,
  executeShellToolSchema,
  listDirectoryToolSchema,
  readFileToolSchema,
  writeFileToolSchema
} from "./schemas.js";
import {
  DEFAULT_SHELL_MAX_OUTPUT_BYTES,
  DEFAULT_SHELL_TIMEOUT_MS,
  runShellCommand,
  type ShellRunResult
} from "./shell.js";
import type { BuiltInToolFactoryParams, ShellToolPolicy, ToolContext, ToolDefinition } from "./types.js";

export const DEFAULT_MAX_READ_BYTES = 256 * 1024;
const MAX_LIST_ENTRIES = 500;

export const BUILT_IN_TOOL_NAMES = [
  "read_file",
  "write_file",
  "create_directory",
  "list_directory",
  "check_file_exists",
  "execute_shell"
] as const;

interface DirectoryEntry {
  name: string;
  type: "file" | "directory";
  size?: number;
}

function containedPath(context: ToolContext, requestedPath: string): ResolvedWorkspacePath {
  const resolved = resolveContainedPath(context.workspaceDir, requestedPath);
  if (!resolved.ok) {
    throw new ToolFailureError(
      "path_escape",
      `Path escapes the working directory: ${requestedPath}`,
      { requestedPath, resolvedPath: resolved.absolute }
    );
  }
  return resolved.path;
}

function normalizePrefix(prefix: string): string {
  return prefix.trim();
}

function commandMatchesPrefix(command: string, prefix: string): boolean {
  const normalizedPrefix = normalizePrefix(prefix);
  if (!normalizedPrefix) {
    return false;
  }
  return command === normalizedPrefix || command.startsWith(`${normalizedPrefix} `);
}

export function enforceShellPolicy(command: string, policy: ShellToolPolicy | undefined): void {
  const normalizedCommand = command.trim();

  const denyPrefixes = (policy?.denyCommandPrefixes ?? []).map(normalizePrefix).filter((prefix) => prefix.length > 0);
  for (const prefix of denyPrefixes) {
    if (commandMatchesPrefix(normalizedCommand, prefix)) {
      throw new ToolFailureError("command_denied", `Shell command denied by policy: ${prefix}`);
    }
  }

  const allowPrefixes = (policy?.allowCommandPrefixes ?? []).map(normalizePrefix).filter((prefix) => prefix.length > 0);
  if (allowPrefixes.length === 0) {
    return;
  }
  const matched = allowPrefixes.some((prefix) => commandMatchesPrefix(normalizedCommand, prefix));
  if (!matched) {
    throw new ToolFailureError("command_denied", "Shell command denied by allow-list policy");
  }
}

async function statOrNull(absolute: string): Promise<Stats | null> {
  try {
    return await fs.stat(absolute);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function listEntries(absolute: string): Promise<{ entries: DirectoryEntry[]; truncated: boolean }> {
  const dirEntries = await fs.readdir(absolute, { withFileTypes: true });
  dirEntries.sort((left, right) => left.name.localeCompare(right.name));

  const entries: DirectoryEntry[] = [];
  for (const dirEntry of dirEntries) {
    if (entries.length >= MAX_LIST_ENTRIES) {
      return { entries, truncated: true };
    }
    const entryPath = path.join(absolute, dirEntry.name);
    const stat = await statOrNull(entryPath);
    const isDirectory = stat ? stat.isDirectory() : dirEntry.isDirectory();
    entries.push(
      isDirectory
        ? { name: dirEntry.name, type: "directory" }
        : { name: dirEntry.name, type: "file", size: stat ? stat.size : undefined }
    );
  }
  return { entries, truncated: false };
}

export function createDefaultBuiltInTools(params: BuiltInToolFactoryParams = {}): ToolDefinition[] {
  const maxReadBytes = params.maxReadBytes ?? DEFAULT_MAX_READ_BYTES;
  const shellPolicy = params.shellPolicy;

  const readFileTool = defineTool({
    name: "read_file",
    description: "Read the UTF-8 contents of a file",
    parameters: readFileToolSchema,
    execute: async (input, context) => {
      const resolved = containedPath(context, input.file_path);
      const stat = await statOrNull(resolved.absolute);
      if (!stat) {
        throw new ToolFailureError("execution_error", `File not found: ${input.file_path}`);
      }
      if (stat.isDirectory()) {
        throw new ToolFailureError("execution_error", `Path is a directory, not a file: ${input.file_path}`);
      }

      const buffer = await fs.readFile(resolved.absolute);
      const truncated = buffer.byteLength > maxReadBytes;
      return {
        path: resolved.relative,
        content: (truncated ? buffer.subarray(0, maxReadBytes) : buffer).toString("utf8"),
        size: buffer.byteLength,
        truncated
      };
    }
  });

  const writeFileTool = defineTool({
    name: "write_file",
    description: "Write content to a file, creating parent directories as needed",
    parameters: writeFileToolSchema,
    execute: async (input, context) => {
      const resolved = containedPath(context, input.file_path);
      const existing = await statOrNull(resolved.absolute);
      if (existing?.isDirectory()) {
        throw new ToolFailureError("execution_error", `Path is a directory, not a file: ${input.file_path}`);
      }
      await fs.mkdir(path.dirname(resolved.absolute), { recursive: true });
      await fs.writeFile(resolved.absolute, input.content, "utf8");
      return {
        path: resolved.relative,
        bytesWritten: Buffer.byteLength(input.content, "utf8")
      };
    }
  });

  const createDirectoryTool = defineTool({
    name: "create_directory",
    description: "Create a directory and any missing parents",
    parameters: createDirectoryToolSchema,
    execute: async (input, context) => {
      const resolved = containedPath(context, input.dir_path);
      const existing = await statOrNull(resolved.absolute);
      if (existing && !existing.isDirectory()) {
        throw new ToolFailureError("execution_error", `A file already exists at: ${input.dir_path}`);
      }
      await fs.mkdir(resolved.absolute, { recursive: true });
      return {
        path: resolved.relative,
        created: existing === null
      };
    }
  });

  const listDirectoryTool = defineTool({
    name: "list_directory",
    description: "List the entries of a directory",
    parameters: listDirectoryToolSchema,
    execute: async (input, context) => {
      const resolved = containedPath(context, input.dir_path);
      const stat = await statOrNull(resolved.absolute);
      if (!stat) {
        throw new ToolFailureError("execution_error", `Directory not found: ${input.dir_path}`);
      }
      if (!stat.isDirectory()) {
        throw new ToolFailureError("execution_error", `Not a directory: ${input.dir_path}`);
      }
      const listed = await listEntries(resolved.absolute);
      return {
        path: resolved.relative,
        entries: listed.entries,
        truncated: listed.truncated
      };
    }
  });

  const checkFileExistsTool = defineTool({
    name: "check_file_exists",
    description: "Check whether a file or directory exists",
    parameters: checkFileExistsToolSchema,
    execute: async (input, context) => {
      const resolved = containedPath(context, input.path);
      const stat = await statOrNull(resolved.absolute);
      if (!stat) {
        return {
          path: resolved.relative,
          exists: false
        };
      }
      return stat.isDirectory()
        ? { path: resolved.relative, exists: true, type: "directory" }
        : { path: resolved.relative, exists: true, type: "file", size: stat.size };
    }
  });

  const executeShellTool = defineTool({
    name: "execute_shell",
    description: "Run a shell command in the working directory and capture its output",
    parameters: executeShellToolSchema,
    execute: async (input, context) => {
      enforceShellPolicy(input.command, shellPolicy);
      const timeoutMs = shellPolicy?.timeoutMs ?? DEFAULT_SHELL_TIMEOUT_MS;
      const cwd = input.cwd ? containedPath(context, input.cwd) : containedPath(context, ".");
      const cwdStat = await statOrNull(cwd.absolute);
      if (!cwdStat?.isDirectory()) {
        throw new ToolFailureError("execution_error", `Working directory not found: ${input.cwd ?? "."}`);
      }

      let result: ShellRunResult;
      try {
        result = await runShellCommand({
          command: input.command,
          cwd: cwd.absolute,
          timeoutMs,
          maxOutputBytes: shellPolicy?.maxOutputBytes ?? DEFAULT_SHELL_MAX_OUTPUT_BYTES,
          signal: context.signal
        });
      } catch (error) {
        throw new ToolFailureError("execution_error", `Failed to start shell: ${errorMessage(error)}`);
      }

      const payload = {
        command: input.command,
        cwd: cwd.relative,
        exitCode: result.exitCode,
        signal: result.signal,
        output: result.output,
        truncated: result.truncated,
        durationMs: result.durationMs
      };

      if (result.termination === "interrupted") {
        throw new ToolFailureError("interrupted", "Command interrupted by user", payload);
      }
      if (result.termination === "timeout") {
        throw new ToolFailureError("timeout", `Command timed out after ${timeoutMs}ms`, payload);
      }
      if (result.exitCode !== 0) {
        const status = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.exitCode}`;
        throw new ToolFailureError("non_zero_exit", `Command exited with ${status}`, payload);
      }
      return payload;
    }
  });

  return [readFileTool, writeFileTool, createDirectoryTool, listDirectoryTool, checkFileExistsTool, executeShellTool];
}
