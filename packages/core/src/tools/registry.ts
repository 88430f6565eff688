import { type Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { importUserModule, pickModuleExport } from "../module-loader.js";
import { errnoCode, errorMessage } from "../utils.js";
import { asToolDefinition } from "./definition.js";
import type { ToolDefinition, ToolRegistryDiagnostics } from "./types.js";

const CUSTOM_TOOL_EXTENSIONS = new Set([".js", ".mjs", ".cjs", ".ts", ".mts", ".cts"]);

/** Fixed after construction; lookups are by exact name. */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;

  constructor(tools: Iterable<ToolDefinition>) {
    const map = new Map<string, ToolDefinition>();
    for (const tool of tools) {
      map.set(tool.name, Object.freeze({ ...tool }));
    }
    this.tools = map;
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }
}

export interface ToolRegistryResult {
  registry: ToolRegistry;
  diagnostics: ToolRegistryDiagnostics;
}

async function collectToolFiles(dirPath: string): Promise<string[]> {
  const discovered: string[] = [];

  async function walk(current: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const absolute = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(absolute);
        continue;
      }
      const extension = path.extname(entry.name).toLowerCase();
      if (!CUSTOM_TOOL_EXTENSIONS.has(extension)) {
        continue;
      }
      discovered.push(absolute);
    }
  }

  await walk(dirPath);
  discovered.sort((left, right) => left.localeCompare(right));
  return discovered;
}

async function importToolFile(filePath: string): Promise<ToolDefinition | null> {
  return asToolDefinition(pickModuleExport(await importUserModule(filePath), ["tool"]));
}

export async function buildToolRegistry(params: {
  builtInTools: ToolDefinition[];
  customToolsDirectory?: string;
}): Promise<ToolRegistryResult> {
  const tools = new Map<string, ToolDefinition>();
  const diagnostics: ToolRegistryDiagnostics = {
    loadedBuiltInCount: 0,
    loadedCustomCount: 0,
    skipped: []
  };

  for (const tool of params.builtInTools) {
    const normalized = asToolDefinition(tool);
    if (!normalized) {
      continue;
    }
    tools.set(normalized.name, normalized);
    diagnostics.loadedBuiltInCount += 1;
  }

  const builtInNames = new Set(tools.keys());
  const customFiles = params.customToolsDirectory ? await collectToolFiles(params.customToolsDirectory) : [];

  for (const filePath of customFiles) {
    let customTool: ToolDefinition | null = null;
    try {
      customTool = await importToolFile(filePath);
    } catch (error) {
      diagnostics.skipped.push({
        filePath,
        reason: "import_error",
        message: errorMessage(error)
      });
      continue;
    }

    if (!customTool) {
      diagnostics.skipped.push({
        filePath,
        reason: "invalid_shape",
        message: "Expected a tool definition export with name, execute, and optional parameters schema"
      });
      continue;
    }

    if (builtInNames.has(customTool.name)) {
      diagnostics.skipped.push({
        filePath,
        reason: "name_collision",
        message: `Tool name "${customTool.name}" is reserved by a built-in tool`,
        toolName: customTool.name
      });
      continue;
    }

    if (tools.has(customTool.name)) {
      diagnostics.skipped.push({
        filePath,
        reason: "duplicate_custom_name",
        message: `Tool name "${customTool.name}" is already loaded from another custom tool file`,
        toolName: customTool.name
      });
      continue;
    }

    tools.set(customTool.name, customTool);
    diagnostics.loadedCustomCount += 1;
  }

  return { registry: new ToolRegistry(tools.values()), diagnostics };
}
