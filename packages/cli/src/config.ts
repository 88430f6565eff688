import fs from "node:fs";
import path from "node:path";
import {
  ConfigError,
  errorMessage,
  importUserModule,
  pickModuleExport,
  resolveAgentConfig,
  type ResolvedAgentConfig
} from "@locus/core";
import { parse as parseDotEnv } from "dotenv";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  config: ResolvedAgentConfig;
}

export const CONFIG_CANDIDATES = [
  "locus.config.ts",
  "locus.config.mts",
  "locus.config.js",
  "locus.config.mjs",
  "locus.config.json"
];

export function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv = process.env): void {
  // Variables already set in the shell win over the files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    const parsed = parseDotEnv(fs.readFileSync(filePath, "utf8"));
    for (const [key, value] of Object.entries(parsed)) {
      merged[key] = value;
    }
  }

  for (const [key, value] of Object.entries(merged)) {
    if (shellDefined.has(key)) {
      continue;
    }
    env[key] = value;
  }
}

async function readConfigFile(configPath: string): Promise<unknown> {
  if (configPath.endsWith(".json")) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
      return parsed;
    } catch (error) {
      throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`);
    }
  }

  let loaded: unknown;
  try {
    loaded = await importUserModule(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to load ${configPath}: ${errorMessage(error)}`);
  }

  const config = pickModuleExport(loaded, ["config"]);
  if (!config || typeof config !== "object") {
    throw new ConfigError(`Invalid config export from ${configPath}`);
  }
  return config;
}

export function findConfigFile(projectRoot: string): string | null {
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(projectRoot, candidate);
    if (fs.existsSync(absolute) && fs.statSync(absolute).isFile()) {
      return absolute;
    }
  }
  return null;
}

export async function loadCliConfig(
  projectRoot = process.cwd(),
  options: { env?: NodeJS.ProcessEnv } = {}
): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  const env = options.env ?? process.env;
  loadProjectEnvFiles(resolvedRoot, env);

  const configPath = findConfigFile(resolvedRoot);
  const rawConfig = configPath ? await readConfigFile(configPath) : {};

  let config: ResolvedAgentConfig;
  try {
    config = resolveAgentConfig(rawConfig, { baseDir: resolvedRoot, env });
  } catch (error) {
    if (error instanceof ConfigError && configPath) {
      throw new ConfigError(`${path.basename(configPath)}: ${error.message}`, error.issues);
    }
    throw error;
  }

  return {
    projectRoot: resolvedRoot,
    configPath,
    config
  };
}
