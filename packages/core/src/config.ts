import path from "node:path";
import { z } from "zod";
import { DEFAULT_MAX_TOOL_RESULT_CHARS } from "./conversation/messages.js";
import { DEFAULT_OLLAMA_HOST } from "./inference/ollama.js";
import { DEFAULT_MAX_ROUND_TRIPS } from "./loop/action-loop.js";
import { DEFAULT_MAX_READ_BYTES } from "./tools/builtins.js";
import { DEFAULT_SHELL_MAX_OUTPUT_BYTES, DEFAULT_SHELL_TIMEOUT_MS } from "./tools/shell.js";

export const DEFAULT_MODEL = "qwen3-coder:30b";
export const DEFAULT_INFERENCE_TIMEOUT_MS = 600_000;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const positiveInt = z.number().int().positive();

export const agentConfigSchema = z
  .object({
    workspaceDir: z.string().min(1).optional(),
    inference: z
      .object({
        host: z.string().url().optional(),
        model: z.string().min(1).optional(),
        temperature: z.number().min(0).max(2).optional(),
        numCtx: positiveInt.optional(),
        numPredict: z.number().int().optional(),
        timeoutMs: positiveInt.optional()
      })
      .strict()
      .optional(),
    loop: z
      .object({
        maxRoundTrips: z.number().int().nonnegative().optional(),
        maxToolResultChars: positiveInt.optional()
      })
      .strict()
      .optional(),
    shell: z
      .object({
        timeoutMs: positiveInt.optional(),
        maxOutputBytes: positiveInt.optional(),
        allowCommandPrefixes: z.array(z.string()).optional(),
        denyCommandPrefixes: z.array(z.string()).optional()
      })
      .strict()
      .optional(),
    tools: z
      .object({
        maxReadBytes: positiveInt.optional()
      })
      .strict()
      .optional(),
    toolDirectory: z.string().min(1).optional(),
    transcriptDirectory: z.string().min(1).optional(),
    observability: z
      .object({
        enabled: z.boolean().optional(),
        directory: z.string().min(1).optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type AgentConfig = z.input<typeof agentConfigSchema>;

export interface ResolvedAgentConfig {
  workspaceDir: string;
  inference: {
    host: string;
    model: string;
    temperature: number;
    numCtx: number;
    numPredict: number;
    timeoutMs: number;
  };
  loop: {
    maxRoundTrips: number;
    maxToolResultChars: number;
  };
  shell: {
    timeoutMs: number;
    maxOutputBytes: number;
    allowCommandPrefixes: string[];
    denyCommandPrefixes: string[];
  };
  tools: {
    maxReadBytes: number;
  };
  toolDirectory?: string;
  transcriptDirectory: string;
  observability: {
    enabled: boolean;
    directory: string;
  };
}

export function defineConfig<T extends AgentConfig>(config: T): T {
  return config;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function normalizeHost(value: string): string {
  const withScheme = /^https?:\/\//i.test(value) ? value : `http://${value}`;
  return withScheme.replace(/\/+$/, "");
}

/**
 * Validates a raw config value and fills in defaults. Relative paths resolve
 * against `baseDir`; `OLLAMA_HOST` and `LOCUS_MODEL` apply when the config
 * leaves host or model unset.
 */
export function resolveAgentConfig(
  raw: unknown,
  options: { baseDir?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedAgentConfig {
  const parsed = agentConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const config = parsed.data;
  const env = options.env ?? process.env;
  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const resolvePath = (value: string): string => path.resolve(baseDir, value);

  const workspaceDir = config.workspaceDir ? resolvePath(config.workspaceDir) : baseDir;
  const host = config.inference?.host ?? envValue(env, "OLLAMA_HOST") ?? DEFAULT_OLLAMA_HOST;

  return {
    workspaceDir,
    inference: {
      host: normalizeHost(host),
      model: config.inference?.model ?? envValue(env, "LOCUS_MODEL") ?? DEFAULT_MODEL,
      temperature: config.inference?.temperature ?? 0,
      numCtx: config.inference?.numCtx ?? 8192,
      numPredict: config.inference?.numPredict ?? 2048,
      timeoutMs: config.inference?.timeoutMs ?? DEFAULT_INFERENCE_TIMEOUT_MS
    },
    loop: {
      maxRoundTrips: config.loop?.maxRoundTrips ?? DEFAULT_MAX_ROUND_TRIPS,
      maxToolResultChars: config.loop?.maxToolResultChars ?? DEFAULT_MAX_TOOL_RESULT_CHARS
    },
    shell: {
      timeoutMs: config.shell?.timeoutMs ?? DEFAULT_SHELL_TIMEOUT_MS,
      maxOutputBytes: config.shell?.maxOutputBytes ?? DEFAULT_SHELL_MAX_OUTPUT_BYTES,
      allowCommandPrefixes: config.shell?.allowCommandPrefixes ?? [],
      denyCommandPrefixes: config.shell?.denyCommandPrefixes ?? []
    },
    tools: {
      maxReadBytes: config.tools?.maxReadBytes ?? DEFAULT_MAX_READ_BYTES
    },
    toolDirectory: config.toolDirectory ? resolvePath(config.toolDirectory) : undefined,
    transcriptDirectory: config.transcriptDirectory ? resolvePath(config.transcriptDirectory) : workspaceDir,
    observability: {
      enabled: config.observability?.enabled ?? false,
      directory: config.observability?.directory
        ? resolvePath(config.observability.directory)
        : path.join(workspaceDir, ".locus", "observability")
    }
  };
}
