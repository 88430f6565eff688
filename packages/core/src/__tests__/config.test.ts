import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_MODEL, resolveAgentConfig } from "../config.js";

function captureConfigError(raw: unknown): ConfigError | null {
  try {
    resolveAgentConfig(raw, { baseDir: "/tmp/locus-project", env: {} });
  } catch (error) {
    return error instanceof ConfigError ? error : null;
  }
  return null;
}

describe("agent config", () => {
  it("fills every default from an empty config", () => {
    const baseDir = path.resolve("/tmp/locus-project");
    const config = resolveAgentConfig({}, { baseDir, env: {} });

    expect(config).toEqual({
      workspaceDir: baseDir,
      inference: {
        host: "http://localhost:11434",
        model: DEFAULT_MODEL,
        temperature: 0,
        numCtx: 8192,
        numPredict: 2048,
        timeoutMs: 600_000
      },
      loop: { maxRoundTrips: 10, maxToolResultChars: 16_000 },
      shell: {
        timeoutMs: 120_000,
        maxOutputBytes: 64 * 1024,
        allowCommandPrefixes: [],
        denyCommandPrefixes: []
      },
      tools: { maxReadBytes: 256 * 1024 },
      toolDirectory: undefined,
      transcriptDirectory: baseDir,
      observability: {
        enabled: false,
        directory: path.join(baseDir, ".locus", "observability")
      }
    });
  });

  it("reads host and model from the environment when the config leaves them unset", () => {
    const config = resolveAgentConfig(
      {},
      { baseDir: "/tmp/locus-project", env: { OLLAMA_HOST: "gpu-box:11434/", LOCUS_MODEL: "small:1b" } }
    );

    expect(config.inference.host).toBe("http://gpu-box:11434");
    expect(config.inference.model).toBe("small:1b");
  });

  it("prefers explicit values and resolves paths against the base directory", () => {
    const baseDir = path.resolve("/tmp/locus-project");
    const config = resolveAgentConfig(
      {
        workspaceDir: "work",
        inference: { host: "http://10.0.0.5:11434", model: "coder:7b" },
        loop: { maxRoundTrips: 3 },
        toolDirectory: "tools",
        transcriptDirectory: "history",
        observability: { enabled: true }
      },
      { baseDir, env: { OLLAMA_HOST: "ignored:1", LOCUS_MODEL: "ignored" } }
    );

    expect(config.workspaceDir).toBe(path.join(baseDir, "work"));
    expect(config.inference.host).toBe("http://10.0.0.5:11434");
    expect(config.inference.model).toBe("coder:7b");
    expect(config.loop.maxRoundTrips).toBe(3);
    expect(config.toolDirectory).toBe(path.join(baseDir, "tools"));
    expect(config.transcriptDirectory).toBe(path.join(baseDir, "history"));
    expect(config.observability).toEqual({
      enabled: true,
      directory: path.join(baseDir, "work", ".locus", "observability")
    });
  });

  it("rejects invalid values with one issue per problem", () => {
    const error = captureConfigError({ inference: { temperature: 5 }, loop: { maxRoundTrips: -1 } });

    expect(error?.issues).toHaveLength(2);
    expect(error?.issues[0]?.startsWith("inference.temperature: ")).toBe(true);
    expect(error?.issues[1]?.startsWith("loop.maxRoundTrips: ")).toBe(true);
    expect(error?.message.startsWith("Invalid configuration: ")).toBe(true);
  });

  it("rejects unknown keys", () => {
    expect(captureConfigError({ bogus: true })).toBeInstanceOf(ConfigError);
    expect(captureConfigError({ inference: { hots: "x" } })).toBeInstanceOf(ConfigError);
  });
});
