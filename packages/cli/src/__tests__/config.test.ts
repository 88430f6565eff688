import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, DEFAULT_MODEL } from "@locus/core";
import { afterEach, describe, expect, it } from "vitest";
import { loadCliConfig } from "../config.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "locus-cli-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadCliConfig", () => {
  it("treats the project root as the workspace when no config file exists", async () => {
    const projectRoot = makeTempDir();
    const loaded = await loadCliConfig(projectRoot, { env: {} });

    expect(loaded.configPath).toBeNull();
    expect(loaded.config.workspaceDir).toBe(projectRoot);
    expect(loaded.config.inference.model).toBe(DEFAULT_MODEL);
  });

  it("reads locus.config.json and the project .env files", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(
      path.join(projectRoot, "locus.config.json"),
      JSON.stringify({ inference: { model: "coder:7b" }, loop: { maxRoundTrips: 4 } }),
      "utf8"
    );
    fs.writeFileSync(path.join(projectRoot, ".env"), "OLLAMA_HOST=gpu-box:11434\nLOCUS_MODEL=from-env\n", "utf8");
    fs.writeFileSync(path.join(projectRoot, ".env.local"), "OLLAMA_HOST=local-box:11434\n", "utf8");
    const env: NodeJS.ProcessEnv = {};

    const loaded = await loadCliConfig(projectRoot, { env });

    expect(loaded.configPath).toBe(path.join(projectRoot, "locus.config.json"));
    expect(loaded.config.inference.model).toBe("coder:7b");
    expect(loaded.config.inference.host).toBe("http://local-box:11434");
    expect(loaded.config.loop.maxRoundTrips).toBe(4);
    expect(env.LOCUS_MODEL).toBe("from-env");
  });

  it("keeps variables already set in the shell", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(path.join(projectRoot, ".env"), "OLLAMA_HOST=gpu-box:11434\n", "utf8");

    const loaded = await loadCliConfig(projectRoot, { env: { OLLAMA_HOST: "http://shell-box:11434" } });

    expect(loaded.config.inference.host).toBe("http://shell-box:11434");
  });

  it("loads module config files through their default export", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(
      path.join(projectRoot, "locus.config.mjs"),
      "export default { inference: { model: 'mjs-model' }, toolDirectory: 'tools' };\n",
      "utf8"
    );

    const loaded = await loadCliConfig(projectRoot, { env: {} });

    expect(loaded.config.inference.model).toBe("mjs-model");
    expect(loaded.config.toolDirectory).toBe(path.join(projectRoot, "tools"));
  });

  it("prefixes validation errors with the config file name", async () => {
    const projectRoot = makeTempDir();
    fs.writeFileSync(path.join(projectRoot, "locus.config.json"), JSON.stringify({ loop: { maxRoundTrips: "x" } }), "utf8");

    const failure = await loadCliConfig(projectRoot, { env: {} }).then(
      () => null,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure instanceof ConfigError && failure.message.startsWith("locus.config.json: Invalid configuration: ")).toBe(
      true
    );
  });
});
