#!/usr/bin/env tsx

import { AgentSession, ConfigError, errorMessage } from "@locus/core";
import { loadCliConfig } from "./config.js";
import { renderModels, renderRunningModels } from "./render.js";
import { reportObservabilityFailure, runStartLoop } from "./start.js";

function printHelp(): void {
  process.stdout.write(
    [
      "locus commands:",
      "  locus start [--model <name>] [--verbose]",
      "  locus models",
      "  locus running",
      "  locus help"
    ].join("\n") + "\n"
  );
}

interface StartOptions {
  model?: string;
  verbose: boolean;
}

function parseStartOptions(args: string[]): { options: StartOptions; ok: boolean } {
  const options: StartOptions = { verbose: false };

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token) {
      continue;
    }
    if (token === "--verbose" || token === "-v") {
      options.verbose = true;
      continue;
    }
    let candidate: string | undefined;
    if (token === "--model") {
      candidate = args[i + 1];
      i += 1;
    } else if (token.startsWith("--model=")) {
      candidate = token.slice("--model=".length);
    } else {
      process.stderr.write(`Unknown start option: ${token}\n`);
      return { options, ok: false };
    }

    if (!candidate?.trim()) {
      process.stderr.write("Missing value for --model\n");
      return { options, ok: false };
    }
    options.model = candidate.trim();
  }

  return { options, ok: true };
}

async function main(): Promise<number> {
  const [command = "start", ...args] = process.argv.slice(2);

  if (command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  if (command !== "start" && command !== "models" && command !== "running") {
    process.stderr.write(`Unknown command: ${command}\n`);
    printHelp();
    return 1;
  }

  const parsed = command === "start" ? parseStartOptions(args) : { options: { verbose: false }, ok: true };
  if (!parsed.ok) {
    return 1;
  }

  const loaded = await loadCliConfig();
  const config = parsed.options.model
    ? { ...loaded.config, inference: { ...loaded.config.inference, model: parsed.options.model } }
    : loaded.config;
  const session = await AgentSession.create(config, { onObservabilityFailure: reportObservabilityFailure });

  if (command === "models") {
    renderModels(await session.listModels(), session.model).forEach((line) => process.stdout.write(`${line}\n`));
    return 0;
  }

  if (command === "running") {
    renderRunningModels(await session.listRunningModels()).forEach((line) => process.stdout.write(`${line}\n`));
    return 0;
  }

  if (!(await session.ping())) {
    process.stderr.write(
      `[locus] cannot reach the model endpoint at ${config.inference.host}; is ollama running? Continuing anyway.\n`
    );
  }
  return await runStartLoop({ session, verbose: parsed.options.verbose });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      process.stderr.write(`[locus] ${error.message}\n`);
    } else {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : errorMessage(error)}\n`);
    }
    process.exitCode = 1;
  });
