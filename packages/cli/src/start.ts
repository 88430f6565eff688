import readline from "node:readline";
import { errorMessage, type AgentSession } from "@locus/core";
import { parseLocalCommand, runLocalCommand } from "./commands.js";
import { renderAgentEvent, renderOutcome } from "./render.js";

export function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

/** Observability write failures arrive once per session; the log is off afterwards. */
export function reportObservabilityFailure(message: string): void {
  print(`[locus] ${message}; event log disabled`);
}

function printBanner(session: AgentSession): void {
  print(`[locus] runtime: node=${process.version} pid=${process.pid} workspace=${session.workspaceDir}`);
  print(`[locus] model: ${session.model}`);
  const diagnostics = session.toolDiagnostics;
  if (diagnostics) {
    print(
      `[locus] tools: built-in=${diagnostics.loadedBuiltInCount} custom=${diagnostics.loadedCustomCount} skipped=${diagnostics.skipped.length}`
    );
    for (const skipped of diagnostics.skipped) {
      print(`[locus] tool skipped: file=${skipped.filePath} reason=${skipped.reason} message=${skipped.message}`);
    }
  }
  if (session.observability) {
    print(`[locus] observability: ${session.observability.filePath}`);
  }
  print("[locus] type `help` for commands.");
}

/**
 * The interactive line shell. One turn runs at a time; input typed while a
 * turn runs is rejected. Ctrl+C interrupts the running tool, else cancels the
 * pending model request, else exits.
 */
export async function runStartLoop(params: {
  session: AgentSession;
  verbose?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}): Promise<number> {
  const session = params.session;
  let turnInFlight = false;
  let settled = false;

  let resolveExit: (code: number) => void = () => undefined;
  const exitPromise = new Promise<number>((resolve) => {
    resolveExit = resolve;
  });

  const rl = readline.createInterface({
    input: params.input ?? process.stdin,
    output: params.output ?? process.stdout,
    prompt: `${session.model}> `
  });

  const prompt = (): void => {
    rl.setPrompt(`${session.model}> `);
    rl.prompt();
  };

  const settle = (code: number): void => {
    if (settled) {
      return;
    }
    settled = true;
    process.off("SIGTERM", onSigTerm);
    rl.close();
    resolveExit(code);
  };

  const onSigInt = (): void => {
    const target = session.interrupt();
    if (target === "tool") {
      print("\n[locus] interrupting the running command");
      return;
    }
    if (target === "inference") {
      print("\n[locus] cancelling the pending model request");
      return;
    }
    print("\n[locus] goodbye");
    settle(0);
  };

  const onSigTerm = (): void => {
    session.interrupt();
    settle(0);
  };

  const runTurn = async (text: string): Promise<void> => {
    turnInFlight = true;
    try {
      const outcome = await session.runTurn(text, {
        onEvent: (event) => {
          const rendered = renderAgentEvent(event, { verbose: params.verbose });
          if (rendered) {
            print(rendered);
          }
        }
      });
      renderOutcome(outcome).forEach((line) => print(line));
    } catch (error) {
      print(`[locus] ${errorMessage(error)}`);
    } finally {
      turnInFlight = false;
    }
  };

  rl.on("SIGINT", onSigInt);
  rl.on("close", () => {
    settle(0);
  });
  process.on("SIGTERM", onSigTerm);

  rl.on("line", (line) => {
    const text = line.trim();
    if (!text) {
      if (!turnInFlight) {
        prompt();
      }
      return;
    }

    if (turnInFlight) {
      print("[locus] turn already in progress; press Ctrl+C to interrupt");
      return;
    }

    const command = parseLocalCommand(text);
    const work =
      command.kind === "message"
        ? runTurn(command.text).then(() => true)
        : (() => {
            turnInFlight = true;
            return runLocalCommand(command, session, print).finally(() => {
              turnInFlight = false;
            });
          })();

    work
      .then((keepGoing) => {
        if (!keepGoing) {
          print("[locus] goodbye");
          settle(0);
          return;
        }
        if (!settled) {
          prompt();
        }
      })
      .catch((error: unknown) => {
        print(`[locus] ${errorMessage(error)}`);
        prompt();
      });
  });

  printBanner(session);
  prompt();

  return await exitPromise;
}
