import { spawn } from "node:child_process";
import { errnoCode } from "../utils.js";

export const DEFAULT_SHELL_TIMEOUT_MS = 120_000;
export const DEFAULT_SHELL_MAX_OUTPUT_BYTES = 64 * 1024;

const KILL_ESCALATION_MS = 250;

export type ShellTermination = "exited" | "timeout" | "interrupted";

export interface ShellRunResult {
  exitCode: number | null;
  signal: string | null;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  truncated: boolean;
  totalBytes: number;
  durationMs: number;
  termination: ShellTermination;
}

export interface ShellRunOptions {
  command: string;
  cwd: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

function shellInvocation(command: string): { file: string; args: string[] } {
  if (process.platform === "win32") {
    return {
      file: process.env.ComSpec ?? "cmd.exe",
      args: ["/d", "/s", "/c", command]
    };
  }
  return {
    file: "sh",
    args: ["-c", command]
  };
}

export type SignalSender = (target: number, signal: NodeJS.Signals) => void;

const sendSignal: SignalSender = (target, signal) => {
  process.kill(target, signal);
};

/** Signals the first target that accepts it. A target that is already gone counts as delivered. */
function deliver(targets: readonly number[], signal: NodeJS.Signals, send: SignalSender): boolean {
  for (const target of targets) {
    try {
      send(target, signal);
      return true;
    } catch (error) {
      if (errnoCode(error) === "ESRCH") {
        return true;
      }
    }
  }
  return false;
}

/**
 * SIGTERM to the process group, SIGKILL after a short grace period. Returns
 * false when neither the group nor the process accepted SIGTERM.
 */
export function killProcessTree(
  pid: number,
  options: { send?: SignalSender; graceMs?: number } = {}
): boolean {
  const send = options.send ?? sendSignal;
  if (process.platform === "win32") {
    return deliver([pid], "SIGTERM", send);
  }

  const delivered = deliver([-pid, pid], "SIGTERM", send);
  const escalation = setTimeout(() => {
    deliver([-pid, pid], "SIGKILL", send);
  }, options.graceMs ?? KILL_ESCALATION_MS);
  escalation.unref();
  return delivered;
}

class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private keptBytes = 0;
  totalBytes = 0;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    this.totalBytes += chunk.byteLength;
    const room = this.maxBytes - this.keptBytes;
    if (room <= 0) {
      return;
    }
    const kept = chunk.byteLength <= room ? chunk : chunk.subarray(0, room);
    this.chunks.push(kept);
    this.keptBytes += kept.byteLength;
  }

  get truncated(): boolean {
    return this.totalBytes > this.keptBytes;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

/**
 * Runs one command through the platform shell and waits for it. The child
 * gets its own process group so an interrupt or timeout can take down
 * everything it started.
 */
export async function runShellCommand(options: ShellRunOptions): Promise<ShellRunResult> {
  const startedAt = Date.now();
  const timeoutMs = options.timeoutMs ?? DEFAULT_SHELL_TIMEOUT_MS;
  const output = new BoundedOutput(options.maxOutputBytes ?? DEFAULT_SHELL_MAX_OUTPUT_BYTES);

  if (options.signal?.aborted) {
    return {
      exitCode: null,
      signal: null,
      output: "",
      truncated: false,
      totalBytes: 0,
      durationMs: 0,
      termination: "interrupted"
    };
  }

  const invocation = shellInvocation(options.command);

  return await new Promise<ShellRunResult>((resolve, reject) => {
    const child = spawn(invocation.file, invocation.args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
      windowsHide: true
    });

    let termination: ShellTermination = "exited";
    let timer: NodeJS.Timeout | null = null;

    const stop = (reason: Exclude<ShellTermination, "exited">): void => {
      if (termination !== "exited") {
        return;
      }
      termination = reason;
      if (child.pid !== undefined) {
        killProcessTree(child.pid);
      }
    };

    const onAbort = (): void => {
      stop("interrupted");
    };

    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      options.signal?.removeEventListener("abort", onAbort);
    };

    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        stop("timeout");
      }, timeoutMs);
    }

    child.stdout.on("data", (chunk: Buffer) => {
      output.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      output.push(chunk);
    });

    child.once("error", (error) => {
      cleanup();
      reject(error);
    });

    child.once("close", (code, signal) => {
      cleanup();
      resolve({
        exitCode: code,
        signal,
        output: output.text(),
        truncated: output.truncated,
        totalBytes: output.totalBytes,
        durationMs: Date.now() - startedAt,
        termination
      });
    });
  });
}
