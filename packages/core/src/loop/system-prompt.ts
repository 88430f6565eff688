export interface SystemPromptParams {
  workspaceDir: string;
  model: string;
  /** Rendered tool list, see `describeTools`. */
  tools: string;
  platform?: NodeJS.Platform;
  now?: Date;
}

function shellName(platform: NodeJS.Platform): string {
  return platform === "win32" ? "cmd.exe" : "sh";
}

function formatLocalDateTime(value: Date): string {
  const pad = (part: number): string => String(part).padStart(2, "0");
  return (
    `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())} ` +
    `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`
  );
}

export function buildSystemPrompt(params: SystemPromptParams): string {
  const platform = params.platform ?? process.platform;
  const now = params.now ?? new Date();

  return [
    "You are a command-line assistant that works on the user's files by calling tools.",
    "",
    "== ENVIRONMENT ==",
    `- Operating system: ${platform}`,
    `- Shell: ${shellName(platform)}`,
    `- Working directory: ${params.workspaceDir}`,
    `- Date/time: ${formatLocalDateTime(now)}`,
    `- Model: ${params.model}`,
    "",
    "== PATHS ==",
    "- Every path is relative to the working directory.",
    "- Paths that leave the working directory are rejected.",
    "- Shell commands run in the working directory unless you pass a sub-directory as cwd.",
    "",
    "== CALLING TOOLS ==",
    "To use a tool, reply with one fenced json block per call:",
    "```json",
    '{"tool": "<tool_name>", "parameters": {"<parameter_name>": "<value>"}}',
    "```",
    "- Calls run in the order they appear, one after another.",
    "- After the calls run you receive one TOOL_RESULT message per call, then you may call more tools.",
    "- When no tool is needed, answer in plain text without any JSON.",
    "",
    "== TOOLS ==",
    params.tools
  ].join("\n");
}
