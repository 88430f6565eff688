export interface ToolContext {
  workspaceDir: string;
  /** Aborted when the user interrupts this call. */
  signal?: AbortSignal;
}

export type ToolErrorCode =
  | "unknown_tool"
  | "invalid_arguments"
  | "path_escape"
  | "non_zero_exit"
  | "interrupted"
  | "timeout"
  | "command_denied"
  | "execution_error";

export interface ToolValidationIssue {
  path: string;
  message: string;
  code?: string;
}

export interface ToolFailure {
  code: ToolErrorCode;
  message: string;
  issues?: ToolValidationIssue[];
}

export interface ToolParameterSchema<TInput = unknown> {
  safeParse: (
    input: unknown
  ) =>
    | {
        success: true;
        data: TInput;
      }
    | {
        success: false;
        error: unknown;
      };
}

export interface ToolDefinition {
  name: string;
  description?: string;
  parameters?: ToolParameterSchema<unknown>;
  execute: (input: unknown, context: ToolContext) => Promise<unknown> | unknown;
}

export interface ToolDefinitionSpec<TInput = unknown, TOutput = unknown> {
  name: string;
  description?: string;
  parameters: ToolParameterSchema<TInput>;
  execute: (input: TInput, context: ToolContext) => Promise<TOutput> | TOutput;
}

export type ExecutionResult =
  | {
      ok: true;
      output: unknown;
    }
  | {
      ok: false;
      error: ToolFailure;
      output?: unknown;
    };

export interface ShellToolPolicy {
  allowCommandPrefixes?: string[];
  denyCommandPrefixes?: string[];
  timeoutMs?: number;
  maxOutputBytes?: number;
}

export interface BuiltInToolFactoryParams {
  shellPolicy?: ShellToolPolicy;
  maxReadBytes?: number;
}

export type ToolSkipReason =
  | "import_error"
  | "invalid_shape"
  | "name_collision"
  | "duplicate_custom_name";

export interface ToolSkipDiagnostic {
  filePath: string;
  reason: ToolSkipReason;
  message: string;
  toolName?: string;
}

export interface ToolRegistryDiagnostics {
  loadedBuiltInCount: number;
  loadedCustomCount: number;
  skipped: ToolSkipDiagnostic[];
}
