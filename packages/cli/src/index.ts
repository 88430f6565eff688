export { loadCliConfig, loadProjectEnvFiles, findConfigFile, CONFIG_CANDIDATES } from "./config.js";
export type { LoadedCliConfig } from "./config.js";
export { parseLocalCommand, runLocalCommand, COMMAND_HELP } from "./commands.js";
export type { LocalCommand } from "./commands.js";
export { renderAgentEvent, renderModels, renderOutcome, renderRunningModels } from "./render.js";
export { reportObservabilityFailure, runStartLoop } from "./start.js";
