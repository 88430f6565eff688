import path from "node:path";
import { pathToFileURL } from "node:url";
import { isRecord } from "./utils.js";

const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".mts", ".cts"]);
const MAX_UNWRAP_DEPTH = 8;

/** Imports a config or custom tool file. TypeScript sources load through tsx. */
export async function importUserModule(filePath: string): Promise<unknown> {
  const moduleUrl = pathToFileURL(filePath).href;
  if (!TYPESCRIPT_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
    return await import(moduleUrl);
  }
  const { tsImport } = await import("tsx/esm/api");
  return await tsImport(moduleUrl, { parentURL: moduleUrl });
}

function isDefaultWrapper(value: unknown): value is { default: unknown } {
  if (!isRecord(value) || value.default === undefined || value.default === value) {
    return false;
  }
  const keys = Object.keys(value).filter((key) => key !== "__esModule");
  return keys.length === 1 && keys[0] === "default";
}

/**
 * The value a loaded module offers: the first of `exportNames` it defines,
 * otherwise its default export, otherwise the namespace itself. Nested
 * `{ default }` wrappers left by CommonJS interop are peeled off.
 */
export function pickModuleExport(loaded: unknown, exportNames: readonly string[] = []): unknown {
  let current = loaded;
  if (isRecord(loaded)) {
    const named = exportNames.find((name) => loaded[name] !== undefined);
    current = named !== undefined ? loaded[named] : loaded.default ?? loaded;
  }
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH && isDefaultWrapper(current); depth += 1) {
    current = current.default;
  }
  return current;
}
