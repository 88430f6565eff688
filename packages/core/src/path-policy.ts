import fs from "node:fs";
import path from "node:path";

export interface ResolvedWorkspacePath {
  absolute: string;
  relative: string;
}

export type ContainedPathResult =
  | {
      ok: true;
      path: ResolvedWorkspacePath;
    }
  | {
      ok: false;
      requestedPath: string;
      absolute: string;
    };

export function canonicalizePath(value: string): string {
  const resolved = path.resolve(value);
  let current = resolved;

  while (true) {
    try {
      const real = fs.realpathSync.native(current);
      if (current === resolved) {
        return real;
      }
      const suffix = path.relative(current, resolved);
      return path.join(real, suffix);
    } catch {
      const parent = path.dirname(current);
      if (parent === current) {
        return resolved;
      }
      current = parent;
    }
  }
}

export function isWithinRoot(targetPath: string, rootPath: string): boolean {
  const target = canonicalizePath(targetPath);
  const root = canonicalizePath(rootPath);
  const relative = path.relative(root, target);
  if (relative === "") {
    return true;
  }
  const leavesRoot = relative === ".." || relative.startsWith(`..${path.sep}`);
  return !leavesRoot && !path.isAbsolute(relative);
}

/**
 * Resolves a model-supplied path against the working directory and refuses
 * anything that lands outside it: `..` traversal, absolute paths elsewhere,
 * and symlinks whose target leaves the root.
 */
export function resolveContainedPath(workspaceDir: string, requestedPath: string): ContainedPathResult {
  const workspaceRoot = canonicalizePath(workspaceDir);
  const absolute = canonicalizePath(path.resolve(workspaceRoot, requestedPath));

  if (!isWithinRoot(absolute, workspaceRoot)) {
    return {
      ok: false,
      requestedPath,
      absolute
    };
  }

  const relative = path.relative(workspaceRoot, absolute);
  return {
    ok: true,
    path: {
      absolute,
      relative: relative.length > 0 ? relative.split(path.sep).join("/") : "."
    }
  };
}
