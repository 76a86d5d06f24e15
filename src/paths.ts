import { mkdir, stat } from "node:fs/promises";
import path from "node:path";

import { PipelineError } from "./errors.js";
import { hasErrnoCode } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Raised when a subject identifier or image name would resolve outside of the
 * directory it belongs to (for instance a checklist cell edited to `../x`).
 */
export class PathResolutionError extends PipelineError {
  /** Absolute path that the caller attempted to access. */
  public readonly attemptedPath: string;
  /** Base directory configured for the operation. */
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string, extras: { relative?: string } = {}) {
    super(message, "E-PATHS-ESCAPE", "keep subject ids and image names within their directory", {
      attemptedPath,
      rootDirectory,
      ...extras,
    });
    this.name = "PathResolutionError";
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathResolutionError("path escapes base directory", targetPath, absoluteRoot, { relative });
  }

  return targetPath;
}

/** Creates {@link directory} (and its parents) when missing and returns it. */
export async function ensureDirectory(directory: string): Promise<string> {
  const absolute = path.resolve(directory);
  await mkdir(absolute, { recursive: true });
  return absolute;
}

async function statOrNull(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT") || hasErrnoCode(error, "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

/** True when {@link target} exists and is a directory. */
export async function isDirectory(target: string): Promise<boolean> {
  const stats = await statOrNull(target);
  return stats !== null && stats.isDirectory();
}
