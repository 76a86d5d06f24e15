import { chmod, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { hasErrnoCode } from "../nodePrimitives.js";

/** Mode applied to generated shell scripts. */
export const EXECUTABLE_MODE = 0o755;

/** Minimal description of a directory entry. */
export interface DirectoryEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

/**
 * Narrow abstraction over the filesystem calls the pipelines perform on
 * behalf of the operator: script generation, directory listing and clean-up.
 * Tests inject doubles to simulate failures that are hard to provoke on a
 * real filesystem.
 */
export interface FileSystemGateway {
  /** Persists UTF-8 encoded text at the provided path. */
  writeFileUtf8(file: string, data: string): Promise<void>;
  /** Writes {@link data} and marks the file executable. */
  writeExecutable(file: string, data: string): Promise<void>;
  /** Reads UTF-8 text, returning `null` when the file is missing. */
  readFileUtf8(file: string): Promise<string | null>;
  /** True when {@link file} exists and is a regular file. */
  isFile(file: string): Promise<boolean>;
  /** Lists {@link directory}; a missing directory yields an empty list. */
  listEntries(directory: string): Promise<DirectoryEntry[]>;
  /** Recursively removes {@link target}; missing targets are ignored. */
  removeTree(target: string): Promise<void>;
  /** Creates a fresh directory under the system temporary directory. */
  createTempDirectory(prefix: string): Promise<string>;
}

/** Default implementation relying on the promise-based Node.js API. */
export const defaultFileSystemGateway: FileSystemGateway = {
  async writeFileUtf8(file: string, data: string): Promise<void> {
    await writeFile(file, data, "utf8");
  },

  async writeExecutable(file: string, data: string): Promise<void> {
    await writeFile(file, data, { encoding: "utf8", mode: EXECUTABLE_MODE });
    // `mode` is ignored when the file already exists and is filtered by umask.
    await chmod(file, EXECUTABLE_MODE);
  },

  async readFileUtf8(file: string): Promise<string | null> {
    try {
      return await readFile(file, "utf8");
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
  },

  async isFile(file: string): Promise<boolean> {
    try {
      return (await stat(file)).isFile();
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT") || hasErrnoCode(error, "ENOTDIR")) {
        return false;
      }
      throw error;
    }
  },

  async listEntries(directory: string): Promise<DirectoryEntry[]> {
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
      }));
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT") || hasErrnoCode(error, "ENOTDIR")) {
        return [];
      }
      throw error;
    }
  },

  async removeTree(target: string): Promise<void> {
    await rm(target, { recursive: true, force: true });
  },

  async createTempDirectory(prefix: string): Promise<string> {
    return mkdtemp(path.join(tmpdir(), prefix));
  },
};
