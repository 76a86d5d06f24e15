/**
 * Gateway spawning the external tools the pipelines drive (queue clients,
 * rsync, BIDS conversion). Commands never go through a shell and only
 * allow-listed environment variables reach the child.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import process from "node:process";

import { PipelineError } from "../errors.js";
import { omitUndefinedEntries } from "../utils/object.js";

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. */
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  /**
   * Variables copied from {@link inheritEnv} into the child environment.
   * Without a list the whole inherited environment is forwarded.
   */
  readonly allowedEnvKeys?: readonly string[];
  /** Defaults to {@link process.env}. */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** The child is killed with SIGKILL once this many milliseconds elapsed. */
  readonly timeoutMs?: number;
}

export interface SpawnedChildProcess {
  readonly child: ChildProcess;
  /** Aborted with a {@link ChildProcessTimeoutError} when the timeout fires. */
  readonly signal: AbortSignal | undefined;
  /** Clears the timeout guard. Safe to call twice. */
  dispose(): void;
}

export class InvalidChildProcessCommandError extends PipelineError {
  constructor(command: string) {
    super(`Executable name must not be empty (got "${command}").`, "E-SPAWN-COMMAND", "check the configured executable names", {
      command,
    });
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends PipelineError {
  constructor(index: number) {
    super(`Argument ${index} contains a NUL byte.`, "E-SPAWN-ARGUMENT", "remove control characters from paths and options", {
      index,
    });
    this.name = "InvalidChildProcessArgumentError";
  }
}

export class ChildProcessTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super(`Command killed after ${timeoutMs}ms.`, "E-SPAWN-TIMEOUT", "raise MRIQ_COMMAND_TIMEOUT_MS", { timeoutMs });
    this.name = "ChildProcessTimeoutError";
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

/** The `spawn` overload the gateway calls; tests inject a recording double. */
export type SpawnImplementation = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

interface ChildProcessGatewayDeps {
  readonly spawnImpl?: SpawnImplementation;
}

export function createChildProcessGateway({ spawnImpl = nodeSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): SpawnedChildProcess {
      if (options.command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(options.command);
      }
      const args = (options.args ?? []).map((value, index) => {
        if (value.includes("\u0000")) {
          throw new InvalidChildProcessArgumentError(index);
        }
        return value;
      });

      const controller = options.timeoutMs === undefined ? undefined : new AbortController();
      const child = spawnImpl(options.command, args, {
        ...omitUndefinedEntries({ cwd: options.cwd }),
        env: pickEnv(options.allowedEnvKeys, options.inheritEnv ?? process.env),
        stdio: "pipe",
        shell: false,
      });

      let timer: NodeJS.Timeout | null = null;
      if (controller !== undefined && options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => {
          controller.abort(new ChildProcessTimeoutError(timeoutMs));
          if (!child.killed) {
            child.kill("SIGKILL");
          }
        }, timeoutMs);
        timer.unref();
      }

      const dispose = () => {
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
      };
      child.once("error", dispose);
      child.once("close", dispose);

      return { child, signal: controller?.signal, dispose };
    },
  };
}

function pickEnv(allowedKeys: readonly string[] | undefined, source: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  if (allowedKeys === undefined) {
    return { ...source };
  }
  const env: NodeJS.ProcessEnv = {};
  for (const key of new Set(allowedKeys)) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
