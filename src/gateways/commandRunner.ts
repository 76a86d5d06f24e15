import type { Readable } from "node:stream";

import { CommandFailedError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { omitUndefinedEntries } from "../utils/object.js";
import type { ChildProcessGateway } from "./childProcess.js";

/** Description of one external command invocation. */
export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
  /** Line echoed to the command's stdin (a trailing newline is added). */
  readonly input?: string;
  readonly cwd?: string;
  /** Human-readable label used in logs and failures. */
  readonly description: string;
}

export interface CommandResult {
  readonly status: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;
  /** True when the command was only logged because of dry-run mode. */
  readonly dryRun: boolean;
}

export interface CommandRunner {
  /** Runs the command to completion; a non-zero status is returned, not thrown. */
  run(spec: CommandSpec): Promise<CommandResult>;
  /** Runs the command and raises {@link CommandFailedError} on a non-zero status. */
  runChecked(spec: CommandSpec): Promise<CommandResult>;
}

export interface CommandRunnerOptions {
  readonly gateway: ChildProcessGateway;
  readonly logger: StructuredLogger;
  /** Restricts the spawned environment; everything is forwarded when absent. */
  readonly allowedEnvKeys?: readonly string[];
  /** Environment the commands inherit (defaults to `process.env`). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  readonly dryRun?: boolean;
  readonly timeoutMs?: number;
}

const SHELL_SAFE = /^[A-Za-z0-9_\-.,:/=@%+]+$/;

/** Quotes {@link value} for display in a POSIX shell. */
export function shellQuote(value: string): string {
  if (value.length > 0 && SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders the shell equivalent of {@link spec}. Commands fed through stdin are
 * shown as `echo <input> | <command>`, the form operators paste into a
 * terminal to reproduce a submission.
 */
export function renderCommandLine(spec: Pick<CommandSpec, "command" | "args" | "input">): string {
  const invocation = [spec.command, ...spec.args].map(shellQuote).join(" ");
  if (spec.input === undefined) {
    return invocation;
  }
  return `echo ${shellQuote(spec.input)} | ${invocation}`;
}

function collect(stream: Readable | null, chunks: string[]): void {
  if (!stream) {
    return;
  }
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    chunks.push(chunk);
  });
}

export function createCommandRunner(options: CommandRunnerOptions): CommandRunner {
  const { gateway, logger } = options;
  const dryRun = options.dryRun ?? false;

  async function run(spec: CommandSpec): Promise<CommandResult> {
    const rendered = renderCommandLine(spec);
    if (dryRun) {
      logger.info("command_dry_run", { description: spec.description, command: rendered, cwd: spec.cwd ?? null });
      return { status: 0, signal: null, stdout: "", stderr: "", dryRun: true };
    }

    logger.debug("command_start", { description: spec.description, command: rendered, cwd: spec.cwd ?? null });
    const handle = gateway.spawn({
      command: spec.command,
      args: spec.args,
      ...omitUndefinedEntries({
        cwd: spec.cwd,
        timeoutMs: options.timeoutMs,
        allowedEnvKeys: options.allowedEnvKeys,
        inheritEnv: options.inheritEnv,
      }),
    });

    const stdout: string[] = [];
    const stderr: string[] = [];
    const { child } = handle;

    const completion = new Promise<{ status: number | null; signal: string | null }>((resolve, reject) => {
      child.once("error", (error: Error) => {
        handle.dispose();
        reject(handle.signal?.aborted ? handle.signal.reason : error);
      });
      child.once("close", (status: number | null, signal: NodeJS.Signals | null) => {
        handle.dispose();
        if (handle.signal?.aborted) {
          reject(handle.signal.reason);
          return;
        }
        resolve({ status, signal });
      });
    });

    collect(child.stdout, stdout);
    collect(child.stderr, stderr);
    if (child.stdin) {
      child.stdin.on("error", (error: Error) => {
        logger.debug("command_stdin_error", { description: spec.description, message: error.message });
      });
      child.stdin.end(spec.input === undefined ? "" : `${spec.input}\n`);
    }

    const outcome = await completion;
    const result: CommandResult = {
      status: outcome.status,
      signal: outcome.signal,
      stdout: stdout.join(""),
      stderr: stderr.join(""),
      dryRun: false,
    };
    logger.debug("command_finished", {
      description: spec.description,
      status: result.status,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
    });
    return result;
  }

  return {
    run,
    async runChecked(spec: CommandSpec): Promise<CommandResult> {
      const result = await run(spec);
      if (result.status !== 0) {
        throw new CommandFailedError(`${spec.description} failed`, renderCommandLine(spec), result.status, result.stderr);
      }
      return result;
    },
  };
}
