import { realpathSync } from "node:fs";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { loadPipelineEnvironment, type EnvSource, type PipelineEnvironment } from "../config/env.js";
import { isPipelineError, NothingToProcessError, UsageError } from "../errors.js";
import { createChildProcessGateway, type SpawnImplementation } from "../gateways/childProcess.js";
import { createCommandRunner, type CommandRunner } from "../gateways/commandRunner.js";
import { StructuredLogger } from "../logger.js";
import { resolveLogLevel, type Verbosity } from "./verbosity.js";

/** Options every program shares. */
export interface CommonCliOptions {
  readonly verbosity: Verbosity;
  readonly dryRun: boolean;
}

export type CliInvocation<T extends CommonCliOptions> =
  | { readonly kind: "help" }
  | { readonly kind: "run"; readonly options: T };

/** Services handed to a program once its arguments are parsed. */
export interface CliContext {
  readonly logger: StructuredLogger;
  readonly runner: CommandRunner;
  readonly environment: PipelineEnvironment;
}

export interface CliProgram<T extends CommonCliOptions> {
  readonly name: string;
  readonly usage: string;
  parse(argv: readonly string[]): CliInvocation<T>;
  run(options: T, context: CliContext): Promise<unknown>;
}

export interface CliDeps {
  readonly env?: EnvSource;
  readonly spawnImpl?: SpawnImplementation;
  /** Receives the logger JSON lines (stdout by default). */
  readonly logSink?: (line: string) => void;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
}

/**
 * Parses {@link argv}, runs {@link program} and reports the outcome. Returns
 * the process exit code instead of exiting so callers and tests decide.
 */
export async function runCli<T extends CommonCliOptions>(
  program: CliProgram<T>,
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  let invocation: CliInvocation<T>;
  try {
    invocation = program.parse(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(`${program.name}: ${error.message}\n\n${program.usage}`);
      return error.exitCode;
    }
    throw error;
  }
  if (invocation.kind === "help") {
    stdout(program.usage);
    return 0;
  }

  const { options } = invocation;
  const environment = loadPipelineEnvironment(deps.env);
  const logger = new StructuredLogger({
    logFile: environment.logFile,
    level: resolveLogLevel(options.verbosity, environment.logLevel),
    ...(deps.logSink === undefined ? {} : { sink: deps.logSink }),
  });
  const runner = createCommandRunner({
    gateway: createChildProcessGateway(deps.spawnImpl === undefined ? {} : { spawnImpl: deps.spawnImpl }),
    logger,
    inheritEnv: deps.env ?? process.env,
    ...(environment.spawnEnvKeys === null ? {} : { allowedEnvKeys: environment.spawnEnvKeys }),
    dryRun: options.dryRun,
    ...(environment.commandTimeoutMs === undefined ? {} : { timeoutMs: environment.commandTimeoutMs }),
  });

  let exitCode = 0;
  try {
    await program.run(options, { logger, runner, environment });
  } catch (error) {
    exitCode = reportFailure(logger, error);
    if (error instanceof UsageError) {
      stderr(`${program.name}: ${error.message}\n`);
    }
  }
  await logger.flush();
  return exitCode;
}

function reportFailure(logger: StructuredLogger, error: unknown): number {
  if (error instanceof NothingToProcessError) {
    logger.info("nothing_to_process", { message: error.message, ...error.details });
    return error.exitCode;
  }
  if (isPipelineError(error)) {
    logger.error("pipeline_failed", { message: error.message, code: error.code, hint: error.hint, details: error.details });
    return error.exitCode;
  }
  logger.error("unexpected_failure", {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack ?? null : null,
  });
  return 1;
}

/** True when {@link moduleUrl} is the script Node was asked to execute. */
export function isCliEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  // npm installs binaries as symlinks.
  return pathToFileURL(realpathSync(script)).href === moduleUrl;
}
