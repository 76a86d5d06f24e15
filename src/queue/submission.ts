import { UsageError } from "../errors.js";
import type { CommandRunner, CommandSpec } from "../gateways/commandRunner.js";
import type { StructuredLogger } from "../logger.js";

/**
 * Walltime accepted by the queue clients: `[[DD:]HH:]MM:SS` with one or two
 * digits per field, e.g. `24:00:00`, `2:00:00` or `1:12:00:00`.
 */
const WALLTIME_PATTERN = /^(?:(?:\d{1,2}:)?\d{1,3}:)?\d{1,2}:\d{2}$/;

/** Returns {@link value} unchanged when it is a valid walltime; throws otherwise. */
export function validateWalltime(value: string, flag = "--walltime"): string {
  const trimmed = value.trim();
  if (!WALLTIME_PATTERN.test(trimmed)) {
    throw new UsageError(`${flag} expects a walltime such as 24:00:00, received '${value}'`, { flag, value });
  }
  return trimmed;
}

export interface PipedQbatchOptions {
  /** Shell command executed by the queued job. */
  readonly jobCommand: string;
  readonly jobName: string;
  readonly logDir: string;
  readonly walltime: string;
  /** Job name pattern the new job waits on (successful completion). */
  readonly afterok?: string;
  /** Executable name of the qbatch client. */
  readonly qbatchBin?: string;
  /** Working directory the job is submitted from. */
  readonly cwd?: string;
}

/**
 * Builds the equivalent of `echo <jobCommand> | qbatch -N <name> --logdir <dir>
 * --walltime <time> [--afterok <pattern>] -`. The job command travels on
 * stdin, which is how qbatch reads a job list named `-`.
 */
export function makePipedQbatchCommand(options: PipedQbatchOptions): CommandSpec {
  const args = ["-N", options.jobName, "--logdir", options.logDir, "--walltime", options.walltime];
  if (options.afterok !== undefined) {
    args.push("--afterok", options.afterok);
  }
  args.push("-");
  return {
    command: options.qbatchBin ?? "qbatch",
    args,
    input: options.jobCommand,
    description: `qbatch submission of ${options.jobName}`,
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
  };
}

/** Builds `qsub -V <jobFile>`, exporting the caller's environment to the job. */
export function makeQsubCommand(jobFile: string, qsubBin = "qsub"): CommandSpec {
  return {
    command: qsubBin,
    args: ["-V", jobFile],
    description: `qsub submission of ${jobFile}`,
  };
}

/**
 * Hands a prepared submission to the queue. Failures surface as
 * `CommandFailedError` and stop the run.
 */
export async function submit(runner: CommandRunner, command: CommandSpec, logger: StructuredLogger): Promise<void> {
  const result = await runner.runChecked(command);
  if (!result.dryRun) {
    logger.info("job_submitted", { description: command.description, output: result.stdout.trim() });
  }
}
