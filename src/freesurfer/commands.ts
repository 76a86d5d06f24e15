import path from "node:path";

import { shellQuote, type CommandSpec } from "../gateways/commandRunner.js";
import { resolveWithin } from "../paths.js";
import { makePipedQbatchCommand } from "../queue/submission.js";
import { formatLocalStamp } from "../utils/time.js";

/** Prefix shared by every job of one run, e.g. `FS_20151001-093000_`. */
export function jobNamePrefix(now: Date): string {
  return `FS_${formatLocalStamp(now)}_`;
}

interface FsCommandBase {
  readonly runDir: string;
  readonly scriptName: string;
  readonly jobNamePrefix: string;
  readonly logDir: string;
  readonly walltime: string;
  readonly qbatchBin?: string;
}

/** Recon job of one subject. */
export interface SubjectFsCommand extends FsCommandBase {
  readonly subject: string;
  /** Absolute paths of the T1 images, in checklist order. */
  readonly t1Paths: readonly string[];
}

/**
 * Expands the `T1_nii` cell (`a.nii.gz;b.nii.gz`) into absolute recon-all
 * inputs under `<inputDir>/<subject>/`.
 */
export function t1InputPaths(inputDir: string, subject: string, cell: string): string[] {
  return cell
    .split(";")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map((name) => resolveWithin(inputDir, subject, name));
}

/** Queues `bash -l <script> <subject> -i <t1>...` under `<prefix><subject>`. */
export function makeSubjectFsCommand(options: SubjectFsCommand): CommandSpec {
  const inputs = options.t1Paths.flatMap((t1) => ["-i", shellQuote(t1)]);
  const jobCommand = ["bash", "-l", shellQuote(path.join(options.runDir, options.scriptName)), shellQuote(options.subject), ...inputs].join(" ");
  return makePipedQbatchCommand({
    jobCommand,
    jobName: `${options.jobNamePrefix}${options.subject}`,
    logDir: options.logDir,
    walltime: options.walltime,
    cwd: options.runDir,
    ...(options.qbatchBin === undefined ? {} : { qbatchBin: options.qbatchBin }),
  });
}

/**
 * Queues the post-processing script as `<prefix>post`, held until every job
 * named `<prefix>*` of this run finished successfully.
 */
export function makePostFsCommand(options: FsCommandBase): CommandSpec {
  return makePipedQbatchCommand({
    jobCommand: `bash -l ${shellQuote(path.join(options.runDir, options.scriptName))}`,
    jobName: `${options.jobNamePrefix}post`,
    logDir: options.logDir,
    walltime: options.walltime,
    afterok: `${options.jobNamePrefix}*`,
    cwd: options.runDir,
    ...(options.qbatchBin === undefined ? {} : { qbatchBin: options.qbatchBin }),
  });
}
