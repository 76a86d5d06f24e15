import path from "node:path";

import { UsageError } from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import type { FmriprepEnvironment } from "./environment.js";

/**
 * BIDS participant label of a `STUDY_SITE_SUBJECT_TIMEPOINT` id:
 * `SPN01_CMH_0001_01` → `sub-CMH0001`.
 */
export function toBidsSubject(subject: string): string {
  const fields = subject.split("_");
  if (!hasBidsLabel(subject)) {
    throw new UsageError(`${subject} is not a STUDY_SITE_SUBJECT_TIMEPOINT subject id.`, { subject });
  }
  return `sub-${fields[1]}${fields[fields.length - 2]}`;
}

/** True when {@link subject} has the fields {@link toBidsSubject} needs. */
export function hasBidsLabel(subject: string): boolean {
  const fields = subject.split("_");
  return fields.length >= 3 && fields.every((field) => field.length > 0);
}

export interface JobScriptSettings {
  readonly image: string;
  readonly env: FmriprepEnvironment;
  readonly subject: string;
  readonly license: string;
}

/**
 * Renders the queue job running fMRIPrep for one subject. The job works in a
 * throw-away `$HOME` that is removed on exit, successful or not.
 */
export function renderJobScript(settings: JobScriptSettings): string {
  return [
    "#!/bin/bash",
    "",
    "function cleanup(){",
    "    rm -rf $HOME",
    "}",
    "",
    "HOME=$(mktemp -d /tmp/home.XXXXX)",
    "WORK=$(mktemp -d $HOME/work.XXXXX)",
    "LICENSE=$(mktemp -d $HOME/li.XXXXX)",
    `BIDS=${settings.env.bids}`,
    `SIMG=${settings.image}`,
    `SUB=${toBidsSubject(settings.subject)}`,
    `OUT=${settings.env.out}`,
    "",
    `cp ${settings.license} $LICENSE/license.txt`,
    "",
    "trap cleanup EXIT",
    "singularity run -H $HOME -B $BIDS:/bids -B $WORK:/work -B $OUT:/out -B $LICENSE:/li \\",
    "$SIMG -vvv \\",
    "/bids /out \\",
    "participant --participant-label $SUB \\",
    "--fs-license-file /li/license.txt",
    "",
    "cleanup",
    "",
  ].join("\n");
}

/** Temporary job file; {@link directory} is removed with it. */
export interface JobFile {
  readonly path: string;
  readonly directory: string;
}

/** Writes {@link content} to a fresh executable `<subject>_fmriprep_job` file. */
export async function writeJobScript(
  subject: string,
  content: string,
  logger: StructuredLogger,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<JobFile> {
  const directory = await fs.createTempDirectory("mriq-fmriprep-");
  const file = path.join(directory, `${path.basename(subject)}_fmriprep_job`);
  await fs.writeExecutable(file, content);
  logger.debug("job_script_written", { subject, file });
  return { path: file, directory };
}
