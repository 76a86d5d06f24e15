import path from "node:path";

import { resolveStudy, type StudyRegistry } from "../config/studies.js";
import type { CommandRunner } from "../gateways/commandRunner.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { makeQsubCommand, submit } from "../queue/submission.js";
import { runBidsConversion } from "./bids.js";
import { fetchFsRecon, filterProcessed, initializeEnvironment, listProjectSubjects } from "./environment.js";
import { hasBidsLabel, renderJobScript, writeJobScript, type JobFile } from "./jobScript.js";
import { FMRIPREP_DEFAULTS, type FmriprepOptions } from "./options.js";

export interface FmriprepRunDeps {
  readonly logger: StructuredLogger;
  readonly runner: CommandRunner;
  readonly registry: StudyRegistry;
  readonly fs?: FileSystemGateway;
  readonly qsubBin?: string;
  /** Environment-provided fallbacks, used when the flags are absent. */
  readonly defaults?: { readonly singularityImage?: string | null; readonly fsLicense?: string | null };
}

export interface FmriprepRunReport {
  readonly outDir: string;
  readonly submitted: readonly string[];
  /** Subjects left alone because their fMRIPrep outputs exist. */
  readonly skippedProcessed: readonly string[];
  /** Subjects whose FreeSurfer reconstruction was copied beside the outputs. */
  readonly reconCopied: readonly string[];
}

export interface SubmitJobFileDeps {
  readonly runner: CommandRunner;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
  readonly qsubBin?: string;
}

/**
 * Submits the job file with `qsub -V` and removes it once queued. A failed
 * submission keeps the file so the operator can inspect it.
 */
export async function submitJobFile(jobFile: JobFile, deps: SubmitJobFileDeps): Promise<void> {
  const fs = deps.fs ?? defaultFileSystemGateway;
  await submit(deps.runner, makeQsubCommand(jobFile.path, deps.qsubBin), deps.logger);
  await fs.removeTree(jobFile.directory);
  deps.logger.debug("job_file_removed", { file: jobFile.path });
}

/**
 * Queues one fMRIPrep container run per subject of the study. Subjects come
 * from the command line or, when none is given, from the study NIfTI folder.
 */
export async function runFmriprep(options: FmriprepOptions, deps: FmriprepRunDeps): Promise<FmriprepRunReport> {
  const { logger, runner } = deps;
  const fs = deps.fs ?? defaultFileSystemGateway;
  const study = resolveStudy(deps.registry, options.study);

  const image = options.singularityImage ?? deps.defaults?.singularityImage ?? FMRIPREP_DEFAULTS.singularityImage;
  const license = options.fsLicense ?? deps.defaults?.fsLicense ?? FMRIPREP_DEFAULTS.fsLicense;
  const outDir = path.resolve(options.outDir ?? path.join(study.getStudyBase(), "pipelines", "fmriprep"));
  logger.debug("fmriprep_arguments", { ...options, image, license, outDir });

  if (options.convertBids) {
    await runBidsConversion(options.study, options.subjects, path.join(study.getPath("data"), "bids"), runner, logger);
  }

  const requested =
    options.subjects.length > 0 ? [...options.subjects] : await listProjectSubjects(study.getPath("nii"), fs);
  const candidates = requested.filter((subject) => hasBidsLabel(subject));
  const malformed = requested.filter((subject) => !hasBidsLabel(subject));
  if (malformed.length > 0) {
    logger.warn("fmriprep_malformed_subjects", { subjects: malformed });
  }
  const subjects = options.rewrite ? candidates : await filterProcessed(candidates, outDir);
  const skippedProcessed = candidates.filter((subject) => !subjects.includes(subject));
  if (skippedProcessed.length > 0) {
    logger.info("fmriprep_already_processed", { subjects: skippedProcessed });
  }

  const submitted: string[] = [];
  const reconCopied: string[] = [];
  for (const subject of subjects) {
    const env = await initializeEnvironment(study, subject, outDir, logger, options.dryRun);
    const copied =
      !options.ignoreRecon &&
      (await fetchFsRecon(study, subject, env.out, { runner, logger, fs, dryRun: options.dryRun }));
    if (copied) {
      reconCopied.push(subject);
    }

    const jobFile = await writeJobScript(subject, renderJobScript({ image, env, subject, license }), logger, fs);
    await submitJobFile(jobFile, {
      runner,
      logger,
      fs,
      ...(deps.qsubBin === undefined ? {} : { qsubBin: deps.qsubBin }),
    });
    submitted.push(subject);
  }

  logger.info("fmriprep_run_summary", {
    submitted: submitted.length,
    skipped_processed: skippedProcessed.length,
    recon_copied: reconCopied.length,
  });

  return { outDir, submitted, skippedProcessed, reconCopied };
}
