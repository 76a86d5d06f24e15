import path from "node:path";

import type { StudyConfig } from "../config/studies.js";
import { ReconCleanupError } from "../errors.js";
import type { CommandRunner } from "../gateways/commandRunner.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { ensureDirectory, isDirectory, resolveWithin } from "../paths.js";

/** Directories mounted into the fMRIPrep container for one subject. */
export interface FmriprepEnvironment {
  /** `<outDir>/<subject>`, mounted as `/out`. */
  readonly out: string;
  /** Study BIDS tree, mounted as `/bids`. */
  readonly bids: string;
}

/** Subjects found in the study's NIfTI directory, phantoms excluded, sorted. */
export async function listProjectSubjects(
  niiDir: string,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<string[]> {
  return (await fs.listEntries(niiDir))
    .filter((entry) => entry.isDirectory && !entry.name.includes("PHA"))
    .map((entry) => entry.name)
    .sort();
}

/** Drops subjects that already have a `<outDir>/<subject>/fmriprep` directory. */
export async function filterProcessed(subjects: readonly string[], outDir: string): Promise<string[]> {
  const pending: string[] = [];
  for (const subject of subjects) {
    if (!(await isDirectory(resolveWithin(outDir, subject, "fmriprep")))) {
      pending.push(subject);
    }
  }
  return pending;
}

/**
 * Creates the subject output directory (left alone in dry-run mode) and
 * returns the container mounts.
 */
export async function initializeEnvironment(
  study: StudyConfig,
  subject: string,
  outDir: string,
  logger: StructuredLogger,
  dryRun = false,
): Promise<FmriprepEnvironment> {
  const out = resolveWithin(outDir, subject);
  if (await isDirectory(out)) {
    logger.info("fmriprep_output_exists", { subject, out });
  } else if (!dryRun) {
    await ensureDirectory(out);
  }
  return { out, bids: path.join(study.getPath("data"), "bids") };
}

export interface FetchReconDeps {
  readonly runner: CommandRunner;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
  /** Only log the planned copy; nothing is created on disk. */
  readonly dryRun?: boolean;
}

/**
 * Copies the subject's FreeSurfer reconstruction into `<subOut>/freesurfer`
 * so fMRIPrep detects it and skips recon-all. A failed copy is not fatal:
 * the partial copy is removed and fMRIPrep reconstructs the subject itself.
 *
 * @returns whether a reconstruction was copied (never in dry-run mode).
 */
export async function fetchFsRecon(
  study: StudyConfig,
  subject: string,
  subOutDir: string,
  deps: FetchReconDeps,
): Promise<boolean> {
  const { runner, logger } = deps;
  const fs = deps.fs ?? defaultFileSystemGateway;
  const reconDir = resolveWithin(study.getStudyBase(), "pipelines", "freesurfer", subject);
  if (!(await isDirectory(reconDir))) {
    logger.debug("fs_recon_missing", { subject, recon: reconDir });
    return false;
  }

  const plannedTarget = path.join(subOutDir, "freesurfer");
  if (deps.dryRun) {
    logger.info("fs_recon_copy_planned", { subject, source: reconDir, target: plannedTarget });
    return false;
  }
  const target = await ensureDirectory(plannedTarget);
  logger.info("fs_recon_copy", { subject, source: reconDir, target });

  const result = await runner.run({
    command: "rsync",
    args: ["-a", reconDir, target],
    description: `copy of the FreeSurfer reconstruction of ${subject}`,
  });
  if (result.status === 0) {
    logger.info("fs_recon_copied", { subject, target });
    return true;
  }

  logger.error("fs_recon_copy_failed", { subject, status: result.status, stderr: result.stderr });
  logger.warn("fmriprep_runs_recon_all", { subject, message: "fmriprep will run recon-all!" });
  try {
    await fs.removeTree(target);
  } catch (error) {
    throw new ReconCleanupError(target, subject, error instanceof Error ? error.message : String(error));
  }
  logger.info("fs_recon_cleaned", { subject, target });
  return false;
}
