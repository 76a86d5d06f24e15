import path from "node:path";

import {
  addNewSubjects,
  FREESURFER_CHECKLIST_COLUMNS,
  getCell,
  loadChecklist,
  saveChecklist,
  withCell,
  withNote,
  type ChecklistRow,
} from "../checklist/checklist.js";
import { findImages } from "../checklist/images.js";
import { getSubjectList } from "../checklist/subjects.js";
import { NothingToProcessError, UsageError } from "../errors.js";
import type { CommandRunner } from "../gateways/commandRunner.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { ensureDirectory } from "../paths.js";
import { submit } from "../queue/submission.js";
import { formatLocalDate } from "../utils/time.js";
import { jobNamePrefix, makePostFsCommand, makeSubjectFsCommand, t1InputPaths } from "./commands.js";
import type { FreesurferOptions } from "./options.js";
import { getRunScriptNames, writeRunScripts, type RunScriptOutcome } from "./scripts.js";
import { findHaltedMarker, subjectPreviouslyCompleted } from "./status.js";

export const FREESURFER_CHECKLIST_NAME = "freesurfer-checklist.csv";

export interface FreesurferRunDeps {
  readonly logger: StructuredLogger;
  readonly runner: CommandRunner;
  readonly fs?: FileSystemGateway;
  readonly now?: () => Date;
  readonly qbatchBin?: string;
}

export interface FreesurferRunReport {
  readonly checklistFile: string;
  readonly scripts: readonly RunScriptOutcome[];
  /** Subjects whose recon job was queued. */
  readonly submitted: readonly string[];
  /** Subjects already carrying `recon-all.done`. */
  readonly completed: readonly string[];
  /** Subjects left with an `IsRunning*` lock. */
  readonly halted: readonly string[];
  /** Subjects without a T1 selected in the checklist. */
  readonly missingImage: readonly string[];
  readonly postJobSubmitted: boolean;
  /** False in dry-run mode, where the checklist is left untouched. */
  readonly checklistSaved: boolean;
}

/** Rejects `--no-postFS` combined with `--postFS-only`. */
export function assertPostSettings(noPost: boolean, postOnly: boolean): void {
  if (noPost && postOnly) {
    throw new UsageError("--no-postFS and --postFS-only cannot both be set.");
  }
}

/**
 * Queues recon-all for every subject of the checklist that has a T1 selected
 * and no finished or halted run, then queues the ENIGMA extraction held on
 * those jobs. The checklist is updated with the submission date and notes.
 */
export async function runFreesurfer(options: FreesurferOptions, deps: FreesurferRunDeps): Promise<FreesurferRunReport> {
  const { logger, runner } = deps;
  const fs = deps.fs ?? defaultFileSystemGateway;
  const now = deps.now ?? (() => new Date());

  assertPostSettings(options.noPost, options.postOnly);

  const inputDir = path.resolve(options.inputDir);
  const subjectsDir = path.resolve(options.subjectsDir);
  const logDir = await ensureDirectory(path.join(subjectsDir, "logs"));
  const runDir = await ensureDirectory(path.join(subjectsDir, "bin"));
  logger.debug("freesurfer_arguments", { ...options, inputDir, subjectsDir });

  const subjects = await getSubjectList(inputDir, {
    fs,
    ...(options.tag2 === undefined ? {} : { subjectFilter: options.tag2 }),
    ...(options.qcFile === undefined ? {} : { qcFile: options.qcFile }),
  });
  if (subjects.length === 0) {
    throw new NothingToProcessError("No outstanding scans to process.", { inputDir });
  }

  const prefix = options.prefix ?? subjects[0].slice(0, 3);
  const scriptNames = getRunScriptNames(options.runVersion, options.postOnly, options.noPost);
  const scripts = await writeRunScripts(
    scriptNames,
    runDir,
    {
      subjectsDir,
      prefix,
      ...(options.fsOption === undefined ? {} : { fsOption: options.fsOption }),
    },
    { logger, fs },
  );

  const checklistFile = path.join(subjectsDir, FREESURFER_CHECKLIST_NAME);
  let checklist = await loadChecklist(checklistFile, FREESURFER_CHECKLIST_COLUMNS, fs);
  checklist = addNewSubjects(subjects, checklist);
  checklist = await findImages(checklist, "T1_nii", inputDir, options.t1Tag, {
    fs,
    allowMultiple: options.multipleInputs,
    ...(options.tag2 === undefined ? {} : { subjectFilter: options.tag2 }),
  });

  const prefixForJobs = jobNamePrefix(now());
  const today = formatLocalDate(now());
  const submitted: string[] = [];
  const completed: string[] = [];
  const halted: string[] = [];
  const missingImage: string[] = [];
  const rows: ChecklistRow[] = [];

  // Rows already visited come first; on failure the untouched tail is kept
  // as loaded so earlier submissions still get their date recorded.
  const persist = async (): Promise<void> => {
    if (options.dryRun) {
      return;
    }
    await saveChecklist(checklistFile, { columns: checklist.columns, rows: [...rows, ...checklist.rows.slice(rows.length)] }, fs);
  };

  let postJobSubmitted = false;
  try {
    for (const row of checklist.rows) {
      if (options.postOnly) {
        rows.push(row);
        continue;
      }

      const subject = getCell(row, "id");
      const t1Cell = getCell(row, "T1_nii").trim();
      if (options.tag2 !== undefined && !subject.includes(options.tag2)) {
        rows.push(row);
        continue;
      }
      if (t1Cell.length === 0) {
        missingImage.push(subject);
        rows.push(row);
        continue;
      }
      if (await subjectPreviouslyCompleted(subjectsDir, subject, fs)) {
        completed.push(subject);
        rows.push(row);
        continue;
      }

      const marker = await findHaltedMarker(subjectsDir, subject, fs);
      if (marker !== null) {
        logger.warn("freesurfer_subject_halted", { subject, marker });
        halted.push(subject);
        rows.push(withNote(row, `FS halted at ${path.basename(marker)}`));
        continue;
      }

      const command = makeSubjectFsCommand({
        runDir,
        scriptName: scriptNames[0],
        jobNamePrefix: prefixForJobs,
        logDir,
        walltime: options.walltime,
        subject,
        t1Paths: t1InputPaths(inputDir, subject, t1Cell),
        ...(deps.qbatchBin === undefined ? {} : { qbatchBin: deps.qbatchBin }),
      });
      await submit(runner, command, logger);
      submitted.push(subject);
      rows.push(withCell(row, "date_ran", today));
    }

    const postScript = options.postOnly ? scriptNames[0] : scriptNames[1];
    if (postScript !== undefined && (options.postOnly || submitted.length > 0)) {
      const command = makePostFsCommand({
        runDir,
        scriptName: postScript,
        jobNamePrefix: prefixForJobs,
        logDir,
        walltime: options.walltimePost,
        ...(deps.qbatchBin === undefined ? {} : { qbatchBin: deps.qbatchBin }),
      });
      await submit(runner, command, logger);
      postJobSubmitted = true;
    }
  } catch (error) {
    try {
      await persist();
    } catch (saveError) {
      logger.error("checklist_save_failed", {
        checklist: checklistFile,
        message: saveError instanceof Error ? saveError.message : String(saveError),
      });
    }
    throw error;
  }
  await persist();

  logger.info("freesurfer_run_summary", {
    submitted: submitted.length,
    completed: completed.length,
    halted: halted.length,
    missing_image: missingImage.length,
    post_job: postJobSubmitted,
  });

  return {
    checklistFile,
    scripts,
    submitted,
    completed,
    halted,
    missingImage,
    postJobSubmitted,
    checklistSaved: !options.dryRun,
  };
}
