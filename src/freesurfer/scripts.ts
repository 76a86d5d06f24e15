import { RunScriptMismatchError } from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { resolveWithin } from "../paths.js";
import { diffLines } from "../utils/textDiff.js";

export const POST_SCRIPT_NAME = "postfreesurfer.sh";

/**
 * Names of the run scripts needed for this invocation, recon script first.
 * `--run-version` lets several recon configurations share one subjects
 * directory; the post script is shared by all of them.
 */
export function getRunScriptNames(runTag: string | undefined, postOnly: boolean, noPost: boolean): string[] {
  const reconName = runTag === undefined ? "run_freesurfer.sh" : `run_freesurfer_${runTag}.sh`;
  if (postOnly) {
    return [POST_SCRIPT_NAME];
  }
  if (noPost) {
    return [reconName];
  }
  return [reconName, POST_SCRIPT_NAME];
}

export interface RunScriptSettings {
  /** Absolute FreeSurfer SUBJECTS_DIR. */
  readonly subjectsDir: string;
  readonly fsOption?: string;
  /** Subject id prefix handed to the ENIGMA extraction. */
  readonly prefix: string;
}

export function isPostScript(name: string): boolean {
  return name.includes("postfreesurfer");
}

/** Renders the content of the run script called {@link name}. */
export function renderRunScript(name: string, settings: RunScriptSettings): string {
  const lines = [
    "#!/bin/bash",
    "",
    `export SUBJECTS_DIR=${settings.subjectsDir}`,
    "",
    "## Prints loaded modules to the log",
    "module list",
    "",
  ];

  if (isPostScript(name)) {
    lines.push(
      `ENIGMA_ExtractCortical.sh \${SUBJECTS_DIR} ${settings.prefix}`,
      `ENIGMA_ExtractSubcortical.sh \${SUBJECTS_DIR} ${settings.prefix}`,
    );
  } else {
    const option = settings.fsOption === undefined ? "" : `${settings.fsOption} `;
    lines.push(
      "SUBJECT=${1}",
      "shift",
      "T1MAPS=${@}",
      "",
      `recon-all -all ${option}-subjid \${SUBJECT} \${T1MAPS} -qcache`,
    );
  }

  return `${lines.join("\n")}\n`;
}

export interface RunScriptOutcome {
  readonly name: string;
  readonly path: string;
  readonly status: "written" | "reused";
}

export interface WriteRunScriptsDeps {
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
}

/**
 * Writes each run script that does not exist yet. An existing script is
 * reused verbatim when it matches what these settings would produce;
 * otherwise the run stops with {@link RunScriptMismatchError} so one subjects
 * directory never mixes outputs of different recon settings.
 */
export async function writeRunScripts(
  names: readonly string[],
  runDir: string,
  settings: RunScriptSettings,
  deps: WriteRunScriptsDeps,
): Promise<RunScriptOutcome[]> {
  const fs = deps.fs ?? defaultFileSystemGateway;
  const outcomes: RunScriptOutcome[] = [];

  for (const name of names) {
    const scriptPath = resolveWithin(runDir, name);
    const expected = renderRunScript(name, settings);
    const existing = await fs.readFileUtf8(scriptPath);

    if (existing === null) {
      await fs.writeExecutable(scriptPath, expected);
      deps.logger.info("run_script_written", { script: scriptPath });
      outcomes.push({ name, path: scriptPath, status: "written" });
      continue;
    }

    if (existing === expected) {
      deps.logger.debug("run_script_reused", { script: scriptPath });
      outcomes.push({ name, path: scriptPath, status: "reused" });
      continue;
    }

    const diff = diffLines(existing, expected);
    deps.logger.debug("run_script_differences", {
      script: scriptPath,
      legend: "lines marked (+) come from this run, (-) from the existing script",
      diff,
    });
    throw new RunScriptMismatchError(scriptPath, diff);
  }

  return outcomes;
}
