import { parseArgv, type FlagSpec } from "../cli/argv.js";
import { verbosityFromSwitches, type Verbosity } from "../cli/verbosity.js";
import { UsageError } from "../errors.js";
import { validateWalltime } from "../queue/submission.js";

/** Options accepted by `proc-freesurfer`. */
export interface FreesurferOptions {
  /** Top directory of the NIfTI inputs (one sub-directory per subject). */
  readonly inputDir: string;
  /** FreeSurfer SUBJECTS_DIR receiving the outputs, scripts and logs. */
  readonly subjectsDir: string;
  /** Do not queue the ENIGMA extraction job. */
  readonly noPost: boolean;
  /** Only queue the ENIGMA extraction job. */
  readonly postOnly: boolean;
  /** Substring identifying T1 images. */
  readonly t1Tag: string;
  /** Secondary tag restricting subjects and disambiguating images. */
  readonly tag2?: string;
  /** Pass every matching T1 to recon-all. */
  readonly multipleInputs: boolean;
  /** Extra recon-all option(s), written verbatim into the run script. */
  readonly fsOption?: string;
  /** Suffix of the recon run script, for subgroups run with other settings. */
  readonly runVersion?: string;
  /** Data-transfer QC checklist; only signed-off subjects are processed. */
  readonly qcFile?: string;
  /** Subject-id prefix handed to the ENIGMA extraction scripts. */
  readonly prefix?: string;
  readonly walltime: string;
  readonly walltimePost: string;
  readonly verbosity: Verbosity;
  readonly dryRun: boolean;
}

export const FREESURFER_DEFAULTS = Object.freeze({
  t1Tag: "_T1_",
  walltime: "24:00:00",
  walltimePost: "2:00:00",
});

const FLAGS: FlagSpec = {
  valueFlags: {
    "--T1-tag": "t1Tag",
    "--tag2": "tag2",
    "--FS-option": "fsOption",
    "--run-version": "runVersion",
    "--QC-transfer": "qcFile",
    "--prefix": "prefix",
    "--walltime": "walltime",
    "--walltime-post": "walltimePost",
  },
  booleanFlags: {
    "--no-postFS": "noPost",
    "--postFS-only": "postOnly",
    "--multiple-inputs": "multipleInputs",
    "-v": "verbose",
    "--verbose": "verbose",
    "--debug": "debug",
    "-n": "dryRun",
    "--dry-run": "dryRun",
    "-h": "help",
    "--help": "help",
  },
};

export const FREESURFER_USAGE = `Runs FreeSurfer recon-all on T1 images through the batch queue.

Usage:
  proc-freesurfer [options] <inputdir> <FS_subjectsdir>

Arguments:
  <inputdir>               Top directory for nii inputs (one folder per subject)
  <FS_subjectsdir>         Top directory for the FreeSurfer output

Options:
  --no-postFS              Do not submit the post-processing script to the queue
  --postFS-only            Only run the post-FreeSurfer analysis
  --T1-tag STR             Tag used to find the T1 files (default '${FREESURFER_DEFAULTS.t1Tag}')
  --tag2 STR               Optional second tag filtering subjects and T1 files
  --multiple-inputs        Allow multiple input T1 files per subject
  --FS-option STR          A quoted, non-default recon-all option to add
  --run-version STR        Suffix appended to run_freesurfer_<tag>.sh
  --QC-transfer QCFILE     Only process subjects signed off in this QC checklist
  --prefix STR             Subject id prefix handed to the ENIGMA extraction
  --walltime TIME          Walltime for the recon stage [default: ${FREESURFER_DEFAULTS.walltime}]
  --walltime-post TIME     Walltime for the final stage [default: ${FREESURFER_DEFAULTS.walltimePost}]
  -v, --verbose            Verbose logging
  --debug                  Debug logging
  -n, --dry-run            Log the queue submissions instead of running them
  -h, --help               Show this help
`;

export type FreesurferInvocation = { readonly kind: "help" } | { readonly kind: "run"; readonly options: FreesurferOptions };

function nonEmpty(value: string | undefined, flag: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value.trim().length === 0) {
    throw new UsageError(`${flag} cannot be empty.`, { flag });
  }
  return value;
}

/** Parses `proc-freesurfer` arguments. */
export function parseFreesurferArgs(argv: readonly string[]): FreesurferInvocation {
  const parsed = parseArgv(argv, FLAGS);
  if (parsed.switches.has("help")) {
    return { kind: "help" };
  }

  const [inputDir, subjectsDir, ...extra] = parsed.positionals;
  if (inputDir === undefined || subjectsDir === undefined) {
    throw new UsageError("Both <inputdir> and <FS_subjectsdir> are required.");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument '${extra[0]}'.`);
  }

  const tag2 = nonEmpty(parsed.values.get("tag2"), "--tag2");
  const fsOption = nonEmpty(parsed.values.get("fsOption"), "--FS-option");
  const runVersion = nonEmpty(parsed.values.get("runVersion"), "--run-version");
  const qcFile = nonEmpty(parsed.values.get("qcFile"), "--QC-transfer");
  const prefix = nonEmpty(parsed.values.get("prefix"), "--prefix");

  return {
    kind: "run",
    options: {
      inputDir,
      subjectsDir,
      noPost: parsed.switches.has("noPost"),
      postOnly: parsed.switches.has("postOnly"),
      t1Tag: nonEmpty(parsed.values.get("t1Tag"), "--T1-tag") ?? FREESURFER_DEFAULTS.t1Tag,
      multipleInputs: parsed.switches.has("multipleInputs"),
      walltime: validateWalltime(parsed.values.get("walltime") ?? FREESURFER_DEFAULTS.walltime, "--walltime"),
      walltimePost: validateWalltime(
        parsed.values.get("walltimePost") ?? FREESURFER_DEFAULTS.walltimePost,
        "--walltime-post",
      ),
      verbosity: verbosityFromSwitches(parsed.switches),
      dryRun: parsed.switches.has("dryRun"),
      ...(tag2 === undefined ? {} : { tag2 }),
      ...(fsOption === undefined ? {} : { fsOption }),
      ...(runVersion === undefined ? {} : { runVersion }),
      ...(qcFile === undefined ? {} : { qcFile }),
      ...(prefix === undefined ? {} : { prefix }),
    },
  };
}
