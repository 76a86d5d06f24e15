import { parseArgv, type FlagSpec } from "../cli/argv.js";
import { verbosityFromSwitches, type Verbosity } from "../cli/verbosity.js";
import { UsageError } from "../errors.js";

/** Options accepted by `proc-fmriprep`. */
export interface FmriprepOptions {
  /** Study nickname looked up in the registry. */
  readonly study: string;
  /** Subjects to process; empty means every subject of the study. */
  readonly subjects: readonly string[];
  readonly singularityImage?: string;
  readonly outDir?: string;
  /** Resubmit subjects that already have fMRIPrep outputs. */
  readonly rewrite: boolean;
  readonly fsLicense?: string;
  /** Let fMRIPrep run its own recon-all instead of reusing FreeSurfer outputs. */
  readonly ignoreRecon: boolean;
  /** Run `nii_to_bids.py` before submitting. */
  readonly convertBids: boolean;
  readonly verbosity: Verbosity;
  readonly dryRun: boolean;
}

export const FMRIPREP_DEFAULTS = Object.freeze({
  singularityImage: "/archive/code/containers/FMRIPREP/poldracklab_fmriprep_1.1.1-2018-06-07-2f08547a0732.img",
  fsLicense: "/opt/quarantine/freesurfer/6.0.0/build/license.txt",
});

const FLAGS: FlagSpec = {
  valueFlags: {
    "-i": "singularityImage",
    "--singularity-image": "singularityImage",
    "-o": "outDir",
    "--out-dir": "outDir",
    "-f": "fsLicense",
    "--fs-license-dir": "fsLicense",
  },
  booleanFlags: {
    "-r": "rewrite",
    "--rewrite": "rewrite",
    "--ignore-recon": "ignoreRecon",
    "--convert-bids": "convertBids",
    "-n": "dryRun",
    "--dry-run": "dryRun",
    "-q": "quiet",
    "--quiet": "quiet",
    "-v": "verbose",
    "--verbose": "verbose",
    "-d": "debug",
    "--debug": "debug",
    "-h": "help",
    "--help": "help",
  },
};

export const FMRIPREP_USAGE = `Runs the fMRIPrep minimal preprocessing pipeline on a study or on some of its subjects.

Usage:
  proc-fmriprep [options] <study> [<subjects>...]

Arguments:
  <study>                      Study nickname to be processed by fMRIPrep
  <subjects>                   Space-separated subject IDs (default: every subject of the study)

Options:
  -i, --singularity-image PATH Singularity image running fMRIPrep
                               [default: $MRIQ_FMRIPREP_IMAGE or ${FMRIPREP_DEFAULTS.singularityImage}]
  -o, --out-dir DIR            Output directory [default: <study base>/pipelines/fmriprep]
  -r, --rewrite                Resubmit subjects whose fMRIPrep outputs already exist
  -f, --fs-license-dir PATH    FreeSurfer license file
                               [default: $MRIQ_FS_LICENSE or ${FMRIPREP_DEFAULTS.fsLicense}]
  --ignore-recon               Let fMRIPrep run recon-all even if a reconstruction exists
  --convert-bids               Run nii_to_bids.py on the subjects before submitting
  -n, --dry-run                Log the queue submissions instead of running them
  -q, --quiet                  Only show errors
  -v, --verbose                Verbose logging
  -d, --debug                  Debug logging
  -h, --help                   Show this help
`;

export type FmriprepInvocation = { readonly kind: "help" } | { readonly kind: "run"; readonly options: FmriprepOptions };

function optionalPath(value: string | undefined, flag: string): string | undefined {
  if (value !== undefined && value.trim().length === 0) {
    throw new UsageError(`${flag} cannot be empty.`, { flag });
  }
  return value;
}

/** Parses `proc-fmriprep` arguments. */
export function parseFmriprepArgs(argv: readonly string[]): FmriprepInvocation {
  const parsed = parseArgv(argv, FLAGS);
  if (parsed.switches.has("help")) {
    return { kind: "help" };
  }

  const [study, ...subjects] = parsed.positionals;
  if (study === undefined || study.trim().length === 0) {
    throw new UsageError("<study> is required.");
  }

  const singularityImage = optionalPath(parsed.values.get("singularityImage"), "--singularity-image");
  const outDir = optionalPath(parsed.values.get("outDir"), "--out-dir");
  const fsLicense = optionalPath(parsed.values.get("fsLicense"), "--fs-license-dir");

  return {
    kind: "run",
    options: {
      study,
      subjects: Array.from(new Set(subjects)),
      rewrite: parsed.switches.has("rewrite"),
      ignoreRecon: parsed.switches.has("ignoreRecon"),
      convertBids: parsed.switches.has("convertBids"),
      verbosity: verbosityFromSwitches(parsed.switches),
      dryRun: parsed.switches.has("dryRun"),
      ...(singularityImage === undefined ? {} : { singularityImage }),
      ...(outDir === undefined ? {} : { outDir }),
      ...(fsLicense === undefined ? {} : { fsLicense }),
    },
  };
}
