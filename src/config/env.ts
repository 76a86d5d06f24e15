import process from "node:process";

import { LOG_LEVELS, type LogLevel } from "../logger.js";

/**
 * Helpers reading environment variables with consistent coercion rules. Every
 * reader trims its input and treats blank values as unset.
 */
export type EnvSource = NodeJS.ProcessEnv;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Reads {@link name} as an integer, falling back to {@link defaultValue}. */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable. Comparison is case-insensitive and the
 * canonical spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

/** Splits a comma-separated variable into its non-empty, de-duplicated entries. */
export function readList(name: string, env: EnvSource = process.env): string[] {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return [];
  }
  const entries = normalised
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(entries));
}

/** Environment-level settings shared by both pipelines. */
export interface PipelineEnvironment {
  /** Optional file mirroring the JSON log lines. */
  readonly logFile: string | null;
  /** Level applied when no verbosity flag is passed. */
  readonly logLevel: LogLevel;
  /** Path of the study registry JSON document. */
  readonly studiesConfig: string | null;
  /** Singularity image overriding the built-in fMRIPrep default. */
  readonly fmriprepImage: string | null;
  /** FreeSurfer license overriding the built-in default. */
  readonly fsLicense: string | null;
  /** Executable used for piped submissions. */
  readonly qbatchBin: string;
  /** Executable used for job-file submissions. */
  readonly qsubBin: string;
  /**
   * Allow-list applied to spawned commands, or `null` to forward the whole
   * environment. `qsub -V` and `qbatch` hand that environment to the job.
   */
  readonly spawnEnvKeys: readonly string[] | null;
  /** Optional timeout applied to every external command. */
  readonly commandTimeoutMs: number | undefined;
}

/**
 * Variables kept on top of `MRIQ_SPAWN_ENV_KEYS` once an allow-list is
 * configured. The queue clients and the neuroimaging wrappers rely on the
 * module system and scheduler variables.
 */
export const BASE_SPAWN_ENV_KEYS: readonly string[] = Object.freeze([
  "PATH",
  "HOME",
  "USER",
  "LANG",
  "TMPDIR",
  "MODULEPATH",
  "LOADEDMODULES",
  "FREESURFER_HOME",
  "SUBJECTS_DIR",
  "SGE_ROOT",
  "SGE_CELL",
  "PBS_DEFAULT",
  "QBATCH_SYSTEM",
  "QBATCH_PPJ",
  "QBATCH_CHUNKSIZE",
  "QBATCH_CORES",
  "QBATCH_MEM",
  "QBATCH_QUEUE",
]);

/** Collects every `MRIQ_*` setting into a frozen snapshot. */
export function loadPipelineEnvironment(env: EnvSource = process.env): PipelineEnvironment {
  const extraKeys = readList("MRIQ_SPAWN_ENV_KEYS", env);
  return Object.freeze({
    logFile: readOptionalString("MRIQ_LOG_FILE", env) ?? null,
    logLevel: readOptionalEnum("MRIQ_LOG_LEVEL", LOG_LEVELS, env) ?? "warn",
    studiesConfig: readOptionalString("MRIQ_STUDIES_CONFIG", env) ?? null,
    fmriprepImage: readOptionalString("MRIQ_FMRIPREP_IMAGE", env) ?? null,
    fsLicense: readOptionalString("MRIQ_FS_LICENSE", env) ?? null,
    qbatchBin: readString("MRIQ_QBATCH_BIN", "qbatch", env),
    qsubBin: readString("MRIQ_QSUB_BIN", "qsub", env),
    spawnEnvKeys: extraKeys.length === 0 ? null : Array.from(new Set([...BASE_SPAWN_ENV_KEYS, ...extraKeys])),
    commandTimeoutMs: readOptionalInt("MRIQ_COMMAND_TIMEOUT_MS", { min: 1 }, env),
  });
}
