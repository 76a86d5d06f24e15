/**
 * Error taxonomy shared by both pipelines. Every expected failure carries a
 * stable code, a remediation hint and the exit code the CLI must report, so
 * entry points can log and terminate without inspecting messages.
 */
export class PipelineError extends Error {
  /** Stable identifier surfaced in structured logs. */
  public readonly code: string;
  /** Short remediation hint aimed at the operator. */
  public readonly hint: string;
  /** Structured metadata mirrored into the log payload. */
  public readonly details: Record<string, unknown>;
  /** Process exit code reported by the CLI. */
  public readonly exitCode: number;

  constructor(
    message: string,
    code: string,
    hint: string,
    details: Record<string, unknown> = {},
    exitCode = 1,
  ) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.hint = hint;
    this.details = details;
    this.exitCode = exitCode;
  }
}

/** Raised when command-line arguments are missing, unknown or contradictory. */
export class UsageError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "E-USAGE", "run the command with --help to list the accepted options", details);
    this.name = "UsageError";
  }
}

/** Raised when a configuration document cannot be read or fails validation. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "E-CONFIG", "check MRIQ_STUDIES_CONFIG and the study registry contents", details);
    this.name = "ConfigurationError";
  }
}

/** Raised when a study nickname is absent from the registry. */
export class UnknownStudyError extends PipelineError {
  public readonly study: string;

  constructor(study: string) {
    super(`${study} not a valid study ID!`, "E-STUDY-UNKNOWN", "use a nickname declared in the study registry", {
      study,
    });
    this.name = "UnknownStudyError";
    this.study = study;
  }
}

/** Raised when the input directory yields no subject to work on. */
export class NothingToProcessError extends PipelineError {
  constructor(message = "No outstanding scans to process.", details: Record<string, unknown> = {}) {
    super(message, "E-NOTHING-TO-DO", "check the input directory and the subject filters", details);
    this.name = "NothingToProcessError";
  }
}

/**
 * Raised when an existing run script differs from the one the current options
 * would produce. Submitting with mismatching settings would mix outputs of
 * different pipeline configurations in the same subjects directory.
 */
export class RunScriptMismatchError extends PipelineError {
  public readonly scriptPath: string;

  constructor(scriptPath: string, diff: readonly string[]) {
    super(
      `Old ${scriptPath} doesn't match parameters of this run.`,
      "E-RUNSCRIPT-MISMATCH",
      "use --run-version for a new configuration or delete the stale script",
      { script: scriptPath, diff },
    );
    this.name = "RunScriptMismatchError";
    this.scriptPath = scriptPath;
  }
}

/** Raised when an external command exits with a non-zero status. */
export class CommandFailedError extends PipelineError {
  public readonly command: string;
  public readonly status: number | null;
  public readonly stderr: string;

  constructor(description: string, command: string, status: number | null, stderr: string) {
    super(`${description} (exit ${status ?? "signal"})`, "E-COMMAND-FAILED", "inspect the command output in the log", {
      command,
      status,
      stderr,
    });
    this.name = "CommandFailedError";
    this.command = command;
    this.status = status;
    this.stderr = stderr;
  }
}

/**
 * Raised when a partially copied FreeSurfer reconstruction cannot be removed.
 * fMRIPrep would otherwise pick up the incomplete copy.
 */
export class ReconCleanupError extends PipelineError {
  constructor(directory: string, subject: string, reason: string) {
    super(
      `Failed to remove ${directory}, please delete manually and re-run ${subject} with --ignore-recon flag!`,
      "E-RECON-CLEANUP",
      "delete the directory manually and re-run the subject with --ignore-recon",
      { directory, subject, reason },
    );
    this.name = "ReconCleanupError";
  }
}

/** Narrow helper used by the CLI to decide how an error must be reported. */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
