import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import { ConfigurationError } from "../errors.js";

/**
 * Phantom scans are named with a `PHA` field (`STUDY_SITE_PHA_FBN0001`) and
 * never go through subject pipelines.
 */
export function isPhantom(subject: string): boolean {
  return subject.startsWith("PHA") || subject.split("_").includes("PHA");
}

/**
 * Extracts the subject id from a QC report name: `qc_<id>.<ext>` → `<id>`.
 * Returns `null` for names that do not follow the convention.
 */
export function subjectFromQcReport(report: string): string | null {
  const match = /^qc_(.+?)(?:\.[A-Za-z0-9]+)?$/.exec(report.trim());
  return match?.[1] ?? null;
}

/**
 * Parses the data-transfer QC checklist: one report per line, followed by the
 * sign-off of whoever reviewed it. Only signed-off subjects are returned, in
 * file order.
 */
export function parseQcChecklist(text: string): string[] {
  const passed: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }
    const [report, ...signoff] = line.split(/\s+/);
    if (!report || signoff.length === 0) {
      continue;
    }
    const subject = subjectFromQcReport(report);
    if (subject !== null && !passed.includes(subject)) {
      passed.push(subject);
    }
  }
  return passed;
}

export async function readQcPassed(
  qcFile: string,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<string[]> {
  const text = await fs.readFileUtf8(qcFile);
  if (text === null) {
    throw new ConfigurationError(`QC checklist ${qcFile} does not exist`, { source: qcFile });
  }
  return parseQcChecklist(text);
}

export interface SubjectListOptions {
  /** Only ids containing this string are kept. */
  readonly subjectFilter?: string;
  /** When set, subjects come from the signed-off lines of this QC checklist. */
  readonly qcFile?: string;
  readonly fs?: FileSystemGateway;
}

/**
 * Lists the subjects to consider: subject directories of {@link inputDir}
 * (sorted), or the QC-passed subjects when a QC checklist is given. Phantoms
 * and ids not matching the filter are dropped in both cases.
 */
export async function getSubjectList(inputDir: string, options: SubjectListOptions = {}): Promise<string[]> {
  const fs = options.fs ?? defaultFileSystemGateway;

  let candidates: string[];
  if (options.qcFile !== undefined) {
    candidates = await readQcPassed(options.qcFile, fs);
  } else {
    const entries = await fs.listEntries(inputDir);
    candidates = entries
      .filter((entry) => entry.isDirectory)
      .map((entry) => entry.name)
      .sort();
  }

  const filter = options.subjectFilter;
  return candidates.filter((subject) => !isPhantom(subject) && (!filter || subject.includes(filter)));
}
