import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";

/** Columns of the FreeSurfer checklist, in file order. */
export const FREESURFER_CHECKLIST_COLUMNS = ["id", "T1_nii", "date_ran", "qc_rator", "qc_rating", "notes"] as const;

export type FreesurferChecklistColumn = (typeof FREESURFER_CHECKLIST_COLUMNS)[number];

/**
 * One checklist line. Every declared column is present; an empty string is
 * an empty cell.
 */
export type ChecklistRow = Record<string, string>;

export interface Checklist {
  readonly columns: readonly string[];
  readonly rows: readonly ChecklistRow[];
}

/** Shape returned by csv-parse when `columns` is disabled. */
const CsvRecordsSchema = z.array(z.array(z.string()));

function emptyRow(columns: readonly string[]): ChecklistRow {
  const row: ChecklistRow = {};
  for (const column of columns) {
    row[column] = "";
  }
  return row;
}

/** Returns the value of {@link column}, treating absent cells as empty. */
export function getCell(row: ChecklistRow, column: string): string {
  return row[column] ?? "";
}

/** Returns a copy of {@link row} with {@link column} set to {@link value}. */
export function withCell(row: ChecklistRow, column: string, value: string): ChecklistRow {
  return { ...row, [column]: value };
}

/**
 * Appends {@link note} to the `notes` cell unless it is already recorded, so
 * hand-written remarks survive repeated runs.
 */
export function withNote(row: ChecklistRow, note: string): ChecklistRow {
  const current = getCell(row, "notes").trim();
  if (current.length === 0) {
    return withCell(row, "notes", note);
  }
  if (current.split(";").some((entry) => entry.trim() === note)) {
    return row;
  }
  return withCell(row, "notes", `${current}; ${note}`);
}

/**
 * Parses checklist text. Declared columns missing from the header are added
 * empty; extra columns found in the file are kept after the declared ones.
 */
export function parseChecklist(text: string, columns: readonly string[], source = "<inline>"): Checklist {
  let records: string[][];
  try {
    records = CsvRecordsSchema.parse(
      parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true, trim: false }),
    );
  } catch (error) {
    throw new ConfigurationError(`Checklist ${source} is not valid CSV`, {
      source,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const [header, ...body] = records;
  if (!header) {
    return { columns: [...columns], rows: [] };
  }
  if (!header.includes("id")) {
    throw new ConfigurationError(`Checklist ${source} has no 'id' column`, { source, header });
  }

  const allColumns = [...columns, ...header.filter((name) => !columns.includes(name))];
  const rows = body.map((record) => {
    const row = emptyRow(allColumns);
    header.forEach((name, index) => {
      row[name] = record[index] ?? "";
    });
    return row;
  });
  return { columns: allColumns, rows };
}

/** Loads {@link file}, or returns an empty checklist when it does not exist yet. */
export async function loadChecklist(
  file: string,
  columns: readonly string[],
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<Checklist> {
  const text = await fs.readFileUtf8(file);
  if (text === null) {
    return { columns: [...columns], rows: [] };
  }
  return parseChecklist(text, columns, file);
}

/** Appends a row for every subject not listed yet. Existing rows keep their order. */
export function addNewSubjects(subjects: readonly string[], checklist: Checklist): Checklist {
  const known = new Set(checklist.rows.map((row) => getCell(row, "id")));
  const added: ChecklistRow[] = [];
  for (const subject of subjects) {
    if (known.has(subject)) {
      continue;
    }
    known.add(subject);
    added.push(withCell(emptyRow(checklist.columns), "id", subject));
  }
  return { columns: checklist.columns, rows: [...checklist.rows, ...added] };
}

/** Serialises the checklist: header line, then one line per row, no index column. */
export function formatChecklist(checklist: Checklist): string {
  const records = checklist.rows.map((row) => checklist.columns.map((column) => getCell(row, column)));
  return stringify([[...checklist.columns], ...records]);
}

export async function saveChecklist(
  file: string,
  checklist: Checklist,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<void> {
  await fs.writeFileUtf8(file, formatChecklist(checklist));
}
