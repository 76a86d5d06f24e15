import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import { resolveWithin } from "../paths.js";
import { getCell, withCell, withNote, type Checklist, type ChecklistRow } from "./checklist.js";

const NIFTI_EXTENSIONS = [".nii", ".nii.gz"];

export interface FindImagesOptions {
  /** Secondary tag narrowing the candidates when several files match. */
  readonly subjectFilter?: string;
  /** Record every match (joined with `;`) instead of flagging the row. */
  readonly allowMultiple?: boolean;
  readonly fs?: FileSystemGateway;
}

function isNifti(name: string): boolean {
  return NIFTI_EXTENSIONS.some((extension) => name.endsWith(extension));
}

/**
 * Fills {@link column} for rows that do not name an image yet, by looking for
 * NIfTI files containing {@link tag} under `<inputDir>/<id>/`. Rows that
 * already name an image, including hand-edited ones, are left untouched.
 */
export async function findImages(
  checklist: Checklist,
  column: string,
  inputDir: string,
  tag: string,
  options: FindImagesOptions = {},
): Promise<Checklist> {
  const fs = options.fs ?? defaultFileSystemGateway;
  const rows: ChecklistRow[] = [];

  for (const row of checklist.rows) {
    if (getCell(row, column).trim().length > 0) {
      rows.push(row);
      continue;
    }

    const subjectDir = resolveWithin(inputDir, getCell(row, "id"));
    const entries = await fs.listEntries(subjectDir);
    let candidates = entries
      .filter((entry) => entry.isFile && entry.name.includes(tag) && isNifti(entry.name))
      .map((entry) => entry.name)
      .sort();

    const filter = options.subjectFilter;
    if (candidates.length > 1 && filter) {
      candidates = candidates.filter((name) => name.includes(filter));
    }

    if (candidates.length === 1) {
      rows.push(withCell(row, column, candidates[0]));
    } else if (candidates.length > 1 && options.allowMultiple) {
      rows.push(withCell(row, column, candidates.join(";")));
    } else if (candidates.length > 1) {
      rows.push(withNote(row, `Multiple ${column} images found.`));
    } else {
      rows.push(withNote(row, `No ${column} image found.`));
    }
  }

  return { columns: checklist.columns, rows };
}
