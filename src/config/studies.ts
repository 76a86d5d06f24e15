import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, UnknownStudyError } from "../errors.js";
import { hasErrnoCode } from "../nodePrimitives.js";

/** Relative locations assumed when a study omits them. */
const DEFAULT_STUDY_PATHS: Readonly<Record<string, string>> = Object.freeze({
  data: "data",
  nii: "data/nii",
});

const StudyPathsSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

const StudyEntrySchema = z
  .object({
    base: z
      .string()
      .trim()
      .min(1)
      .refine((value) => path.isAbsolute(value), "the study base must be an absolute path"),
    paths: StudyPathsSchema.optional(),
  })
  .strict();

/** Schema of the study registry document pointed to by `MRIQ_STUDIES_CONFIG`. */
export const StudyRegistrySchema = z
  .object({
    studies: z.record(z.string().trim().min(1), StudyEntrySchema),
  })
  .strict();

export type StudyRegistry = z.infer<typeof StudyRegistrySchema>;

/**
 * Resolved view of one study. Paths declared relative in the registry are
 * resolved against the study base.
 */
export interface StudyConfig {
  readonly study: string;
  getStudyBase(): string;
  getPath(key: string): string;
}

/** Builds the {@link StudyConfig} of {@link study}, or throws {@link UnknownStudyError}. */
export function resolveStudy(registry: StudyRegistry, study: string): StudyConfig {
  const entry = Object.prototype.hasOwnProperty.call(registry.studies, study) ? registry.studies[study] : undefined;
  if (!entry) {
    throw new UnknownStudyError(study);
  }

  const base = path.resolve(entry.base);
  const paths: Record<string, string> = { ...DEFAULT_STUDY_PATHS, ...(entry.paths ?? {}) };

  return {
    study,
    getStudyBase: () => base,
    getPath(key: string): string {
      const relative = paths[key];
      if (relative === undefined) {
        throw new ConfigurationError(`Study ${study} does not declare a '${key}' path`, { study, key });
      }
      return path.resolve(base, relative);
    },
  };
}

/** Validates an already-parsed registry document. */
export function parseStudyRegistry(document: unknown, source = "<inline>"): StudyRegistry {
  const parsed = StudyRegistrySchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid study registry ${source}`, {
      source,
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  return parsed.data;
}

/** Reads and validates the registry stored at {@link file}. */
export async function loadStudyRegistry(file: string | null): Promise<StudyRegistry> {
  if (!file) {
    throw new ConfigurationError("No study registry configured (set MRIQ_STUDIES_CONFIG)");
  }

  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      throw new ConfigurationError(`Study registry ${file} does not exist`, { source: file });
    }
    throw error;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Study registry ${file} is not valid JSON`, {
      source: file,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseStudyRegistry(document, file);
}
