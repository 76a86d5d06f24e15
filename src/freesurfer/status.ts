import path from "node:path";

import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import { resolveWithin } from "../paths.js";

/** recon-all drops this marker once every stage succeeded. */
export function subjectPreviouslyCompleted(
  subjectsDir: string,
  subject: string,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<boolean> {
  return fs.isFile(resolveWithin(subjectsDir, subject, "scripts", "recon-all.done"));
}

/**
 * Returns the path of the `IsRunning*` lock recon-all leaves behind when a run
 * was interrupted, or `null` when the subject is not halted. Such subjects are
 * not resubmitted: recon-all refuses to start while the lock exists.
 */
export async function findHaltedMarker(
  subjectsDir: string,
  subject: string,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<string | null> {
  const scriptsDir = resolveWithin(subjectsDir, subject, "scripts");
  const markers = (await fs.listEntries(scriptsDir))
    .filter((entry) => entry.isFile && entry.name.startsWith("IsRunning"))
    .map((entry) => entry.name)
    .sort();
  const first = markers[0];
  return first === undefined ? null : path.join(scriptsDir, first);
}
