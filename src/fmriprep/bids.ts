import { renderCommandLine, type CommandRunner, type CommandSpec } from "../gateways/commandRunner.js";
import type { StructuredLogger } from "../logger.js";
import { isDirectory } from "../paths.js";

export function makeBidsConversionCommand(study: string, subjects: readonly string[]): CommandSpec {
  return {
    command: "nii_to_bids.py",
    args: [study, ...subjects],
    description: `BIDS conversion of ${study}`,
  };
}

/**
 * Converts the study's NIfTI files to BIDS with `nii_to_bids.py`. A failing
 * conversion aborts the run. A missing BIDS directory afterwards is only
 * logged: the converter validates its own inputs.
 */
export async function runBidsConversion(
  study: string,
  subjects: readonly string[],
  bidsDir: string,
  runner: CommandRunner,
  logger: StructuredLogger,
): Promise<void> {
  const command = makeBidsConversionCommand(study, subjects);
  const result = await runner.runChecked(command);
  if (result.dryRun) {
    return;
  }
  if (!(await isDirectory(bidsDir))) {
    logger.error("bids_directory_missing", {
      bids: bidsDir,
      command: renderCommandLine(command),
      hint: "run nii_to_bids.py manually to debug",
    });
  }
}
