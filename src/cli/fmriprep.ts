#!/usr/bin/env node
import process from "node:process";

import { loadStudyRegistry } from "../config/studies.js";
import { parseFmriprepArgs, FMRIPREP_USAGE, type FmriprepOptions } from "../fmriprep/options.js";
import { runFmriprep } from "../fmriprep/run.js";
import { isCliEntryPoint, runCli, type CliProgram } from "./main.js";

export const fmriprepProgram: CliProgram<FmriprepOptions> = {
  name: "proc-fmriprep",
  usage: FMRIPREP_USAGE,
  parse: parseFmriprepArgs,
  async run(options, { logger, runner, environment }) {
    const registry = await loadStudyRegistry(environment.studiesConfig);
    return runFmriprep(options, {
      logger,
      runner,
      registry,
      qsubBin: environment.qsubBin,
      defaults: { singularityImage: environment.fmriprepImage, fsLicense: environment.fsLicense },
    });
  },
};

if (isCliEntryPoint(import.meta.url)) {
  process.exitCode = await runCli(fmriprepProgram, process.argv.slice(2));
}
