#!/usr/bin/env node
import process from "node:process";

import { parseFreesurferArgs, FREESURFER_USAGE, type FreesurferOptions } from "../freesurfer/options.js";
import { runFreesurfer } from "../freesurfer/run.js";
import { isCliEntryPoint, runCli, type CliProgram } from "./main.js";

export const freesurferProgram: CliProgram<FreesurferOptions> = {
  name: "proc-freesurfer",
  usage: FREESURFER_USAGE,
  parse: parseFreesurferArgs,
  async run(options, { logger, runner, environment }) {
    return runFreesurfer(options, { logger, runner, qbatchBin: environment.qbatchBin });
  },
};

if (isCliEntryPoint(import.meta.url)) {
  process.exitCode = await runCli(freesurferProgram, process.argv.slice(2));
}
