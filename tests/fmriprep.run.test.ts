import { readFileSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import { expect } from "chai";

import { parseStudyRegistry, type StudyRegistry } from "../src/config/studies.js";
import { CommandFailedError } from "../src/errors.js";
import type { FmriprepOptions } from "../src/fmriprep/options.js";
import { runFmriprep } from "../src/fmriprep/run.js";
import { createChildProcessGateway } from "../src/gateways/childProcess.js";
import { createCommandRunner } from "../src/gateways/commandRunner.js";
import { defaultFileSystemGateway } from "../src/gateways/fs.js";
import { isDirectory } from "../src/paths.js";
import { FakeSpawn, type RecordedSpawn, type ScriptedOutcome } from "./helpers/fakeSpawn.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { createTempDir, removeTempDir } from "./helpers/tempDir.js";

const S1 = "SPN01_CMH_0001_01";
const S2 = "SPN01_CMH_0002_01";

function writtenJobFile(logger: RecordingLogger): string {
  const payload = logger.payloadOf("job_script_written");
  if (typeof payload === "object" && payload !== null && "file" in payload && typeof payload.file === "string") {
    return payload.file;
  }
  throw new Error("no job script was written");
}

describe("fmriprep/run", () => {
  let workspace: string;
  let base: string;
  let registry: StudyRegistry;
  let jobScripts: Map<string, string>;

  beforeEach(async () => {
    workspace = await createTempDir();
    base = path.join(workspace, "SPN01");
    registry = parseStudyRegistry({ studies: { SPN01: { base } } });
    jobScripts = new Map();
    for (const name of [S1, S2, "SPN01_CMH_PHA_FBN0001"]) {
      await mkdir(path.join(base, "data", "nii", name), { recursive: true });
    }
    await mkdir(path.join(base, "pipelines", "fmriprep", S2, "fmriprep"), { recursive: true });
    await mkdir(path.join(base, "pipelines", "freesurfer", S1), { recursive: true });
  });

  afterEach(async () => {
    await removeTempDir(workspace);
  });

  function options(overrides: Partial<FmriprepOptions> = {}): FmriprepOptions {
    return {
      study: "SPN01",
      subjects: [],
      rewrite: false,
      ignoreRecon: false,
      convertBids: false,
      verbosity: "default",
      dryRun: false,
      ...overrides,
    };
  }

  function harness(qsub: ScriptedOutcome = { status: 0, stdout: "101.queue\n" }, dryRun = false) {
    const fake = new FakeSpawn((call: RecordedSpawn) => {
      if (call.command !== "qsub") {
        return { status: 0 };
      }
      const jobFile = call.args[1];
      jobScripts.set(path.basename(jobFile), readFileSync(jobFile, "utf8"));
      return qsub;
    });
    const logger = new RecordingLogger();
    const runner = createCommandRunner({
      gateway: createChildProcessGateway({ spawnImpl: fake.spawnImpl }),
      logger,
      allowedEnvKeys: [],
      dryRun,
    });
    return { fake, logger, runner };
  }

  it("submits every unprocessed subject of the study", async () => {
    const { fake, logger, runner } = harness();
    const outDir = path.join(base, "pipelines", "fmriprep");

    const report = await runFmriprep(options(), { logger, runner, registry });

    expect(report).to.deep.equal({ outDir, submitted: [S1], skippedProcessed: [S2], reconCopied: [S1] });
    expect(fake.calls.map((call) => call.command)).to.deep.equal(["rsync", "qsub"]);
    expect(fake.calls[0].args).to.deep.equal([
      "-a",
      path.join(base, "pipelines", "freesurfer", S1),
      path.join(outDir, S1, "freesurfer"),
    ]);
    expect(fake.calls[1].args[0]).to.equal("-V");
    expect(path.basename(fake.calls[1].args[1])).to.equal(`${S1}_fmriprep_job`);
    expect(logger.payloadOf("fmriprep_already_processed")).to.deep.equal({ subjects: [S2] });
  });

  it("renders the job with the default image and license", async () => {
    const { logger, runner } = harness();

    await runFmriprep(options(), { logger, runner, registry });

    const script = jobScripts.get(`${S1}_fmriprep_job`) ?? "";
    const lines = script.split("\n");
    expect(lines).to.include(`BIDS=${path.join(base, "data", "bids")}`);
    expect(lines).to.include(
      "SIMG=/archive/code/containers/FMRIPREP/poldracklab_fmriprep_1.1.1-2018-06-07-2f08547a0732.img",
    );
    expect(lines).to.include("SUB=sub-CMH0001");
    expect(lines).to.include(`OUT=${path.join(base, "pipelines", "fmriprep", S1)}`);
    expect(lines).to.include("cp /opt/quarantine/freesurfer/6.0.0/build/license.txt $LICENSE/license.txt");
  });

  it("prefers command-line settings over environment defaults", async () => {
    const { logger, runner } = harness();

    await runFmriprep(options({ singularityImage: "/img/cli.simg" }), {
      logger,
      runner,
      registry,
      defaults: { singularityImage: "/img/env.simg", fsLicense: "/lic/env.txt" },
    });

    const lines = (jobScripts.get(`${S1}_fmriprep_job`) ?? "").split("\n");
    expect(lines).to.include("SIMG=/img/cli.simg");
    expect(lines).to.include("cp /lic/env.txt $LICENSE/license.txt");
  });

  it("removes the job file once it is queued", async () => {
    const { logger, runner } = harness();

    await runFmriprep(options(), { logger, runner, registry });

    const file = writtenJobFile(logger);
    expect(await defaultFileSystemGateway.isFile(file)).to.equal(false);
    expect(logger.messages("debug")).to.include("job_file_removed");
  });

  it("keeps the job file when the submission fails", async () => {
    const { logger, runner } = harness({ status: 1, stderr: "qsub: cannot connect" });

    let caught: unknown;
    try {
      await runFmriprep(options(), { logger, runner, registry });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CommandFailedError);
    const file = writtenJobFile(logger);
    expect(await defaultFileSystemGateway.isFile(file)).to.equal(true);
    await removeTempDir(path.dirname(file));
  });

  it("resubmits processed subjects with rewrite and skips recon with ignoreRecon", async () => {
    const { fake, logger, runner } = harness();

    const report = await runFmriprep(options({ rewrite: true, ignoreRecon: true }), { logger, runner, registry });

    expect(report.submitted).to.deep.equal([S1, S2]);
    expect(report.skippedProcessed).to.deep.equal([]);
    expect(report.reconCopied).to.deep.equal([]);
    expect(fake.calls.map((call) => call.command)).to.deep.equal(["qsub", "qsub"]);
  });

  it("processes only the requested subjects and skips malformed ids", async () => {
    const { logger, runner } = harness();
    const outDir = path.join(workspace, "custom-out");

    const report = await runFmriprep(options({ subjects: [S2, "bogus"], outDir, ignoreRecon: true }), {
      logger,
      runner,
      registry,
    });

    expect(report).to.deep.equal({ outDir, submitted: [S2], skippedProcessed: [], reconCopied: [] });
    expect(logger.payloadOf("fmriprep_malformed_subjects")).to.deep.equal({ subjects: ["bogus"] });
  });

  it("converts the study to BIDS first when asked", async () => {
    const { fake, logger, runner } = harness();

    await runFmriprep(options({ convertBids: true, ignoreRecon: true, subjects: [S1] }), {
      logger,
      runner,
      registry,
    });

    expect(fake.commandLines()[0]).to.equal(`nii_to_bids.py SPN01 ${S1}`);
  });

  it("only logs the commands in dry-run mode", async () => {
    const { fake, logger, runner } = harness(undefined, true);

    const report = await runFmriprep(options({ ignoreRecon: true }), { logger, runner, registry });

    expect(fake.calls).to.have.lengthOf(0);
    expect(report.submitted).to.deep.equal([S1]);
    expect(logger.messages("info")).to.include("command_dry_run");
  });

  it("leaves the output tree untouched in dry-run mode", async () => {
    const { fake, logger, runner } = harness(undefined, true);
    const subjectOut = path.join(base, "pipelines", "fmriprep", S1);

    const report = await runFmriprep(options({ dryRun: true }), { logger, runner, registry });

    expect(fake.calls).to.have.lengthOf(0);
    expect(report.submitted).to.deep.equal([S1]);
    expect(report.reconCopied).to.deep.equal([]);
    expect(await isDirectory(path.join(subjectOut, "freesurfer"))).to.equal(false);
    expect(await isDirectory(subjectOut)).to.equal(false);
    expect(logger.payloadOf("fs_recon_copy_planned")).to.deep.equal({
      subject: S1,
      source: path.join(base, "pipelines", "freesurfer", S1),
      target: path.join(subjectOut, "freesurfer"),
    });
  });
});
