import { stat } from "node:fs/promises";
import path from "node:path";

import { expect } from "chai";

import { UsageError } from "../src/errors.js";
import { hasBidsLabel, renderJobScript, toBidsSubject, writeJobScript } from "../src/fmriprep/jobScript.js";
import { defaultFileSystemGateway } from "../src/gateways/fs.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { removeTempDir } from "./helpers/tempDir.js";

describe("fmriprep/jobScript", () => {
  it("derives the BIDS participant label from the site and subject fields", () => {
    expect(toBidsSubject("SPN01_CMH_0001_01")).to.equal("sub-CMH0001");
    expect(toBidsSubject("ASDD_MRC_P0012_02_SE01")).to.equal("sub-MRC02");
    expect(hasBidsLabel("SPN01_CMH")).to.equal(false);
    expect(hasBidsLabel("SPN01__0001_01")).to.equal(false);
    expect(() => toBidsSubject("SPN01")).to.throw(UsageError);
  });

  it("renders the container job", () => {
    const script = renderJobScript({
      image: "/images/fmriprep.img",
      env: { out: "/study/pipelines/fmriprep/SPN01_CMH_0001_01", bids: "/study/data/bids" },
      subject: "SPN01_CMH_0001_01",
      license: "/licenses/fs.txt",
    });

    expect(script).to.equal(
      [
        "#!/bin/bash",
        "",
        "function cleanup(){",
        "    rm -rf $HOME",
        "}",
        "",
        "HOME=$(mktemp -d /tmp/home.XXXXX)",
        "WORK=$(mktemp -d $HOME/work.XXXXX)",
        "LICENSE=$(mktemp -d $HOME/li.XXXXX)",
        "BIDS=/study/data/bids",
        "SIMG=/images/fmriprep.img",
        "SUB=sub-CMH0001",
        "OUT=/study/pipelines/fmriprep/SPN01_CMH_0001_01",
        "",
        "cp /licenses/fs.txt $LICENSE/license.txt",
        "",
        "trap cleanup EXIT",
        "singularity run -H $HOME -B $BIDS:/bids -B $WORK:/work -B $OUT:/out -B $LICENSE:/li \\",
        "$SIMG -vvv \\",
        "/bids /out \\",
        "participant --participant-label $SUB \\",
        "--fs-license-file /li/license.txt",
        "",
        "cleanup",
        "",
      ].join("\n"),
    );
  });

  it("writes the job to a fresh executable file", async () => {
    const logger = new RecordingLogger();

    const jobFile = await writeJobScript("SPN01_CMH_0001_01", "#!/bin/bash\n", logger);
    try {
      expect(path.basename(jobFile.path)).to.equal("SPN01_CMH_0001_01_fmriprep_job");
      expect(path.dirname(jobFile.path)).to.equal(jobFile.directory);
      expect((await stat(jobFile.path)).mode & 0o777).to.equal(0o755);
      expect(await defaultFileSystemGateway.readFileUtf8(jobFile.path)).to.equal("#!/bin/bash\n");
      expect(logger.messages("debug")).to.deep.equal(["job_script_written"]);
    } finally {
      await removeTempDir(jobFile.directory);
    }
  });
});
