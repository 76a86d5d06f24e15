import path from "node:path";

import { expect } from "chai";

import { loadStudyRegistry, parseStudyRegistry, resolveStudy } from "../src/config/studies.js";
import { ConfigurationError, UnknownStudyError } from "../src/errors.js";
import { createTempDir, removeTempDir, writeFixture } from "./helpers/tempDir.js";

describe("config/studies", () => {
  const registry = parseStudyRegistry({
    studies: {
      SPN01: { base: "/archive/data/SPN01" },
      ASDD: { base: "/archive/data/ASDD", paths: { nii: "data/nifti", qc: "qc" } },
    },
  });

  it("resolves the default paths against the study base", () => {
    const study = resolveStudy(registry, "SPN01");

    expect(study.study).to.equal("SPN01");
    expect(study.getStudyBase()).to.equal("/archive/data/SPN01");
    expect(study.getPath("data")).to.equal("/archive/data/SPN01/data");
    expect(study.getPath("nii")).to.equal("/archive/data/SPN01/data/nii");
  });

  it("lets a study override and extend its paths", () => {
    const study = resolveStudy(registry, "ASDD");

    expect(study.getPath("nii")).to.equal("/archive/data/ASDD/data/nifti");
    expect(study.getPath("qc")).to.equal("/archive/data/ASDD/qc");
    expect(study.getPath("data")).to.equal("/archive/data/ASDD/data");
  });

  it("rejects unknown study nicknames", () => {
    expect(() => resolveStudy(registry, "NOPE"))
      .to.throw(UnknownStudyError)
      .with.property("message", "NOPE not a valid study ID!");
    expect(() => resolveStudy(registry, "toString")).to.throw(UnknownStudyError);
  });

  it("rejects undeclared path keys", () => {
    expect(() => resolveStudy(registry, "SPN01").getPath("bids")).to.throw(ConfigurationError);
  });

  it("rejects relative bases and unknown fields", () => {
    expect(() => parseStudyRegistry({ studies: { X: { base: "relative/dir" } } })).to.throw(ConfigurationError);
    expect(() => parseStudyRegistry({ studies: {}, extra: true })).to.throw(ConfigurationError);
  });

  describe("loadStudyRegistry", () => {
    let workspace: string;

    beforeEach(async () => {
      workspace = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(workspace);
    });

    it("reads and validates the registry file", async () => {
      const file = path.join(workspace, "studies.json");
      await writeFixture(file, JSON.stringify({ studies: { SPN01: { base: "/archive/data/SPN01" } } }));

      const loaded = await loadStudyRegistry(file);

      expect(resolveStudy(loaded, "SPN01").getStudyBase()).to.equal("/archive/data/SPN01");
    });

    it("reports a missing registry setting, file or malformed JSON", async () => {
      const malformed = path.join(workspace, "broken.json");
      await writeFixture(malformed, "{ studies:");

      for (const source of [null, path.join(workspace, "missing.json"), malformed]) {
        let caught: unknown;
        try {
          await loadStudyRegistry(source);
        } catch (error) {
          caught = error;
        }
        expect(caught).to.be.instanceOf(ConfigurationError);
      }
    });
  });
});
