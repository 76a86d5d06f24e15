import path from "node:path";

import { expect } from "chai";

import {
  addNewSubjects,
  formatChecklist,
  FREESURFER_CHECKLIST_COLUMNS,
  getCell,
  loadChecklist,
  parseChecklist,
  saveChecklist,
  withCell,
  withNote,
  type Checklist,
} from "../src/checklist/checklist.js";
import { ConfigurationError } from "../src/errors.js";
import { createTempDir, removeTempDir } from "./helpers/tempDir.js";

const HEADER = "id,T1_nii,date_ran,qc_rator,qc_rating,notes";

describe("checklist", () => {
  it("parses a checklist and keeps unknown columns after the declared ones", () => {
    const checklist = parseChecklist(
      `id,T1_nii,site\nSPN01_CMH_0001_01,SPN01_CMH_0001_01_T1_02.nii.gz,CMH\n`,
      FREESURFER_CHECKLIST_COLUMNS,
    );

    expect(checklist.columns).to.deep.equal([...FREESURFER_CHECKLIST_COLUMNS, "site"]);
    expect(checklist.rows).to.deep.equal([
      {
        id: "SPN01_CMH_0001_01",
        T1_nii: "SPN01_CMH_0001_01_T1_02.nii.gz",
        date_ran: "",
        qc_rator: "",
        qc_rating: "",
        notes: "",
        site: "CMH",
      },
    ]);
  });

  it("treats an empty document as an empty checklist", () => {
    expect(parseChecklist("", FREESURFER_CHECKLIST_COLUMNS)).to.deep.equal({
      columns: [...FREESURFER_CHECKLIST_COLUMNS],
      rows: [],
    });
  });

  it("requires an id column", () => {
    expect(() => parseChecklist("subject,T1_nii\nS1,a.nii\n", FREESURFER_CHECKLIST_COLUMNS, "fs.csv"))
      .to.throw(ConfigurationError)
      .with.property("message", "Checklist fs.csv has no 'id' column");
  });

  it("rejects malformed CSV", () => {
    expect(() => parseChecklist(`id,notes\nS1,"unterminated\n`, FREESURFER_CHECKLIST_COLUMNS)).to.throw(
      ConfigurationError,
    );
  });

  it("appends unseen subjects only", () => {
    const checklist = parseChecklist(`${HEADER}\nS1,,,,,\n`, FREESURFER_CHECKLIST_COLUMNS);

    const updated = addNewSubjects(["S1", "S2", "S2", "S3"], checklist);

    expect(updated.rows.map((row) => getCell(row, "id"))).to.deep.equal(["S1", "S2", "S3"]);
    expect(updated.rows[1]).to.deep.equal({ id: "S2", T1_nii: "", date_ran: "", qc_rator: "", qc_rating: "", notes: "" });
  });

  it("appends notes without repeating them", () => {
    const row = { id: "S1", notes: "" };

    const once = withNote(row, "No T1_nii image found.");
    const twice = withNote(once, "No T1_nii image found.");
    const other = withNote(withCell(twice, "notes", "rescan requested"), "FS halted at IsRunning.lh+rh");

    expect(getCell(once, "notes")).to.equal("No T1_nii image found.");
    expect(twice).to.equal(once);
    expect(getCell(other, "notes")).to.equal("rescan requested; FS halted at IsRunning.lh+rh");
  });

  it("formats the header followed by one line per row", () => {
    const checklist: Checklist = {
      columns: ["id", "T1_nii", "notes"],
      rows: [
        { id: "S1", T1_nii: "a.nii;b.nii", notes: "scan, repeated" },
        { id: "S2", T1_nii: "", notes: "" },
      ],
    };

    expect(formatChecklist(checklist)).to.equal('id,T1_nii,notes\nS1,a.nii;b.nii,"scan, repeated"\nS2,,\n');
  });

  describe("persistence", () => {
    let workspace: string;

    beforeEach(async () => {
      workspace = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(workspace);
    });

    it("round-trips through the file and starts empty when it is missing", async () => {
      const file = path.join(workspace, "freesurfer-checklist.csv");

      const initial = await loadChecklist(file, FREESURFER_CHECKLIST_COLUMNS);
      expect(initial.rows).to.deep.equal([]);

      await saveChecklist(file, addNewSubjects(["S1"], initial));
      const reloaded = await loadChecklist(file, FREESURFER_CHECKLIST_COLUMNS);

      expect(reloaded.columns).to.deep.equal([...FREESURFER_CHECKLIST_COLUMNS]);
      expect(reloaded.rows.map((row) => getCell(row, "id"))).to.deep.equal(["S1"]);
    });
  });
});
