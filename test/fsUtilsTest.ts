import { expect } from "chai";
import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import {
  fileExists,
  formatCsvTable,
  parseCsvTable,
  readCsvTable,
  writeCsvTable,
} from "../src/utils/fs-utils";
import { Table } from "../src/utils/table";

const FIXTURES_DIR = path.join(__dirname, "fixtures");

describe("CSV files", () => {
  it("should read blank cells as absent", () => {
    const table = parseCsvTable('Name,HW 1,Comments\n"Doe, Jane",,"said ""hi"""\n');
    expect(table.columns).to.deep.equal(["Name", "HW 1", "Comments"]);
    expect(table.toRecords()).to.deep.equal([
      { Name: "Doe, Jane", "HW 1": null, Comments: 'said "hi"' },
    ]);
  });

  it("should skip empty lines and trim header names", () => {
    const table = parseCsvTable(" ID ,Score\na,1\n\nb,2\n");
    expect(table.columns).to.deep.equal(["ID", "Score"]);
    expect(table.column("Score")).to.deep.equal(["1", "2"]);
  });

  it("should read the WebAssign fixture", async () => {
    const table = await readCsvTable(path.join(FIXTURES_DIR, "webassign.csv"));
    expect(table.size).to.equal(4);
    expect(table.column("Fullname")[0]).to.equal("Lovelace, Ada");
    expect(table.column("WebAssign")).to.deep.equal(["90", "ND", "NS", "70"]);
  });

  it("should write absent cells as blanks and trim float noise", () => {
    const table = Table.fromRecords([
      { ID: "a", Grade: 0.1 + 0.2, Note: null },
      { ID: "b, c", Grade: 85, Note: "x" },
    ]);
    expect(formatCsvTable(table)).to.equal('ID,Grade,Note\na,0.3,\n"b, c",85,x\n');
  });

  describe("round trip through a file", () => {
    let tmpDir: string;

    before(async () => {
      tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "coursegrader-"));
    });

    after(async () => {
      await fsPromises.rm(tmpDir, { recursive: true, force: true });
    });

    it("should create the folder and write the file", async () => {
      const filePath = path.join(tmpDir, "nested", "out.csv");
      await writeCsvTable(Table.fromRecords([{ ID: "a", Grade: 91 }]), filePath);
      expect(await fileExists(filePath)).to.equal(true);
      const table = await readCsvTable(filePath);
      expect(table.toRecords()).to.deep.equal([{ ID: "a", Grade: "91" }]);
    });

    it("should tell when a file does not exist", async () => {
      expect(await fileExists(path.join(tmpDir, "missing.csv"))).to.equal(false);
    });
  });
});
