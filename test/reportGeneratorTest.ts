import { expect } from "chai";
import { sortReport, summarizeGrades } from "../src/reporters/report-generator";
import { Diagnostics } from "../src/utils/diagnostics";
import { Table } from "../src/utils/table";

describe("summarizeGrades", () => {
  const report = Table.fromRecords([
    { ID: "a", "Final grade": 95, "Letter grade": "A", "HW missed": 0, "Quiz missed": 1 },
    { ID: "b", "Final grade": 70, "Letter grade": "C", "HW missed": 2, "Quiz missed": 0 },
    { ID: "c", "Final grade": 81, "Letter grade": "B-", "HW missed": 1, "Quiz missed": 0 },
  ]);

  it("should count students and average the final grades", () => {
    const summary = summarizeGrades(report);
    expect(summary.totalStudents).to.equal(3);
    expect(summary.averageFinalGrade).to.equal(82);
    expect(summary.diagnosticsCount).to.equal(0);
  });

  it("should count every letter of the scale, in order", () => {
    const summary = summarizeGrades(report, undefined, ["A", "B-", "C", "F"]);
    expect(summary.letterCounts).to.deep.equal({ A: 1, "B-": 1, C: 1, F: 0 });
    expect(Object.keys(summary.letterCounts)).to.deep.equal(["A", "B-", "C", "F"]);
  });

  it("should total the missed tests per assignment", () => {
    expect(summarizeGrades(report).missedCounts).to.deep.equal({ HW: 3, Quiz: 1 });
  });

  it("should count the warnings raised", () => {
    const diagnostics = new Diagnostics({ echo: false });
    diagnostics.warn("name-split", "Names were split", ["Grace Brewster Hopper"]);
    expect(summarizeGrades(report, diagnostics).diagnosticsCount).to.equal(1);
  });

  it("should leave out the sections the report lacks", () => {
    const summary = summarizeGrades(report.select(["ID"]));
    expect(summary.averageFinalGrade).to.be.undefined;
    expect(summary.letterCounts).to.deep.equal({});
    expect(summary.missedCounts).to.deep.equal({});
  });
});

describe("sortReport", () => {
  const report = Table.fromRecords([
    { Name: "Zed", Grade: 71 },
    { Name: "Adams", Grade: 88 },
    { Name: "Moore", Grade: null },
  ]);

  it("should put the highest number first", () => {
    expect(sortReport(report, "Grade").column("Name")).to.deep.equal(["Adams", "Zed", "Moore"]);
  });

  it("should sort text alphabetically", () => {
    expect(sortReport(report, "Name").column("Name")).to.deep.equal(["Adams", "Moore", "Zed"]);
  });
});
