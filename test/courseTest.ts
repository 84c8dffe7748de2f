import { expect } from "chai";
import { Course } from "../src/services/course";
import { createAssignment } from "../src/services/assignment";
import { drop, weights } from "../src/services/grading-scheme";
import { ConfigError, KeyMissingError } from "../src/errors";
import { Diagnostics } from "../src/utils/diagnostics";
import { Row, Table } from "../src/utils/table";

function gradebook(rows: Row[]): Table {
  return Table.fromRecords(
    rows.map((row) => ({
      "Last Name": `Last ${row.ID}`,
      "First Name": `First ${row.ID}`,
      Email: `${row.ID}@example.edu`,
      ...row,
    }))
  )
    .select(["Last Name", "First Name", "ID", "Email", ...Object.keys(rows[0]).filter((c) => c !== "ID")])
    .setIndex("ID");
}

describe("Course", () => {
  let diagnostics: Diagnostics;

  beforeEach(() => {
    diagnostics = new Diagnostics({ echo: false });
  });

  describe("merging gradebooks", () => {
    const reference = gradebook([
      { ID: "1", "HW 1": 20 },
      { ID: "2", "HW 1": 15 },
      { ID: "3", "HW 1": 10 },
    ]);
    const second = gradebook([
      { ID: "1", "HW 2": 18 },
      { ID: "2", "HW 2": 12 },
      { ID: "4", "HW 2": 20 },
    ]);
    const hw = createAssignment({ name: "HW", maxPoints: 20, nbTests: 2 });

    it("should keep exactly the reference roster", () => {
      const course = new Course(hw, [reference, second], { diagnostics });
      expect(course.roster.index).to.deep.equal(["1", "2", "3"]);
      expect(course.gradebook.index).to.deep.equal(["1", "2", "3"]);
      expect(course.gradebook.column("HW 2")).to.deep.equal([18, 12, null]);
    });

    it("should report students missing from a later gradebook", () => {
      new Course(hw, [reference, second], { diagnostics });
      expect(diagnostics.byKind("missing-students")).to.deep.equal([
        {
          kind: "missing-students",
          message: "The following students are missing grades in gradebook 1",
          details: ["3"],
        },
      ]);
    });

    it("should take info columns from the reference gradebook only", () => {
      const renamed = Table.fromRecords([
        { "Last Name": "Other", "First Name": "Name", ID: "1", Email: "x@y", Extra: "e" },
      ]).setIndex("ID");
      const course = new Course(hw, [reference, renamed], { diagnostics });
      expect(course.gradebook.get("1", "Last Name")).to.equal("Last 1");
      expect(course.gradebook.get("1", "Extra")).to.equal("e");
    });

    it("should prefer the first gradebook's value of a repeated column", () => {
      const again = gradebook([{ ID: "1", "HW 1": 0 }]);
      const course = new Course(hw, [reference, again], { diagnostics });
      expect(course.gradebook.get("1", "HW 1")).to.equal(20);
      expect(diagnostics.byKind("duplicate-column")[0].details).to.deep.equal(["HW 1"]);
    });

    it("should fill absent cells of a repeated column from later gradebooks", () => {
      const quiz = createAssignment({ name: "Quiz", maxPoints: 10, nbTests: 1 });
      const early = gradebook([
        { ID: "s1", "Quiz 1": null, Comments: null },
        { ID: "s2", "Quiz 1": 7, Comments: "ok" },
      ]);
      const late = gradebook([
        { ID: "s1", "Quiz 1": 8, Comments: "late" },
        { ID: "s2", "Quiz 1": 9, Comments: null },
      ]);
      const course = new Course(quiz, [early, late], { diagnostics });

      expect(course.grades.column("Quiz 1")).to.deep.equal([8, 7]);
      expect(course.gradebook.column("Comments")).to.deep.equal(["late", "ok"]);
      expect(diagnostics.entries.map((d) => d.kind)).to.deep.equal([
        "duplicate-column",
        "multiple-versions",
      ]);
      expect(diagnostics.byKind("duplicate-column")[0].details).to.deep.equal([
        "Quiz 1",
        "Comments",
      ]);
      expect(diagnostics.byKind("multiple-versions")[0].details).to.deep.equal(["s2"]);

      const report = course.computeGrades({
        include: ["missed"],
        includeOthers: ["Comments"],
        diagnostics,
      });
      expect(report.column("Quiz missed")).to.deep.equal([0, 0]);
      expect(report.column("Comments")).to.deep.equal(["late", "ok"]);
    });

    it("should resolve the test scores", () => {
      const course = new Course(hw, [reference, second], { diagnostics });
      expect(course.grades.columns).to.deep.equal([
        "Last Name",
        "First Name",
        "ID",
        "Email",
        "HW 1",
        "HW 2",
      ]);
      expect(course.grades.column("HW 2")).to.deep.equal([18, 12, null]);
    });

    it("should need a gradebook", () => {
      expect(() => new Course(hw, [], { diagnostics })).to.throw(ConfigError);
    });
  });

  describe("computeGrades", () => {
    const book = gradebook([
      { ID: "jdoe", "HW 1": 20, "HW 2": 10, "Quiz 1 - v1": 8, "Quiz 1 - v2": null, Exam: 90, Comments: "ok" },
      { ID: "asmith", "HW 1": 16, "HW 2": null, "Quiz 1 - v1": null, "Quiz 1 - v2": 6, Exam: 70, Comments: null },
    ]);
    const assignments = [
      createAssignment({ name: "HW", maxPoints: 20, nbTests: 2, gradingScheme: drop(0), scaling: 100 }),
      createAssignment({ name: "Quiz", maxPoints: 10, nbTests: 1, nbVersions: 2 }),
      createAssignment({ name: "Exam", maxPoints: 100 }),
    ];

    it("should compute the default sections", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({ diagnostics });

      expect(report.columns).to.deep.equal([
        "Last Name",
        "First Name",
        "ID",
        "Email",
        "HW",
        "Quiz",
        "Exam",
        "Final grade",
        "Letter grade",
        "HW missed",
        "Quiz missed",
        "Exam missed",
      ]);
      expect(report.index).to.deep.equal(["jdoe", "asmith"]);
      expect(report.get("jdoe", "HW")).to.equal(75);
      expect(report.get("jdoe", "Quiz")).to.equal(8);
      expect(report.get("jdoe", "Exam")).to.equal(90);
      expect(report.get("asmith", "HW")).to.equal(40);
      expect(report.column("HW missed")).to.deep.equal([0, 1]);
      expect(report.column("Quiz missed")).to.deep.equal([0, 0]);
    });

    it("should average the assignments for the final grade", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({ diagnostics });
      // (0.75 + 0.8 + 0.9) / 3 and (0.4 + 0.6 + 0.7) / 3
      expect(report.get("jdoe", "Final grade")).to.be.closeTo(81.6667, 1e-4);
      expect(report.get("jdoe", "Letter grade")).to.equal("B-");
      expect(report.get("asmith", "Final grade")).to.be.closeTo(56.6667, 1e-4);
      expect(report.get("asmith", "Letter grade")).to.equal("D");
    });

    it("should keep the best course scheme", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({
        gradingScheme: [weights([1, 1, 2]), weights({ Exam: 1 })],
        include: ["final"],
        diagnostics,
      });
      // Exam only beats the weighted average for both students
      expect(report.get("jdoe", "Final grade")).to.be.closeTo(90, 1e-9);
      expect(report.get("asmith", "Final grade")).to.be.closeTo(70, 1e-9);
    });

    it("should include exactly the requested sections", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({ include: ["tests", "letter"], diagnostics });
      expect(report.columns).to.deep.equal([
        "Last Name",
        "First Name",
        "ID",
        "Email",
        "HW 1",
        "HW 2",
        "Quiz 1",
        "Exam",
        "Letter grade",
      ]);
      expect(report.column("HW 2")).to.deep.equal([10, null]);
    });

    it("should carry other columns over", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({
        include: ["final"],
        includeOthers: ["Comments", "tests"],
        diagnostics,
      });
      expect(report.columns.slice(-2)).to.deep.equal(["Final grade", "Comments"]);
      expect(report.column("Comments")).to.deep.equal(["ok", null]);
    });

    it("should reject other columns that do not exist", () => {
      const course = new Course(assignments, book, { diagnostics });
      expect(() => course.computeGrades({ includeOthers: ["Notes"], diagnostics })).to.throw(
        ConfigError,
        "Notes"
      );
    });

    it("should check course weights against the assignments", () => {
      const course = new Course(assignments, book, { diagnostics });
      expect(() =>
        course.computeGrades({ gradingScheme: weights({ Lab: 1 }), diagnostics })
      ).to.throw(KeyMissingError);
    });

    it("should warn about the letter scale and still grade", () => {
      const course = new Course(assignments, book, { diagnostics });
      const report = course.computeGrades({
        thresholds: [50, 90],
        letters: ["P", "F"],
        include: ["letter"],
        diagnostics,
      });
      expect(diagnostics.entries.map((d) => d.kind)).to.deep.equal([
        "thresholds-order",
        "letter-count",
      ]);
      expect(report.column("Letter grade")).to.deep.equal(["P", "P"]);
    });

    it("should keep letter-scale warnings on the course by default", () => {
      const course = new Course(assignments, book, { diagnostics });
      course.computeGrades({ thresholds: [50, 90], letters: ["P", "F"], include: ["letter"] });
      expect(course.diagnostics.byKind("thresholds-order")).to.have.length(1);
      expect(course.diagnostics.byKind("letter-count")).to.have.length(1);
    });

    it("should not change the course between calls", () => {
      const course = new Course(assignments, book, { diagnostics });
      const grades = course.grades.toRecords();
      const first = course.computeGrades({ include: ["tests", "averages"], diagnostics });
      const second = course.computeGrades({ include: ["tests", "averages"], diagnostics });
      expect(second.toRecords()).to.deep.equal(first.toRecords());
      expect(course.grades.toRecords()).to.deep.equal(grades);
    });
  });

  it("should drop an absent score before any taken one", () => {
    const book = gradebook([
      { ID: "s1", "HW 1": 10, "HW 2": null, "HW 3": 6 },
      { ID: "s2", "HW 1": 5, "HW 2": 10, "HW 3": 10 },
    ]);
    const hw = createAssignment({
      name: "HW",
      maxPoints: 10,
      nbTests: 3,
      gradingScheme: drop(1),
      scaling: 100,
    });
    const report = new Course(hw, book, { diagnostics: new Diagnostics({ echo: false }) })
      .computeGrades({ include: ["averages", "missed"] });
    // s1 keeps 10 and 6, s2 keeps both 10s
    expect(report.get("s1", "HW")).to.be.closeTo(80, 1e-9);
    expect(report.get("s2", "HW")).to.be.closeTo(100, 1e-9);
    expect(report.column("HW missed")).to.deep.equal([1, 0]);
  });

  it("should average two tests of 20 points", () => {
    const book = gradebook([{ ID: "s1", "HW 1": 20, "HW 2": 10 }]);
    const hw = createAssignment({
      name: "HW",
      maxPoints: 20,
      nbTests: 2,
      gradingScheme: drop(0),
      scaling: 100,
    });
    const report = new Course(hw, book, { diagnostics: new Diagnostics({ echo: false }) })
      .computeGrades({ include: ["averages"] });
    expect(report.get("s1", "HW")).to.equal(75);
  });
});
