import {
  DEFAULT_INFO_COLUMNS,
  DEFAULT_LETTERS,
  DEFAULT_SECTIONS,
  DEFAULT_THRESHOLDS,
  FINAL_GRADE_COLUMN,
  LETTER_GRADE_COLUMN,
  MISSED_SUFFIX,
  REPORT_SECTIONS,
} from "../constants";
import { ConfigError } from "../errors";
import {
  Assignment,
  GradingScheme,
  InfoColumns,
  ReportSection,
  Test,
} from "../types";
import { Diagnostics } from "../utils/diagnostics";
import { Cell, Table } from "../utils/table";
import { applyBestScheme, mean, validateScheme } from "./grading-scheme";
import { checkLetterScale, toLetter } from "./letter-mapper";
import { resolveScore } from "./score-resolver";

export interface CourseOptions {
  infoColumns?: InfoColumns;
  diagnostics?: Diagnostics;
}

export interface ComputeGradesOptions {
  /** Course-level scheme(s) over the assignment averages; the best is kept */
  gradingScheme?: GradingScheme | GradingScheme[];
  thresholds?: readonly number[];
  letters?: readonly string[];
  include?: readonly ReportSection[];
  /** Other gradebook columns to carry over, e.g. "Comments" */
  includeOthers?: readonly string[];
  /** Where letter-scale warnings go (default: the course's diagnostics) */
  diagnostics?: Diagnostics;
}

/**
 * A course: its assignments, the roster taken from the first gradebook,
 * every gradebook merged onto that roster, and the resolved test scores.
 *
 * Students that only appear in later gradebooks are not added; students
 * missing from a later gradebook are reported and get absent scores.
 */
export class Course {
  readonly assignments: readonly Assignment[];
  readonly tests: readonly Test[];
  readonly infoColumns: InfoColumns;
  readonly roster: Table;
  readonly gradebook: Table;
  readonly grades: Table;
  readonly diagnostics: Diagnostics;

  constructor(
    assignments: Assignment | readonly Assignment[],
    gradebooks: Table | readonly Table[],
    options: CourseOptions = {}
  ) {
    this.assignments = isAssignmentList(assignments) ? [...assignments] : [assignments];
    const books = gradebooks instanceof Table ? [gradebooks] : [...gradebooks];
    if (books.length === 0) {
      throw new ConfigError("A course needs at least one gradebook");
    }
    this.infoColumns = options.infoColumns ?? DEFAULT_INFO_COLUMNS;
    this.diagnostics = options.diagnostics ?? new Diagnostics();

    const info = this.infoColumns;
    const infoNames = [info.last, info.first, info.id, info.email];
    const [reference, ...others] = books;
    const absentInfo = infoNames.filter((column) => !reference.has(column));
    if (absentInfo.length > 0) {
      throw new ConfigError("The first gradebook lacks info columns", absentInfo);
    }
    this.roster = reference.select(infoNames);

    others.forEach((book, i) => {
      const missing = this.roster.index.filter((id) => !book.hasRow(id));
      if (missing.length > 0) {
        this.diagnostics.warn(
          "missing-students",
          `The following students are missing grades in gradebook ${i + 1}`,
          missing
        );
      }
    });

    this.gradebook = this.mergeGradebooks(books, infoNames);
    this.tests = this.assignments.flatMap((assignment) => assignment.tests);
    this.grades = this.resolveGrades();
  }

  /**
   * Info columns come from the roster. A column found in several
   * gradebooks takes each student's first present value, in gradebook
   * order.
   */
  private mergeGradebooks(books: readonly Table[], infoNames: string[]): Table {
    const sources = new Map<string, Table[]>();
    books.forEach((book, i) => {
      const columns = book.columns.filter((column) => !infoNames.includes(column));
      const repeated = columns.filter((column) => sources.has(column));
      if (repeated.length > 0) {
        this.diagnostics.warn(
          "duplicate-column",
          `Columns of gradebook ${i} were already loaded from an earlier gradebook, their absent cells are filled from it`,
          repeated
        );
      }
      for (const column of columns) {
        sources.set(column, [...(sources.get(column) ?? []), book]);
      }
    });

    let merged = this.roster;
    for (const [column, owners] of sources) {
      merged = merged.withColumn(column, (id) => {
        const present = owners
          .map((owner) => owner.get(id, column))
          .filter((value): value is string | number => value !== null);
        if (present.length > 1) {
          this.diagnostics.warn(
            "multiple-versions",
            `A student has values for ${column} in more than one gradebook`,
            [id]
          );
        }
        return present.length > 0 ? present[0] : null;
      });
    }
    return merged;
  }

  private resolveGrades(): Table {
    let grades = this.roster;
    for (const test of this.tests) {
      grades = grades.withColumn(test.name, (id) => {
        const versions = new Map<string, Cell>(
          test.versions.map((version): [string, Cell] => [
            version,
            this.gradebook.get(id, version),
          ])
        );
        return resolveScore(test.name, versions, id, this.diagnostics);
      });
    }
    return grades;
  }

  /**
   * Computes a grade report in roster order. It holds the roster plus,
   * as requested in `include`:
   * - tests: every test score, absent when not taken
   * - averages: each assignment's average out of its scaling
   * - final: the final grade out of 100
   * - letter: the letter grade
   * - missed: how many tests of each assignment were not taken
   * followed by the `includeOthers` columns. Missing scores count as 0
   * in averages. The course is not modified, except that warnings go
   * to the course's own `diagnostics` unless others are given.
   */
  computeGrades(options: ComputeGradesOptions = {}): Table {
    const diagnostics = options.diagnostics ?? this.diagnostics;
    const schemes =
      options.gradingScheme === undefined
        ? [mean()]
        : Array.isArray(options.gradingScheme)
        ? [...options.gradingScheme]
        : [options.gradingScheme];
    const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    const letters = options.letters ?? DEFAULT_LETTERS;
    const include = new Set(options.include ?? DEFAULT_SECTIONS);

    checkLetterScale(thresholds, letters, diagnostics);
    const assignmentNames = this.assignments.map((assignment) => assignment.name);
    const needsFinal = include.has("final") || include.has("letter");
    if (needsFinal) {
      if (schemes.length === 0) {
        throw new ConfigError("At least one course grading scheme is required");
      }
      schemes.forEach((scheme) => validateScheme(scheme, assignmentNames, "Course"));
    }

    const others = (options.includeOthers ?? []).filter(
      (column) => !REPORT_SECTIONS.some((section) => section === column)
    );
    const unknown = others.filter((column) => !this.gradebook.has(column));
    if (unknown.length > 0) {
      throw new ConfigError("Columns to include are not in any gradebook", unknown);
    }

    const index = this.roster.index;
    const sections: Record<ReportSection, Table> = {
      tests: this.roster.select([]),
      averages: this.roster.select([]),
      final: this.roster.select([]),
      letter: this.roster.select([]),
      missed: this.roster.select([]),
    };

    if (include.has("missed")) {
      for (const assignment of this.assignments) {
        sections.missed = sections.missed.withColumn(
          `${assignment.name}${MISSED_SUFFIX}`,
          (id) => assignment.tests.filter((test) => this.grades.get(id, test.name) === null).length
        );
      }
    }

    if (include.has("tests")) {
      sections.tests = this.grades.select(this.tests.map((test) => test.name));
    }

    if (include.has("averages") || needsFinal) {
      const unscaled = new Map<string, Map<string, number>>(
        index.map((id): [string, Map<string, number>] => [id, this.averagesOf(id)])
      );

      if (include.has("averages")) {
        for (const assignment of this.assignments) {
          sections.averages = sections.averages.withColumn(
            assignment.name,
            (id) => (unscaled.get(id)?.get(assignment.name) ?? 0) * assignment.scaling
          );
        }
      }

      if (needsFinal) {
        const finals = new Map<string, number>(
          index.map((id): [string, number] => [
            id,
            applyBestScheme(schemes, unscaled.get(id) ?? new Map()) * 100,
          ])
        );
        if (include.has("final")) {
          sections.final = sections.final.withColumn(
            FINAL_GRADE_COLUMN,
            (id) => finals.get(id) ?? null
          );
        }
        if (include.has("letter")) {
          sections.letter = sections.letter.withColumn(LETTER_GRADE_COLUMN, (id) =>
            toLetter(finals.get(id) ?? 0, thresholds, letters)
          );
        }
      }
    }

    return Table.concatColumns(
      [
        this.roster,
        ...REPORT_SECTIONS.map((section) => sections[section]),
        this.gradebook.select(others),
      ],
      index
    );
  }

  /**
   * Unscaled (0 to 1) average of every assignment for one student,
   * keyed by assignment name in course order
   */
  private averagesOf(id: string): Map<string, number> {
    const averages = new Map<string, number>();
    for (const assignment of this.assignments) {
      const normalized = new Map<string, number>(
        assignment.tests.map((test): [string, number] => {
          const score = this.grades.get(id, test.name);
          return [test.name, (typeof score === "number" ? score : 0) / test.maxPoints];
        })
      );
      averages.set(assignment.name, applyBestScheme(assignment.gradingSchemes, normalized));
    }
    return averages;
  }
}

function isAssignmentList(
  value: Assignment | readonly Assignment[]
): value is readonly Assignment[] {
  return Array.isArray(value);
}
