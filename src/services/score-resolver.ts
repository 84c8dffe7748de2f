import { ValidationError } from "../errors";
import { Diagnostics } from "../utils/diagnostics";
import { Cell } from "../utils/table";

/**
 * Reads a score cell as a number, or null when it is absent
 * @param column Column name, for the error message
 */
export function parseScore(value: Cell, studentId: string, column: string): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  const text = value.trim();
  if (text === "") {
    return null;
  }
  const score = Number(text);
  if (Number.isNaN(score)) {
    throw new ValidationError(`Score in ${column} is not a number`, [
      `${studentId}: ${value}`,
    ]);
  }
  return score;
}

/**
 * Resolves the scores of all versions of a test to the student's score.
 * The first version with a score wins; having more than one is reported.
 * @param versions Cells keyed by version column name, in version order
 * @returns The score, or null when no version has one
 */
export function resolveScore(
  testName: string,
  versions: ReadonlyMap<string, Cell>,
  studentId: string,
  diagnostics: Diagnostics
): number | null {
  const present: number[] = [];
  for (const [column, value] of versions) {
    const score = parseScore(value, studentId, column);
    if (score !== null) {
      present.push(score);
    }
  }

  if (present.length === 0) {
    return null;
  }
  if (present.length > 1) {
    diagnostics.warn(
      "multiple-versions",
      `A student has grades in multiple versions of ${testName}`,
      [studentId]
    );
  }
  return present[0];
}
