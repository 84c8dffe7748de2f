import * as path from "path";
import {
  DEFAULT_LETTERS,
  FINAL_GRADE_COLUMN,
  LETTER_GRADE_COLUMN,
  MISSED_SUFFIX,
} from "../constants";
import { GradingSummary } from "../types";
import { Diagnostics } from "../utils/diagnostics";
import * as fsUtils from "../utils/fs-utils";
import { Table } from "../utils/table";
import * as fsPromises from "fs/promises";

/**
 * Summarize a grade report from Course.computeGrades
 * @param report The report; sections it lacks are left out of the summary
 * @param letters Letter scale, for ordering the letter counts
 * @returns Summary object
 */
export function summarizeGrades(
  report: Table,
  diagnostics?: Diagnostics,
  letters: readonly string[] = DEFAULT_LETTERS
): GradingSummary {
  const finals = report
    .column(FINAL_GRADE_COLUMN)
    .filter((value): value is number => typeof value === "number");

  const letterCounts: Record<string, number> = {};
  if (report.has(LETTER_GRADE_COLUMN)) {
    letters.forEach((letter) => (letterCounts[letter] = 0));
    report.column(LETTER_GRADE_COLUMN).forEach((value) => {
      if (value !== null) {
        letterCounts[String(value)] = (letterCounts[String(value)] || 0) + 1;
      }
    });
  }

  const missedCounts: Record<string, number> = {};
  report.columns
    .filter((column) => column.endsWith(MISSED_SUFFIX))
    .forEach((column) => {
      missedCounts[column.slice(0, -MISSED_SUFFIX.length)] = report
        .column(column)
        .reduce<number>((sum, value) => sum + (typeof value === "number" ? value : 0), 0);
    });

  return {
    timestamp: new Date().toISOString(),
    totalStudents: report.size,
    averageFinalGrade:
      finals.length > 0
        ? finals.reduce((sum, value) => sum + value, 0) / finals.length
        : undefined,
    letterCounts,
    missedCounts,
    diagnosticsCount: diagnostics?.entries.length ?? 0,
  };
}

/**
 * Sorts a report on one column: highest first when it holds numbers,
 * alphabetically otherwise
 */
export function sortReport(report: Table, column: string): Table {
  const numeric = report.column(column).some((value) => typeof value === "number");
  return report.sortBy(column, numeric);
}

/**
 * Print summary statistics of a grade report
 */
export function printGradingSummary(summary: GradingSummary): void {
  console.log("\n=== Grading Summary ===");
  console.log(`Total Students: ${summary.totalStudents}`);
  if (summary.averageFinalGrade !== undefined) {
    console.log(`Average Final Grade: ${summary.averageFinalGrade.toFixed(1)} / 100`);
  }

  const letters = Object.entries(summary.letterCounts);
  if (letters.length > 0) {
    console.log("\nLetter Grades:");
    letters.forEach(([letter, count]) => {
      const share =
        summary.totalStudents > 0
          ? Math.round((count / summary.totalStudents) * 100)
          : 0;
      console.log(`- ${letter}: ${count} students (${share}%)`);
    });
  }

  const missed = Object.entries(summary.missedCounts).filter(([, count]) => count > 0);
  if (missed.length > 0) {
    console.log("\nMissed Tests:");
    missed.forEach(([assignment, count]) => {
      console.log(`- ${assignment}: ${count}`);
    });
  }

  if (summary.diagnosticsCount > 0) {
    console.log(`\n${summary.diagnosticsCount} warnings were raised, see above.`);
  }
}

/**
 * Save a grade report as CSV
 * @returns Path to the saved report
 */
export async function saveGradeReport(report: Table, outputPath: string): Promise<string> {
  await fsUtils.writeCsvTable(report, outputPath);
  console.log(`Grade report saved to: ${outputPath}`);
  return outputPath;
}

/**
 * Save the summary as JSON next to the grade report, timestamped
 * @returns Path to the saved summary
 */
export async function saveGradingSummary(
  summary: GradingSummary,
  outputDir: string
): Promise<string> {
  await fsPromises.mkdir(outputDir, { recursive: true });
  const timestamp = summary.timestamp.replace(/:/g, "-").split(".")[0];
  const outputPath = path.join(outputDir, `grading-summary-${timestamp}.json`);
  await fsPromises.writeFile(outputPath, JSON.stringify(summary, null, 2));
  console.log(`Grading summary saved to: ${outputPath}`);
  return outputPath;
}
