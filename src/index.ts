#!/usr/bin/env node
import * as path from "path";
import {
  buildAssignments,
  buildSchemes,
  loadCourseConfig,
} from "./config/course-config";
import { FINAL_GRADE_COLUMN, LETTER_GRADE_COLUMN } from "./constants";
import { GradebookError } from "./errors";
import { Course } from "./services/course";
import { loadGradebook } from "./services/gradebook-loader";
import {
  printGradingSummary,
  saveGradeReport,
  saveGradingSummary,
  sortReport,
  summarizeGrades,
} from "./reporters/report-generator";
import { createImport, saveImport } from "./reporters/import-exporter";
import { Diagnostics } from "./utils/diagnostics";
import { parseCliArgs } from "./utils/cli-args";
import * as fsUtils from "./utils/fs-utils";
import { Table } from "./utils/table";

export * from "./errors";
export * from "./types";
export * from "./constants";
export { Table } from "./utils/table";
export type { Cell, Row } from "./utils/table";
export { Diagnostics } from "./utils/diagnostics";
export { Course } from "./services/course";
export { createAssignment, createTest } from "./services/assignment";
export { custom, drop, mean, weights, applyScheme, applyBestScheme } from "./services/grading-scheme";
export { formatTable, resolveInputColumns } from "./services/schema-normalizer";
export { loadGradebook } from "./services/gradebook-loader";
export { resolveScore } from "./services/score-resolver";
export { toLetter, toNumeric } from "./services/letter-mapper";
export { createImport, saveImport } from "./reporters/import-exporter";

export interface GradingRunOptions {
  output?: string;
  sortBy?: string;
}

/**
 * Loads every gradebook of a course, computes the grade report, saves it
 * and prints a summary
 * @param configPath Path to the course config (JSON)
 * @returns The report, sorted
 */
export async function runGrading(
  configPath: string,
  options: GradingRunOptions = {}
): Promise<Table> {
  const startTime = Date.now();
  console.log(`Starting grading with ${configPath}...`);

  const config = await loadCourseConfig(configPath);
  const diagnostics = new Diagnostics();

  const gradebooks: Table[] = [];
  for (const { file, ...format } of config.gradebookSources) {
    gradebooks.push(await loadGradebook(file, format, diagnostics));
  }

  const course = new Course(buildAssignments(config), gradebooks, {
    infoColumns: config.infoColumns,
    diagnostics,
  });
  console.log(
    `Course has ${course.roster.size} students, ${course.assignments.length} assignments and ${course.tests.length} tests`
  );

  const report = course.computeGrades({
    gradingScheme: buildSchemes(config.gradingScheme),
    thresholds: config.thresholds,
    letters: config.letters,
    include: config.include,
    includeOthers: config.includeOthers,
    diagnostics,
  });

  // Highest final grade first by default, to help readjust the thresholds
  const sortColumn =
    options.sortBy ??
    config.sortBy ??
    (report.has(FINAL_GRADE_COLUMN) ? FINAL_GRADE_COLUMN : undefined);
  const sorted = sortColumn ? sortReport(report, sortColumn) : report;

  const outputPath = options.output ? path.resolve(options.output) : config.output;
  await saveGradeReport(sorted, outputPath);

  const summary = summarizeGrades(sorted, diagnostics, config.letters);
  printGradingSummary(summary);
  await saveGradingSummary(summary, path.join(path.dirname(outputPath), "reports"));

  console.log(`\nGrading completed in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  return sorted;
}

export interface ImportRunOptions {
  output?: string;
  standardize?: boolean;
}

/**
 * Builds the LMS import file from a (possibly hand-edited) grade report
 * @param configPath Path to the course config (JSON)
 * @returns Path to the import file
 */
export async function runImport(
  configPath: string,
  options: ImportRunOptions = {}
): Promise<string> {
  const config = await loadCourseConfig(configPath);
  const inputPath = config.import.input ?? config.output;
  if (!(await fsUtils.fileExists(inputPath))) {
    throw new GradebookError("Grade file not found, run the grade command first", [
      inputPath,
    ]);
  }

  console.log(`Creating import file from ${inputPath}...`);
  const graded = await fsUtils.readCsvTable(inputPath);
  const table = createImport(graded, {
    infoColumns: config.infoColumns,
    letterGradeColumn: config.import.letterGradeColumn ?? LETTER_GRADE_COLUMN,
    standardize: options.standardize ?? config.import.standardize,
    thresholds: config.thresholds,
    letters: config.letters,
    includeOthers: config.import.includeOthers,
  });

  const outputPath = options.output ? path.resolve(options.output) : config.import.output;
  return saveImport(table, outputPath);
}

// Run the grader if this file is executed directly
if (require.main === module) {
  const cli = parseCliArgs(process.argv.slice(2));

  const run: Promise<unknown> =
    cli.command === "import"
      ? runImport(cli.configPath, { output: cli.output, standardize: cli.standardize })
      : runGrading(cli.configPath, { output: cli.output, sortBy: cli.sortBy });

  run.catch((error) => {
    console.error(`Error running ${cli.command}:`, error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
