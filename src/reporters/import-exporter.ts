import {
  DEFAULT_INFO_COLUMNS,
  DEFAULT_LETTERS,
  DEFAULT_THRESHOLDS,
  IMPORT_COLUMNS,
  IMPORT_DENOMINATOR,
  IMPORT_END_OF_LINE,
  IMPORT_USERNAME_PREFIX,
  LETTER_GRADE_COLUMN,
} from "../constants";
import { ConfigError, ValidationError } from "../errors";
import { InfoColumns } from "../types";
import { toNumeric } from "../services/letter-mapper";
import { Row, Table } from "../utils/table";
import { writeCsvTable } from "../utils/fs-utils";

export interface ImportOptions {
  infoColumns?: InfoColumns;
  /** Column holding the (possibly hand-edited) letter grade */
  letterGradeColumn?: string;
  /**
   * Convert the letter grade to the middle of its bracket (default).
   * When false the column is copied as is and must hold a number.
   */
  standardize?: boolean;
  thresholds?: readonly number[];
  letters?: readonly string[];
  /** Grade columns exported as "<name> Points Grade" */
  includeOthers?: readonly string[];
}

/**
 * Builds the table to import back into Brightspace from a grade report
 * @param graded A report from Course.computeGrades, usually read back from disk
 */
export function createImport(graded: Table, options: ImportOptions = {}): Table {
  const info = options.infoColumns ?? DEFAULT_INFO_COLUMNS;
  const letterColumn = options.letterGradeColumn ?? LETTER_GRADE_COLUMN;
  const standardize = options.standardize ?? true;
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const letters = options.letters ?? DEFAULT_LETTERS;
  const others = options.includeOthers ?? [];

  const required = [info.id, info.last, info.first, info.email, letterColumn, ...others];
  const absent = required.filter((column) => !graded.has(column));
  if (absent.length > 0) {
    throw new ConfigError("Grade file is missing columns", absent);
  }

  const columns = [
    IMPORT_COLUMNS.username,
    info.last,
    info.first,
    info.email,
    ...others.map((column) => `${column}${IMPORT_COLUMNS.pointsGradeSuffix}`),
    IMPORT_COLUMNS.numerator,
    IMPORT_COLUMNS.denominator,
    IMPORT_COLUMNS.endOfLine,
  ];

  const records = graded.index.map((key): Row => {
    const id = graded.get(key, info.id);
    if (id === null) {
      throw new ValidationError("Grade file has a row without an ID", [key]);
    }
    const row: Row = {
      [IMPORT_COLUMNS.username]: `${IMPORT_USERNAME_PREFIX}${id}`,
      [info.last]: graded.get(key, info.last),
      [info.first]: graded.get(key, info.first),
      [info.email]: graded.get(key, info.email),
    };
    for (const column of others) {
      row[`${column}${IMPORT_COLUMNS.pointsGradeSuffix}`] = graded.get(key, column);
    }
    const grade = graded.get(key, letterColumn);
    row[IMPORT_COLUMNS.numerator] =
      standardize && grade !== null
        ? toNumeric(String(grade).trim(), thresholds, letters)
        : grade;
    row[IMPORT_COLUMNS.denominator] = IMPORT_DENOMINATOR;
    row[IMPORT_COLUMNS.endOfLine] = IMPORT_END_OF_LINE;
    return row;
  });

  return Table.fromRecords(records, columns);
}

/**
 * Writes the import table as CSV
 * @returns Path to the saved file
 */
export async function saveImport(table: Table, filePath: string): Promise<string> {
  await writeCsvTable(table, filePath);
  console.log(`Import file saved to: ${filePath}`);
  return filePath;
}
