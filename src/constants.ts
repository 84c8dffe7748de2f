import { FileType, InfoColumns, NamePreset, ReportSection } from "./types";

export const DEFAULT_INFO_COLUMNS: Readonly<InfoColumns> = Object.freeze({
  last: "Last Name",
  first: "First Name",
  id: "ID",
  email: "Email",
});

/**
 * Column layouts of the exports we know how to read.
 * GS = Gradescope, WA = WebAssign, BS = Brightspace.
 */
export const FILE_TYPE_PRESETS: Readonly<Record<FileType, NamePreset>> = {
  GS: {
    columns: { full: "Name", id: "SID", email: "Email" },
    nameSeparator: " ",
    lastNameFirst: false,
    missingValues: [],
  },
  WA: {
    columns: { full: "Fullname", email: "Email" },
    nameSeparator: ", ",
    lastNameFirst: true,
    missingValues: ["ND", "NS"],
  },
  BS: {
    columns: { first: "First Name", last: "Last Name", email: "Email" },
    nameSeparator: " ",
    lastNameFirst: false,
    missingValues: [],
  },
};

export const DEFAULT_NAME_SEPARATOR = " ";

export const DEFAULT_TEST_SEPARATOR = " ";
export const DEFAULT_VERSION_SEPARATOR = " - v";

export const DEFAULT_THRESHOLDS: readonly number[] = [93, 90, 87, 83, 80, 75, 65, 50];
export const DEFAULT_LETTERS: readonly string[] = [
  "A",
  "A-",
  "B+",
  "B",
  "B-",
  "C+",
  "C",
  "D",
  "F",
];

export const REPORT_SECTIONS: readonly ReportSection[] = [
  "tests",
  "averages",
  "final",
  "letter",
  "missed",
];
export const DEFAULT_SECTIONS: readonly ReportSection[] = [
  "averages",
  "missed",
  "final",
  "letter",
];

export const FINAL_GRADE_COLUMN = "Final grade";
export const LETTER_GRADE_COLUMN = "Letter grade";
export const MISSED_SUFFIX = " missed";

// Brightspace "Adjusted Final Grade" import layout
export const IMPORT_COLUMNS = {
  username: "Username",
  numerator: "Adjusted Final Grade Numerator",
  denominator: "Adjusted Final Grade Denominator",
  endOfLine: "End-Of-Line Indicator",
  pointsGradeSuffix: " Points Grade",
} as const;
export const IMPORT_USERNAME_PREFIX = "#";
export const IMPORT_DENOMINATOR = 100;
export const IMPORT_END_OF_LINE = "#";
