/**
 * Exports with a built-in column layout
 */
export type FileType = "GS" | "WA" | "BS";

/**
 * Names of the student info columns in normalized tables
 */
export interface InfoColumns {
  last: string;
  first: string;
  id: string;
  email: string;
}

/**
 * Where to find student info in a raw export. Either `first` and `last`
 * or `full` must be given, and either `id` or `email`.
 */
export interface ColumnMapping {
  first?: string;
  last?: string;
  full?: string;
  id?: string;
  email?: string;
}

/**
 * Everything a file-type preset fixes about an export
 */
export interface NamePreset {
  columns: ColumnMapping;
  nameSeparator: string;
  lastNameFirst: boolean;
  missingValues: string[];
}

/**
 * Options for turning one raw export into a normalized gradebook.
 * Explicit values override the preset picked by `fileType`.
 */
export interface FormatOptions {
  fileType?: FileType;
  inputColumns?: ColumnMapping;
  infoColumns?: InfoColumns;
  lastNameFirst?: boolean;
  nameSeparator?: string;
  missingValues?: string[];
}

export type ReportSection = "tests" | "averages" | "final" | "letter" | "missed";

/**
 * Scores keyed by test or assignment name, in definition order
 */
export type ScoreMap = ReadonlyMap<string, number>;

export type ScoreInput = readonly number[] | ScoreMap;

/**
 * One averaging policy. Lists of schemes are combined by taking the max.
 */
export type GradingScheme =
  | { readonly kind: "mean" }
  | { readonly kind: "drop"; readonly count: number }
  | { readonly kind: "weighted-list"; readonly weights: readonly number[] }
  | {
      readonly kind: "weighted-map";
      readonly weights: Readonly<Record<string, number>>;
    }
  | { readonly kind: "custom"; readonly apply: (values: ScoreMap) => number };

/**
 * One graded item, e.g. "Quiz 3", possibly given in several versions
 */
export interface Test {
  readonly name: string;
  readonly maxPoints: number;
  readonly versions: readonly string[];
}

/**
 * A family of tests averaged together, e.g. all quizzes
 */
export interface Assignment {
  readonly name: string;
  readonly tests: readonly Test[];
  readonly maxPoints: readonly number[];
  readonly gradingSchemes: readonly GradingScheme[];
  readonly scaling: number;
}

/**
 * Headline numbers of a grade report
 */
export interface GradingSummary {
  timestamp: string;
  totalStudents: number;
  averageFinalGrade?: number;
  /** Students per letter grade, in letter-scale order */
  letterCounts: Record<string, number>;
  /** Missed tests per assignment, summed over students */
  missedCounts: Record<string, number>;
  diagnosticsCount: number;
}
