import * as path from "path";
import * as fsPromises from "fs/promises";
import { z } from "zod";
import { REPORT_SECTIONS } from "../constants";
import { ConfigError } from "../errors";
import { Assignment, FormatOptions, GradingScheme } from "../types";
import { createAssignment } from "../services/assignment";
import { drop, mean, weights } from "../services/grading-scheme";

const columnMappingSchema = z
  .object({
    first: z.string().min(1),
    last: z.string().min(1),
    full: z.string().min(1),
    id: z.string().min(1),
    email: z.string().min(1),
  })
  .partial()
  .strict();

const infoColumnsSchema = z
  .object({
    last: z.string().min(1),
    first: z.string().min(1),
    id: z.string().min(1),
    email: z.string().min(1),
  })
  .strict();

export const schemeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("mean") }).strict(),
  z.object({ type: z.literal("drop"), count: z.number().int().nonnegative() }).strict(),
  z
    .object({
      type: z.literal("weights"),
      weights: z.union([
        z.array(z.number().nonnegative()).nonempty(),
        z.record(z.number().nonnegative()),
      ]),
    })
    .strict(),
]);

const schemesSchema = z.union([schemeSchema, z.array(schemeSchema).nonempty()]);

const gradebookSchema = z
  .object({
    file: z.string().min(1),
    fileType: z.enum(["GS", "WA", "BS"]).optional(),
    inputColumns: columnMappingSchema.optional(),
    lastNameFirst: z.boolean().optional(),
    nameSeparator: z.string().min(1).optional(),
    missingValues: z.array(z.string()).optional(),
  })
  .strict();

const assignmentSchema = z
  .object({
    name: z.string().min(1),
    maxPoints: z.union([z.number().positive(), z.array(z.number().positive()).nonempty()]),
    gradingScheme: schemesSchema.optional(),
    scaling: z.number().positive().optional(),
    nbTests: z.number().int().positive().optional(),
    testSeparator: z.string().optional(),
    nbVersions: z
      .union([
        z.number().int().positive(),
        z.array(z.number().int().positive().nullable()).nonempty(),
      ])
      .optional(),
    versionSeparator: z.string().optional(),
  })
  .strict();

export const courseConfigSchema = z
  .object({
    infoColumns: infoColumnsSchema.optional(),
    gradebooks: z.array(gradebookSchema).nonempty(),
    assignments: z.array(assignmentSchema).nonempty(),
    gradingScheme: schemesSchema.optional(),
    thresholds: z.array(z.number()).optional(),
    letters: z.array(z.string().min(1)).nonempty().optional(),
    include: z.array(z.enum(["tests", "averages", "final", "letter", "missed"])).optional(),
    includeOthers: z.array(z.string()).optional(),
    output: z.string().min(1).default("grades.csv"),
    sortBy: z.string().optional(),
    import: z
      .object({
        input: z.string().min(1).optional(),
        output: z.string().min(1).default("import.csv"),
        letterGradeColumn: z.string().min(1).optional(),
        standardize: z.boolean().default(true),
        includeOthers: z.array(z.string()).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type SchemeConfig = z.infer<typeof schemeSchema>;
export type CourseConfig = z.infer<typeof courseConfigSchema>;

export interface GradebookSource extends FormatOptions {
  file: string;
}

/**
 * A course config with paths resolved against the config file's folder
 */
export interface LoadedCourseConfig extends CourseConfig {
  baseDir: string;
  gradebookSources: GradebookSource[];
}

/**
 * Reads and validates a course config file
 * @param configPath Path to the JSON file
 */
export async function loadCourseConfig(configPath: string): Promise<LoadedCourseConfig> {
  let content: string;
  try {
    content = await fsPromises.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read course config ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseCourseConfig(content, path.dirname(path.resolve(configPath)));
}

/**
 * Validates config text; relative paths are resolved against `baseDir`
 */
export function parseCourseConfig(content: string, baseDir: string): LoadedCourseConfig {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError("Course config is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = courseConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid course config",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const resolve = (file: string) => path.resolve(baseDir, file);
  const unknownSections = (config.includeOthers ?? []).filter((column) =>
    REPORT_SECTIONS.some((section) => section === column)
  );
  if (unknownSections.length > 0) {
    console.warn(
      `includeOthers lists report sections, use include for them: ${unknownSections.join(", ")}`
    );
  }

  return {
    ...config,
    baseDir,
    output: resolve(config.output),
    import: {
      ...config.import,
      input: config.import.input ? resolve(config.import.input) : undefined,
      output: resolve(config.import.output),
    },
    gradebookSources: config.gradebooks.map((gradebook) => ({
      ...gradebook,
      file: resolve(gradebook.file),
      infoColumns: config.infoColumns,
    })),
  };
}

/**
 * Turns one scheme entry of the config into a GradingScheme
 */
export function buildScheme(config: SchemeConfig): GradingScheme {
  switch (config.type) {
    case "mean":
      return mean();
    case "drop":
      return drop(config.count);
    case "weights":
      return weights(config.weights);
  }
}

export function buildSchemes(
  config: SchemeConfig | SchemeConfig[] | undefined
): GradingScheme[] | undefined {
  if (config === undefined) {
    return undefined;
  }
  return Array.isArray(config) ? config.map(buildScheme) : [buildScheme(config)];
}

export function buildAssignments(config: CourseConfig): Assignment[] {
  return config.assignments.map((assignment) =>
    createAssignment({
      ...assignment,
      maxPoints: Array.isArray(assignment.maxPoints)
        ? [...assignment.maxPoints]
        : assignment.maxPoints,
      nbVersions: Array.isArray(assignment.nbVersions)
        ? assignment.nbVersions.map((count) => count ?? undefined)
        : assignment.nbVersions,
      gradingScheme: buildSchemes(assignment.gradingScheme),
    })
  );
}
