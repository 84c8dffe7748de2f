import {
  DEFAULT_TEST_SEPARATOR,
  DEFAULT_VERSION_SEPARATOR,
} from "../constants";
import { ConfigError } from "../errors";
import { Assignment, GradingScheme, Test } from "../types";
import { mean, validateScheme } from "./grading-scheme";

/**
 * Defines one test. Without `nbVersions` its only version column is its
 * own name; with N versions the columns are e.g. "Quiz 3 - v1" to
 * "Quiz 3 - vN".
 */
export function createTest(
  name: string,
  maxPoints: number,
  nbVersions?: number,
  versionSeparator: string = DEFAULT_VERSION_SEPARATOR
): Test {
  if (!(maxPoints > 0)) {
    throw new ConfigError(`${name}: max points must be positive`, [
      String(maxPoints),
    ]);
  }
  if (nbVersions === undefined) {
    return { name, maxPoints, versions: [name] };
  }
  if (!Number.isInteger(nbVersions) || nbVersions < 1) {
    throw new ConfigError(`${name}: number of versions must be a positive integer`, [
      String(nbVersions),
    ]);
  }
  const versions = Array.from(
    { length: nbVersions },
    (_, i) => `${name}${versionSeparator}${i + 1}`
  );
  return { name, maxPoints, versions };
}

export interface AssignmentOptions {
  name: string;
  /** One value for every test, or one per test */
  maxPoints: number | number[];
  /** One scheme, or alternatives of which the best is kept (default: mean) */
  gradingScheme?: GradingScheme | GradingScheme[];
  /** Points the average is displayed out of (default: maxPoints, or 100 for a list) */
  scaling?: number;
  /** Omit for a single test named like the assignment */
  nbTests?: number;
  testSeparator?: string;
  nbVersions?: number | (number | undefined)[];
  versionSeparator?: string;
}

/**
 * Builds an assignment and its tests. With `nbTests` the tests are
 * named `name + testSeparator + i`, e.g. "HW 1" to "HW 11".
 */
export function createAssignment(options: AssignmentOptions): Assignment {
  const {
    name,
    nbTests,
    testSeparator = DEFAULT_TEST_SEPARATOR,
    versionSeparator = DEFAULT_VERSION_SEPARATOR,
  } = options;

  if (nbTests !== undefined && (!Number.isInteger(nbTests) || nbTests < 1)) {
    throw new ConfigError(`${name}: number of tests must be a positive integer`, [
      String(nbTests),
    ]);
  }
  const count = nbTests ?? 1;

  const maxPoints = Array.isArray(options.maxPoints)
    ? [...options.maxPoints]
    : new Array<number>(count).fill(options.maxPoints);
  const nbVersions = Array.isArray(options.nbVersions)
    ? [...options.nbVersions]
    : new Array<number | undefined>(count).fill(options.nbVersions);

  if (maxPoints.length !== count || nbVersions.length !== count) {
    throw new ConfigError(
      `${name}: maxPoints and nbVersions should be a number or a list of ${count} values`,
      [`maxPoints: ${maxPoints.length}`, `nbVersions: ${nbVersions.length}`]
    );
  }

  const tests =
    nbTests === undefined
      ? [createTest(name, maxPoints[0], nbVersions[0], versionSeparator)]
      : maxPoints.map((points, i) =>
          createTest(
            `${name}${testSeparator}${i + 1}`,
            points,
            nbVersions[i],
            versionSeparator
          )
        );

  const gradingSchemes =
    options.gradingScheme === undefined
      ? [mean()]
      : Array.isArray(options.gradingScheme)
      ? [...options.gradingScheme]
      : [options.gradingScheme];
  if (gradingSchemes.length === 0) {
    throw new ConfigError(`${name}: at least one grading scheme is required`);
  }
  const testNames = tests.map((test) => test.name);
  gradingSchemes.forEach((scheme) => validateScheme(scheme, testNames, name));

  const scaling =
    options.scaling ??
    (Array.isArray(options.maxPoints) ? 100 : options.maxPoints);

  return { name, tests, maxPoints, gradingSchemes, scaling };
}
