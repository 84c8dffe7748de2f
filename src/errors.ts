/**
 * Error hierarchy for the grading pipeline.
 * Every error carries the rows or keys it is about in `details`.
 */
export class GradebookError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join(", ")}` : message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * The input table lacks the columns needed to identify students
 */
export class SchemaError extends GradebookError {}

/**
 * Some rows cannot be keyed: missing or duplicated IDs, unreadable scores
 */
export class ValidationError extends GradebookError {}

/**
 * Inconsistent assignment or grading scheme definitions
 */
export class ConfigError extends GradebookError {}

/**
 * A drop scheme asked to drop as many scores as there are
 */
export class DomainError extends ConfigError {}

/**
 * A name-keyed weights scheme refers to a score that is not there
 */
export class KeyMissingError extends ConfigError {}

/**
 * A letter grade that is not on the letter scale
 */
export class LookupError extends GradebookError {}
